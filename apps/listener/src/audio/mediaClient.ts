/**
 * Media element audio client.
 *
 * Applies the driver's corrections to an <audio> element: item loads set the
 * source, hard seeks set currentTime, soft corrections set playbackRate with
 * pitch preserved.
 */

import type { AudioClient } from "@lumasync/sync";

/** The parts of HTMLMediaElement the client drives */
export interface MediaElementLike {
  src: string;
  currentTime: number;
  playbackRate: number;
  preservesPitch: boolean;
  play(): Promise<void>;
  pause(): void;
}

export interface MediaClientOptions {
  element: MediaElementLike;
  /** Media URL for an item, or null when it has no soundtrack */
  resolveMediaUrl: (itemId: string) => string | null;
  /** Called when the browser refuses to start playback without a gesture */
  onPlaybackBlocked?: (error: unknown) => void;
}

/**
 * Media URL beside the relay: "Elvis.fseq" plays "{base}/Elvis.mp3".
 */
export function mediaUrlFor(baseUrl: string, itemId: string, extension = ".mp3"): string {
  const fileName = itemId.split("/").pop() ?? itemId;
  const dot = fileName.lastIndexOf(".");
  const base = dot > 0 ? fileName.slice(0, dot) : fileName;
  return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(base)}${extension}`;
}

export class MediaElementAudioClient implements AudioClient {
  private readonly element: MediaElementLike;
  private readonly resolveMediaUrl: (itemId: string) => string | null;
  private readonly onPlaybackBlocked: ((error: unknown) => void) | undefined;

  constructor(options: MediaClientOptions) {
    this.element = options.element;
    this.resolveMediaUrl = options.resolveMediaUrl;
    this.onPlaybackBlocked = options.onPlaybackBlocked;
    this.element.preservesPitch = true;
  }

  loadItem(itemId: string): void {
    const url = this.resolveMediaUrl(itemId);
    if (url === null) {
      console.warn(`[listener] no media for item=${itemId}`);
      this.element.pause();
      return;
    }

    console.log(`[listener] loading item=${itemId}`);
    this.element.src = url;
    this.element.playbackRate = 1;
    this.play();
  }

  hardSeek(targetMs: number): void {
    this.element.currentTime = Math.max(0, targetMs) / 1000;
    this.play();
  }

  setRate(rateFactor: number): void {
    this.element.preservesPitch = true;
    this.element.playbackRate = rateFactor;
  }

  stop(): void {
    this.element.pause();
    this.element.playbackRate = 1;
  }

  private play(): void {
    this.element.play().catch((error: unknown) => {
      console.warn("[listener] playback refused:", error);
      this.onPlaybackBlocked?.(error);
    });
  }
}
