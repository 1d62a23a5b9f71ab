/**
 * Listen session: the glue between a page and one of the two playback paths.
 *
 * - media: the playback driver polls the relay and steers an <audio> element
 * - frames: PCM frames from the relay's stream are decoded and scheduled
 *
 * Either way the page sees one status for its UI.
 */

import type { FrameStreamEvent } from "@lumasync/shared";
import {
  PlaybackDriver,
  type AudioClient,
  type DriverConfig,
  type PositionSnapshot,
  type StatusSource,
} from "@lumasync/sync";
import { base64ToBytes, decodePcmFrame } from "./audio/pcm.js";
import { FramePlayer, type PcmAudioContext } from "./audio/framePlayer.js";
import {
  MediaElementAudioClient,
  type MediaElementLike,
} from "./audio/mediaClient.js";
import { HttpStatusSource } from "./realtime/statusSource.js";
import { FrameStreamClient, type FrameStreamListener } from "./realtime/frameStreamClient.js";

export type ListenStatus = "idle" | "playing" | "unreachable" | "lost" | "no_data";

type ListenStatusListener = (status: ListenStatus) => void;

/** What the frames path needs from a stream client */
export interface FrameStreamSource {
  connect(): void;
  disconnect(): void;
  onEvent(listener: FrameStreamListener): () => void;
}

export type ListenSessionOptions =
  | {
      mode: "media";
      source: StatusSource;
      audio: AudioClient;
      driverConfig?: Partial<DriverConfig>;
      now?: () => number;
    }
  | {
      mode: "frames";
      stream: FrameStreamSource;
      player: Pick<FramePlayer, "schedule" | "reset">;
    };

const STATUS_BY_HEALTH: Record<PositionSnapshot["sync"], ListenStatus> = {
  idle: "idle",
  synced: "playing",
  unreachable: "unreachable",
  lost: "lost",
};

export class ListenSession {
  private readonly options: ListenSessionOptions;
  private readonly driver: PlaybackDriver | null;

  private status: ListenStatus = "idle";
  private running = false;
  private detach: (() => void) | null = null;
  private listeners = new Set<ListenStatusListener>();

  constructor(options: ListenSessionOptions) {
    this.options = options;
    this.driver =
      options.mode === "media"
        ? new PlaybackDriver({
            source: options.source,
            audio: options.audio,
            config: options.driverConfig,
            now: options.now,
          })
        : null;
  }

  getStatus(): ListenStatus {
    return this.status;
  }

  /** Driver of the media path, for position displays */
  getDriver(): PlaybackDriver | null {
    return this.driver;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Subscribe to status changes */
  onStatusChange(listener: ListenStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`[listener] session started mode=${this.options.mode}`);

    if (this.driver) {
      this.detach = this.driver.getCell().subscribe((snapshot) => {
        this.setStatus(STATUS_BY_HEALTH[snapshot.sync]);
      });
      this.driver.start();
      return;
    }

    if (this.options.mode === "frames") {
      this.detach = this.options.stream.onEvent((event) => {
        this.handleStreamEvent(event);
      });
      this.options.stream.connect();
    }
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    this.detach?.();
    this.detach = null;

    if (this.driver) {
      this.driver.stop();
    } else if (this.options.mode === "frames") {
      this.options.stream.disconnect();
      this.options.player.reset();
    }

    this.setStatus("idle");
    console.log("[listener] session stopped");
  }

  private handleStreamEvent(event: FrameStreamEvent): void {
    if (this.options.mode !== "frames") return;
    const { player } = this.options;

    switch (event.type) {
      case "SEQ_OPEN":
        console.log(`[listener] stream opened item=${event.payload.file}`);
        player.reset();
        this.setStatus("playing");
        break;
      case "FRAME": {
        const samples = decodePcmFrame(base64ToBytes(event.payload.data));
        if (samples === null) return;
        player.schedule(samples);
        this.setStatus("playing");
        break;
      }
      case "NO_DATA":
        console.log(`[listener] no audio for item=${event.payload.file}`);
        player.reset();
        this.setStatus("no_data");
        break;
      case "IDLE":
        player.reset();
        this.setStatus("idle");
        break;
      case "ERROR":
        console.warn(`[listener] stream error: ${event.payload.message}`);
        player.reset();
        this.setStatus("lost");
        break;
    }
  }

  private setStatus(status: ListenStatus): void {
    if (this.status === status) return;
    this.status = status;
    for (const listener of this.listeners) {
      listener(status);
    }
  }
}

// ============================================================================
// Factories
// ============================================================================

export interface MediaSessionConfig {
  relayUrl: string;
  element: MediaElementLike;
  resolveMediaUrl: (itemId: string) => string | null;
  onPlaybackBlocked?: (error: unknown) => void;
  driverConfig?: Partial<DriverConfig>;
}

/** Listen by steering a media element from the relay's status */
export function createMediaSession(config: MediaSessionConfig): ListenSession {
  return new ListenSession({
    mode: "media",
    source: new HttpStatusSource(config.relayUrl),
    audio: new MediaElementAudioClient({
      element: config.element,
      resolveMediaUrl: config.resolveMediaUrl,
      onPlaybackBlocked: config.onPlaybackBlocked,
    }),
    driverConfig: config.driverConfig,
  });
}

export interface FramesSessionConfig {
  relayUrl: string;
  audioContext: PcmAudioContext;
  channels?: number;
  fps?: number;
}

/** Listen to the PCM frames the relay streams */
export function createFramesSession(config: FramesSessionConfig): ListenSession {
  return new ListenSession({
    mode: "frames",
    stream: new FrameStreamClient({
      relayUrl: config.relayUrl,
      channels: config.channels,
      fps: config.fps,
    }),
    player: new FramePlayer(config.audioContext),
  });
}
