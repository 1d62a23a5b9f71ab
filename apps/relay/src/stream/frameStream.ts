/**
 * Frame stream session for one subscriber.
 *
 * Every tick reads the shared position cell, maps the position to a record
 * of the item's companion file and sends that record. The session owns its
 * file handle; the cell is only read, so a slow status poll never holds up
 * a frame.
 */

import { basename } from "node:path";
import type { FrameStreamEvent, FrameStreamEventBody } from "@lumasync/shared";
import { describeError, type PositionCell } from "@lumasync/sync";
import { findCompanionFile, itemBaseName } from "../fseq/companion.js";
import { frameIndexForPosition } from "../fseq/header.js";
import { openFrameFile, type FrameFileHandle, type OpenFrameFileResult } from "../fseq/reader.js";

export interface FrameStreamSessionOptions {
  socketId: string;
  cell: Pick<PositionCell, "read" | "positionAt">;
  audioDir: string;
  /** Bytes forwarded per frame */
  channels: number;
  /** Ticks per second */
  fps: number;
  send: (event: FrameStreamEvent) => void;
  now?: () => number;
  findCompanion?: (audioDir: string, itemId: string) => Promise<string | null>;
  openFile?: (path: string) => Promise<OpenFrameFileResult>;
}

export class FrameStreamSession {
  readonly socketId: string;

  private readonly options: FrameStreamSessionOptions;
  private readonly now: () => number;
  private readonly findCompanion: (audioDir: string, itemId: string) => Promise<string | null>;
  private readonly openFile: (path: string) => Promise<OpenFrameFileResult>;

  private timer: ReturnType<typeof setInterval> | null = null;
  private busy = false;
  private nextId = 0;

  /** Item the handle belongs to; also set when the item has no companion */
  private currentItem: string | null = null;
  private handle: FrameFileHandle | null = null;

  constructor(options: FrameStreamSessionOptions) {
    this.options = options;
    this.socketId = options.socketId;
    this.now = options.now ?? (() => Date.now());
    this.findCompanion = options.findCompanion ?? findCompanionFile;
    this.openFile = options.openFile ?? openFrameFile;
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = Math.max(1, Math.floor(1000 / this.options.fps));
    this.timer = setInterval(() => {
      this.tick();
    }, intervalMs);
    console.log(
      `[frame-stream] started socket=${this.socketId} fps=${this.options.fps} channels=${this.options.channels}`
    );
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log(`[frame-stream] stopped socket=${this.socketId}`);
    }
    this.currentItem = null;
    await this.closeHandle();
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Run one tick unless the previous one is still reading */
  tick(): void {
    if (this.busy) return;
    this.busy = true;
    this.step()
      .catch((error: unknown) => {
        console.error(`[frame-stream] tick failed socket=${this.socketId}:`, error);
        this.emit({ type: "ERROR", payload: { message: describeError(error) } });
      })
      .finally(() => {
        this.busy = false;
      });
  }

  /** One tick: at most one event */
  async step(): Promise<void> {
    const snapshot = this.options.cell.read();

    if (!snapshot.playing || snapshot.itemId === null) {
      this.currentItem = null;
      await this.closeHandle();
      this.emit({ type: "IDLE" });
      return;
    }

    if (snapshot.itemId !== this.currentItem) {
      await this.openItem(snapshot.itemId);
      return;
    }

    const handle = this.handle;
    if (!handle) return;

    if (snapshot.sync === "lost") {
      this.emit({ type: "ERROR", payload: { message: "Controller unreachable" } });
      return;
    }

    const positionMs = this.options.cell.positionAt(this.now());
    if (positionMs === null) return;

    const result = await handle.read(frameIndexForPosition(positionMs, handle.header));
    if (result.kind === "end_of_data") return;

    const length = Math.min(this.options.channels, handle.header.recordSizeBytes);
    this.emit({
      type: "FRAME",
      payload: { data: result.data.subarray(0, length).toString("base64") },
    });
  }

  private async openItem(itemId: string): Promise<void> {
    await this.closeHandle();
    this.currentItem = itemId;
    const file = itemBaseName(itemId);

    const path = await this.findCompanion(this.options.audioDir, itemId);
    if (path === null) {
      console.log(`[frame-stream] no companion for item=${itemId}`);
      this.emit({
        type: "NO_DATA",
        payload: {
          file,
          message: `No audio frame file for: ${file}`,
          hint: `Create ${file}_Audio.fseq in ${this.options.audioDir}`,
        },
      });
      return;
    }

    const opened = await this.openFile(path);
    if (!opened.success) {
      console.warn(`[frame-stream] cannot use ${path}: ${opened.error.message}`);
      this.emit({
        type: "ERROR",
        payload: { message: `Unreadable frame file ${basename(path)}: ${opened.error.message}` },
      });
      return;
    }

    // Item may have changed or the session stopped while the file opened
    if (this.currentItem !== itemId) {
      await opened.handle.close();
      return;
    }

    this.handle = opened.handle;
    const { header } = opened.handle;
    console.log(
      `[frame-stream] opened ${path} records=${header.recordCount} size=${header.recordSizeBytes}`
    );
    this.emit({
      type: "SEQ_OPEN",
      payload: {
        file,
        audioFile: basename(path),
        channels: header.recordSizeBytes,
        frames: header.recordCount,
        frameDurationMs: header.frameDurationMs,
      },
    });
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    await handle.close();
  }

  private emit(body: FrameStreamEventBody): void {
    const event: FrameStreamEvent = { ...body, id: this.nextId++ };
    this.options.send(event);
  }
}
