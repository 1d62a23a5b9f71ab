/**
 * Frame stream sessions by socket, all reading one shared playback driver.
 *
 * The driver polls only while somebody listens: it starts with the first
 * session and stops with the last.
 */

import type { FrameStreamEvent } from "@lumasync/shared";
import type { PlaybackDriver } from "@lumasync/sync";
import { FrameStreamSession, type FrameStreamSessionOptions } from "./frameStream.js";

export interface SubscribeOptions {
  channels?: number;
  fps?: number;
}

export interface FrameStreamHubOptions {
  driver: Pick<PlaybackDriver, "start" | "stop" | "isRunning" | "getCell">;
  audioDir: string;
  defaultChannels: number;
  defaultFps: number;
  /** Overrides for every session, mainly for tests */
  session?: Pick<FrameStreamSessionOptions, "now" | "findCompanion" | "openFile">;
}

export class FrameStreamHub {
  private readonly options: FrameStreamHubOptions;
  private readonly sessions = new Map<string, FrameStreamSession>();

  constructor(options: FrameStreamHubOptions) {
    this.options = options;
  }

  /**
   * Start a session for a socket, replacing any it already has.
   * The swap happens before the first await, so overlapping subscribes
   * from one socket leave exactly one session running.
   */
  async subscribe(
    socketId: string,
    send: (event: FrameStreamEvent) => void,
    request: SubscribeOptions = {}
  ): Promise<FrameStreamSession> {
    const previous = this.sessions.get(socketId);

    const session = new FrameStreamSession({
      ...this.options.session,
      socketId,
      cell: this.options.driver.getCell(),
      audioDir: this.options.audioDir,
      channels: request.channels ?? this.options.defaultChannels,
      fps: request.fps ?? this.options.defaultFps,
      send,
    });
    this.sessions.set(socketId, session);

    if (!this.options.driver.isRunning()) {
      this.options.driver.start();
    }
    session.start();

    if (previous) {
      await previous.stop();
    }
    return session;
  }

  /** Stop a socket's session; a no-op when it has none */
  async unsubscribe(socketId: string): Promise<void> {
    const session = this.sessions.get(socketId);
    if (!session) return;

    this.sessions.delete(socketId);
    if (this.sessions.size === 0 && this.options.driver.isRunning()) {
      this.options.driver.stop();
    }
    await session.stop();
  }

  /** Socket ids with a running session (for testing/monitoring) */
  getActiveSessions(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Stop every session and the driver (for graceful shutdown) */
  async cleanupAll(): Promise<void> {
    const ids = this.getActiveSessions();
    await Promise.all(ids.map((id) => this.unsubscribe(id)));
    if (this.options.driver.isRunning()) {
      this.options.driver.stop();
    }
  }
}
