/**
 * Socket.IO client for the relay's frame stream.
 * Subscribes on every (re)connect and passes on validated events in id order.
 */

import { io, type Socket } from "socket.io-client";
import {
  SOCKET_EVENTS,
  isNewerStreamEvent,
  validateFrameStreamEvent,
  type FrameStreamEvent,
  type StreamSubscribeEvent,
} from "@lumasync/shared";

/** Reconnection settings */
const RECONNECT_DELAY_MS = 1000;
const MAX_RECONNECT_ATTEMPTS = 10;

export type ConnectionStatus = "disconnected" | "connecting" | "connected";

export type FrameStreamListener = (event: FrameStreamEvent) => void;
export type StatusListener = (status: ConnectionStatus) => void;

export interface FrameStreamClientOptions {
  relayUrl: string;
  /** Bytes per frame to ask for */
  channels?: number;
  fps?: number;
}

export class FrameStreamClient {
  private readonly options: FrameStreamClientOptions;
  private socket: Socket | null = null;
  private status: ConnectionStatus = "disconnected";
  private lastId: number | null = null;

  private eventListeners = new Set<FrameStreamListener>();
  private statusListeners = new Set<StatusListener>();

  constructor(options: FrameStreamClientOptions) {
    this.options = options;
  }

  getStatus(): ConnectionStatus {
    return this.status;
  }

  /** Subscribe to stream events */
  onEvent(listener: FrameStreamListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  /** Subscribe to connection status changes */
  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  /** Connect to the relay and subscribe */
  connect(): void {
    if (this.socket) return;

    this.setStatus("connecting");
    this.socket = io(this.options.relayUrl, {
      reconnection: true,
      reconnectionDelay: RECONNECT_DELAY_MS,
      reconnectionAttempts: MAX_RECONNECT_ATTEMPTS,
      transports: ["websocket", "polling"],
    });
    this.registerSocketHandlers(this.socket);
  }

  /** Unsubscribe and disconnect */
  disconnect(): void {
    if (this.socket) {
      if (this.socket.connected) {
        this.socket.emit(SOCKET_EVENTS.STREAM_UNSUBSCRIBE, { type: "STREAM_UNSUBSCRIBE" });
      }
      this.socket.disconnect();
      this.socket = null;
    }
    this.lastId = null;
    this.setStatus("disconnected");
  }

  /**
   * Validate and dispatch one raw stream event.
   * Returns false when the event was dropped.
   */
  handleStreamEvent(raw: unknown): boolean {
    const result = validateFrameStreamEvent(raw);
    if (!result.success) {
      console.warn(`[listener] invalid stream event: ${result.error}`);
      return false;
    }

    const event = result.data;
    if (!isNewerStreamEvent(event, this.lastId)) {
      return false;
    }

    this.lastId = event.id;
    for (const listener of this.eventListeners) {
      listener(event);
    }
    return true;
  }

  /** Message for a subscription, with only the fields that are set */
  buildSubscribeRequest(): StreamSubscribeEvent {
    const request: StreamSubscribeEvent = { type: "STREAM_SUBSCRIBE" };
    if (this.options.channels !== undefined) request.channels = this.options.channels;
    if (this.options.fps !== undefined) request.fps = this.options.fps;
    return request;
  }

  private registerSocketHandlers(socket: Socket): void {
    socket.on("connect", () => {
      console.log("[listener] stream connected");
      // A new relay session numbers its events from zero again
      this.lastId = null;
      this.setStatus("connected");
      socket.emit(SOCKET_EVENTS.STREAM_SUBSCRIBE, this.buildSubscribeRequest());
    });

    socket.on("disconnect", (reason) => {
      console.log("[listener] stream disconnected:", reason);
      this.setStatus("disconnected");
    });

    socket.on("connect_error", (error) => {
      console.log("[listener] stream connect_error:", error.message);
      this.setStatus("disconnected");
    });

    socket.on(SOCKET_EVENTS.FRAME_STREAM, (raw: unknown) => {
      this.handleStreamEvent(raw);
    });

    socket.on(SOCKET_EVENTS.ERROR, (error: unknown) => {
      console.warn("[listener] relay error:", error);
    });
  }

  private setStatus(status: ConnectionStatus): void {
    if (this.status === status) return;
    this.status = status;
    for (const listener of this.statusListeners) {
      listener(status);
    }
  }
}
