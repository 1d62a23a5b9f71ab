/**
 * Frame stream socket handlers.
 *
 * STREAM_SUBSCRIBE starts (or restarts) the socket's frame stream session,
 * STREAM_UNSUBSCRIBE and disconnect stop it.
 */

import type { Socket } from "socket.io";
import { SOCKET_EVENTS, validateStreamSubscribe, validateStreamUnsubscribe } from "@lumasync/shared";
import type { FrameStreamHub } from "../stream/hub.js";

type StreamSocket = Pick<Socket, "id" | "emit">;

/**
 * Handle STREAM_SUBSCRIBE.
 */
export async function handleStreamSubscribe(
  socket: StreamSocket,
  hub: FrameStreamHub,
  data: unknown
): Promise<void> {
  const parsed = validateStreamSubscribe(data);
  if (!parsed.success) {
    console.log(`[STREAM_SUBSCRIBE] validation failed socket=${socket.id}: ${parsed.error}`);
    socket.emit(SOCKET_EVENTS.ERROR, {
      type: "VALIDATION_ERROR",
      message: parsed.error,
    });
    return;
  }

  const { channels, fps } = parsed.data;
  await hub.subscribe(
    socket.id,
    (event) => {
      socket.emit(SOCKET_EVENTS.FRAME_STREAM, event);
    },
    { channels, fps }
  );
}

/**
 * Handle STREAM_UNSUBSCRIBE.
 */
export async function handleStreamUnsubscribe(
  socket: StreamSocket,
  hub: FrameStreamHub,
  data: unknown
): Promise<void> {
  const parsed = validateStreamUnsubscribe(data);
  if (!parsed.success) {
    console.log(`[STREAM_UNSUBSCRIBE] validation failed socket=${socket.id}: ${parsed.error}`);
    socket.emit(SOCKET_EVENTS.ERROR, {
      type: "VALIDATION_ERROR",
      message: parsed.error,
    });
    return;
  }

  await hub.unsubscribe(socket.id);
}

/**
 * Register frame stream handlers on a socket.
 */
export function registerStreamHandlers(socket: Socket, hub: FrameStreamHub): void {
  const logFailure = (error: unknown) => {
    console.error(`[frame-stream] handler failed socket=${socket.id}:`, error);
  };

  socket.on(SOCKET_EVENTS.STREAM_SUBSCRIBE, (data: unknown) => {
    handleStreamSubscribe(socket, hub, data).catch(logFailure);
  });

  socket.on(SOCKET_EVENTS.STREAM_UNSUBSCRIBE, (data: unknown) => {
    handleStreamUnsubscribe(socket, hub, data).catch(logFailure);
  });

  socket.on("disconnect", (reason: string) => {
    console.log(`[disconnect] socket=${socket.id} reason=${reason}`);
    hub.unsubscribe(socket.id).catch(logFailure);
  });
}
