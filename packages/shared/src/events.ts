/**
 * Event schemas for the LumaSync correction channel and frame stream.
 *
 * Correction events flow from the sync driver to the audio client:
 * 1. HARD_SEEK jumps the client to the controller's position
 * 2. SOFT_RATE nudges the client's playback rate
 * 3. IDLE / SOURCE_UNREACHABLE / LOST_SYNC / SYNC_RESTORED are UI signals
 *
 * Frame stream events flow from the relay to listeners over socket.io, one per
 * cadence tick, each carrying a strictly increasing id.
 */

import { z } from "zod";
import { ItemIdSchema } from "./status.js";

// ============================================================================
// Correction Channel
// ============================================================================

export const ItemStartedEventSchema = z.object({
  type: z.literal("ITEM_STARTED"),
  itemId: ItemIdSchema,
});
export type ItemStartedEvent = z.infer<typeof ItemStartedEventSchema>;

export const HardSeekEventSchema = z.object({
  type: z.literal("HARD_SEEK"),
  itemId: ItemIdSchema,
  /** Position to jump to (ms into the item) */
  targetMs: z.number().nonnegative(),
  /** Residual that triggered the seek */
  errorMs: z.number(),
});
export type HardSeekEvent = z.infer<typeof HardSeekEventSchema>;

export const SoftRateEventSchema = z.object({
  type: z.literal("SOFT_RATE"),
  itemId: ItemIdSchema,
  /** Playback rate multiplier (1.0 = normal) */
  rateFactor: z.number().positive(),
  errorMs: z.number(),
});
export type SoftRateEvent = z.infer<typeof SoftRateEventSchema>;

export const IdleEventSchema = z.object({
  type: z.literal("IDLE"),
});
export type IdleEvent = z.infer<typeof IdleEventSchema>;

export const SourceUnreachableEventSchema = z.object({
  type: z.literal("SOURCE_UNREACHABLE"),
  consecutiveFailures: z.number().int().positive(),
  message: z.string(),
});
export type SourceUnreachableEvent = z.infer<typeof SourceUnreachableEventSchema>;

export const LostSyncEventSchema = z.object({
  type: z.literal("LOST_SYNC"),
  consecutiveFailures: z.number().int().positive(),
});
export type LostSyncEvent = z.infer<typeof LostSyncEventSchema>;

export const SyncRestoredEventSchema = z.object({
  type: z.literal("SYNC_RESTORED"),
});
export type SyncRestoredEvent = z.infer<typeof SyncRestoredEventSchema>;

export const CorrectionEventSchema = z.discriminatedUnion("type", [
  ItemStartedEventSchema,
  HardSeekEventSchema,
  SoftRateEventSchema,
  IdleEventSchema,
  SourceUnreachableEventSchema,
  LostSyncEventSchema,
  SyncRestoredEventSchema,
]);
export type CorrectionEvent = z.infer<typeof CorrectionEventSchema>;

// ============================================================================
// Frame Stream (relay → listener)
// ============================================================================

const FrameStreamMetaSchema = z.object({
  /** Strictly increasing per stream */
  id: z.number().int().nonnegative(),
});

export const SeqOpenPayloadSchema = z.object({
  /** Item base name */
  file: z.string(),
  /** Companion file that was opened */
  audioFile: z.string(),
  channels: z.number().int().positive(),
  frames: z.number().int().nonnegative(),
  frameDurationMs: z.number().int().positive(),
});
export type SeqOpenPayload = z.infer<typeof SeqOpenPayloadSchema>;

export const SeqOpenEventSchema = FrameStreamMetaSchema.extend({
  type: z.literal("SEQ_OPEN"),
  payload: SeqOpenPayloadSchema,
});
export type SeqOpenEvent = z.infer<typeof SeqOpenEventSchema>;

export const FrameEventSchema = FrameStreamMetaSchema.extend({
  type: z.literal("FRAME"),
  payload: z.object({
    /** Base64 of the record bytes */
    data: z.string(),
  }),
});
export type FrameEvent = z.infer<typeof FrameEventSchema>;

export const NoDataEventSchema = FrameStreamMetaSchema.extend({
  type: z.literal("NO_DATA"),
  payload: z.object({
    file: z.string(),
    message: z.string(),
    hint: z.string(),
  }),
});
export type NoDataEvent = z.infer<typeof NoDataEventSchema>;

export const StreamIdleEventSchema = FrameStreamMetaSchema.extend({
  type: z.literal("IDLE"),
});
export type StreamIdleEvent = z.infer<typeof StreamIdleEventSchema>;

export const StreamErrorEventSchema = FrameStreamMetaSchema.extend({
  type: z.literal("ERROR"),
  payload: z.object({
    message: z.string(),
  }),
});
export type StreamErrorEvent = z.infer<typeof StreamErrorEventSchema>;

export const FrameStreamEventSchema = z.discriminatedUnion("type", [
  SeqOpenEventSchema,
  FrameEventSchema,
  NoDataEventSchema,
  StreamIdleEventSchema,
  StreamErrorEventSchema,
]);
export type FrameStreamEvent = z.infer<typeof FrameStreamEventSchema>;

type WithoutId<E> = E extends unknown ? Omit<E, "id"> : never;

/** A frame stream event before the stream assigns its id */
export type FrameStreamEventBody = WithoutId<FrameStreamEvent>;

// ============================================================================
// Client → Relay Requests
// ============================================================================

export const StreamSubscribeEventSchema = z.object({
  type: z.literal("STREAM_SUBSCRIBE"),
  /** Truncate frames to this many bytes */
  channels: z.number().int().positive().max(1_000_000).optional(),
  /** Frame events per second */
  fps: z.number().int().min(1).max(100).optional(),
});
export type StreamSubscribeEvent = z.infer<typeof StreamSubscribeEventSchema>;

export const StreamUnsubscribeEventSchema = z.object({
  type: z.literal("STREAM_UNSUBSCRIBE"),
});
export type StreamUnsubscribeEvent = z.infer<typeof StreamUnsubscribeEventSchema>;

// ============================================================================
// Event Type Constants
// ============================================================================

/** socket.io event names */
export const SOCKET_EVENTS = {
  FRAME_STREAM: "FRAME_STREAM",
  STREAM_SUBSCRIBE: "STREAM_SUBSCRIBE",
  STREAM_UNSUBSCRIBE: "STREAM_UNSUBSCRIBE",
  ERROR: "ERROR",
} as const;
