/**
 * Status schemas for the show controller and the normalised playback status.
 *
 * The controller is the authoritative clock. It reports its position in whole
 * seconds only, so every consumer downstream has to treat sub-second precision
 * as unavailable from this source.
 */

import { z } from "zod";

// ============================================================================
// Primitives
// ============================================================================

/** Identifier of the item the controller is playing (sequence or playlist name) */
export const ItemIdSchema = z.string().min(1);
export type ItemId = z.infer<typeof ItemIdSchema>;

/** Controller state code: 0 = idle, 1 = playing, 2 = stopping */
export const ControllerStateSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);
export type ControllerState = z.infer<typeof ControllerStateSchema>;

export const CONTROLLER_STATE = {
  IDLE: 0,
  PLAYING: 1,
  STOPPING: 2,
} as const;

// ============================================================================
// Controller Wire Format
// ============================================================================

/** current_playlist is a bare name on some firmware and an object on others */
export const PlaylistRefSchema = z.union([
  z.string(),
  z.object({ playlist: z.string() }).passthrough(),
]);
export type PlaylistRef = z.infer<typeof PlaylistRefSchema>;

/** Raw status response from the controller's status endpoint */
export const ControllerStatusSchema = z
  .object({
    status: z.coerce.number().pipe(ControllerStateSchema).default(0),
    current_sequence: z.string().default(""),
    current_playlist: PlaylistRefSchema.optional(),
    /** Whole seconds; some firmware sends it as a string */
    seconds_played: z.coerce.number().nonnegative().default(0),
  })
  .passthrough();
export type ControllerStatus = z.infer<typeof ControllerStatusSchema>;

// ============================================================================
// Normalised Status
// ============================================================================

/** Playback status as the sync core consumes it */
export const PlaybackStatusSchema = z.object({
  isPlaying: z.boolean(),
  /** Empty when nothing is playing */
  currentItemId: z.string(),
  elapsedSeconds: z.number().int().nonnegative(),
});
export type PlaybackStatus = z.infer<typeof PlaybackStatusSchema>;

/** Status as served by the relay's /api/status endpoint */
export const RelayStatusSchema = PlaybackStatusSchema.extend({
  /** Relay timestamp when the controller answered */
  serverTs: z.number(),
});
export type RelayStatus = z.infer<typeof RelayStatusSchema>;

/** One poll result, used transiently to update the drift model */
export const SyncSampleSchema = z.object({
  /** Local clock when the status request was sent (ms) */
  requestSentAt: z.number(),
  /** Local clock when the status response arrived (ms) */
  requestReceivedAt: z.number(),
  reportedElapsedSeconds: z.number().int().nonnegative(),
  currentItemId: ItemIdSchema,
});
export type SyncSample = z.infer<typeof SyncSampleSchema>;

/** The idle status, used whenever nothing is playing */
export function createIdleStatus(): PlaybackStatus {
  return { isPlaying: false, currentItemId: "", elapsedSeconds: 0 };
}

/**
 * Normalise a controller status response.
 *
 * "Stopping" still counts as playing: the controller finishes the current
 * item and keeps advancing seconds_played until it reaches idle.
 */
export function normalizeControllerStatus(raw: ControllerStatus): PlaybackStatus {
  const playlistName =
    typeof raw.current_playlist === "string"
      ? raw.current_playlist
      : (raw.current_playlist?.playlist ?? "");
  const currentItemId = raw.current_sequence || playlistName;

  if (raw.status === CONTROLLER_STATE.IDLE || currentItemId === "") {
    return createIdleStatus();
  }

  return {
    isPlaying: true,
    currentItemId,
    elapsedSeconds: Math.floor(raw.seconds_played),
  };
}
