/**
 * Command dispatch and admin API schemas.
 *
 * Commands are fire-and-forget: the controller answers success or failure and
 * never reports a position back.
 */

import { z } from "zod";

// ============================================================================
// Controller Commands
// ============================================================================

export const COMMAND_NAMES = {
  /** Accepts a playlist name or a sequence file name (".fseq") */
  START_PLAYLIST: "Start Playlist",
  STOP_NOW: "Stop Now",
} as const;

export const CommandRequestSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
});
export type CommandRequest = z.infer<typeof CommandRequestSchema>;

/** Sequence listing from the controller: bare names without extension */
export const SequenceListSchema = z.array(z.string());

/** Playlist listing; older firmware answers with an object keyed by index */
export const PlaylistListSchema = z.union([
  z.array(z.string()),
  z.record(z.string()).transform((byKey) => Object.values(byKey)),
]);

// ============================================================================
// Admin API (relay)
// ============================================================================

export const AdminGetSequencesRequestSchema = z.object({
  action: z.literal("get_sequences"),
});

export const AdminStartSequenceRequestSchema = z.object({
  action: z.literal("start_sequence"),
  /** Playlist or sequence file name */
  sequence: z.string().trim().min(1, "Nothing selected"),
});

export const AdminStopPlaybackRequestSchema = z.object({
  action: z.literal("stop_playback"),
});

export const AdminRequestSchema = z.discriminatedUnion("action", [
  AdminGetSequencesRequestSchema,
  AdminStartSequenceRequestSchema,
  AdminStopPlaybackRequestSchema,
]);
export type AdminRequest = z.infer<typeof AdminRequestSchema>;

export type AdminResponse =
  | { success: true; sequences: string[]; playlists: string[] }
  | { success: true }
  | { success: false; error: string };
