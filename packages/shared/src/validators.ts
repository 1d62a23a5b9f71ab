/**
 * Validation utilities for the LumaSync wire formats.
 *
 * These validators wrap zod schemas with:
 * - Type-safe parsing with readable errors
 * - Normalisation of the controller's status response
 * - Frame stream ordering checks
 */

import { z } from "zod";
import {
  AdminRequestSchema,
  PlaylistListSchema,
  SequenceListSchema,
  type AdminRequest,
} from "./commands.js";
import {
  CorrectionEventSchema,
  FrameStreamEventSchema,
  StreamSubscribeEventSchema,
  StreamUnsubscribeEventSchema,
  type CorrectionEvent,
  type FrameStreamEvent,
  type StreamSubscribeEvent,
  type StreamUnsubscribeEvent,
} from "./events.js";
import {
  ControllerStatusSchema,
  RelayStatusSchema,
  normalizeControllerStatus,
  type PlaybackStatus,
  type RelayStatus,
} from "./status.js";

// ============================================================================
// Result Type
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

function fromSafeParse<T>(
  result: { success: true; data: T } | { success: false; error: z.ZodError }
): ValidationResult<T> {
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

// ============================================================================
// Status Validation
// ============================================================================

/** Validate and normalise a raw controller status response */
export function validateControllerStatus(raw: unknown): ValidationResult<PlaybackStatus> {
  const result = ControllerStatusSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: normalizeControllerStatus(result.data) };
}

/** Validate a status served by the relay */
export function validateRelayStatus(raw: unknown): ValidationResult<RelayStatus> {
  return fromSafeParse(RelayStatusSchema.safeParse(raw));
}

/** Validate the controller's sequence listing, appending the file extension */
export function validateSequenceList(raw: unknown): ValidationResult<string[]> {
  const result = SequenceListSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data.map((name) => toSequenceFileName(name)) };
}

/** Validate the controller's playlist listing */
export function validatePlaylistList(raw: unknown): ValidationResult<string[]> {
  return fromSafeParse(PlaylistListSchema.safeParse(raw));
}

// ============================================================================
// Event Validation
// ============================================================================

/** Validate a correction event */
export function validateCorrectionEvent(event: unknown): ValidationResult<CorrectionEvent> {
  return fromSafeParse(CorrectionEventSchema.safeParse(event));
}

/** Validate a frame stream event */
export function validateFrameStreamEvent(event: unknown): ValidationResult<FrameStreamEvent> {
  return fromSafeParse(FrameStreamEventSchema.safeParse(event));
}

/** Validate a stream subscription request */
export function validateStreamSubscribe(event: unknown): ValidationResult<StreamSubscribeEvent> {
  return fromSafeParse(StreamSubscribeEventSchema.safeParse(event));
}

export function validateStreamUnsubscribe(event: unknown): ValidationResult<StreamUnsubscribeEvent> {
  return fromSafeParse(StreamUnsubscribeEventSchema.safeParse(event));
}

/** Validate an admin API request body */
export function validateAdminRequest(body: unknown): ValidationResult<AdminRequest> {
  return fromSafeParse(AdminRequestSchema.safeParse(body));
}

// ============================================================================
// Helpers
// ============================================================================

/** Format a zod error into a readable string */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join(".");
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join("; ");
}

/** Sequence names are listed bare but started with their extension */
export function toSequenceFileName(name: string): string {
  return name.toLowerCase().endsWith(".fseq") ? name : `${name}.fseq`;
}

/** Check an event id continues a stream whose last accepted id is lastId */
export function isNewerStreamEvent(event: FrameStreamEvent, lastId: number | null): boolean {
  return lastId === null || event.id > lastId;
}

/** Type guard for correction events that move the audio client */
export function isPlaybackCorrection(
  event: CorrectionEvent
): event is Extract<CorrectionEvent, { type: "HARD_SEEK" | "SOFT_RATE" }> {
  return event.type === "HARD_SEEK" || event.type === "SOFT_RATE";
}
