/**
 * @lumasync/shared
 *
 * Shared types, schemas, and constants for LumaSync.
 * This package is the single source of truth for every wire format.
 */

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

/** Loop cadences */
export const CADENCE = {
  /** Status poll interval while playing */
  STATUS_POLL_MS: 250,
  /** A slow poll must not stall the loop past one cycle */
  STATUS_TIMEOUT_MS: 500,
  /** Frame stream events per second */
  FRAME_RATE: 40,
} as const;

/** Default correction tunables */
export const SYNC_DEFAULTS = {
  HARD_SEEK_THRESHOLD_MS: 1000,
  HARD_SEEK_COOLDOWN_MS: 2000,
  /** Errors below this are second-granularity noise */
  DEADBAND_MS: 500,
  /** ±2% playback rate */
  MAX_RATE_ADJUST: 0.02,
  /** Consecutive failed polls before sync is reported lost */
  LOST_SYNC_FAILURES: 3,
} as const;

/** Companion frame file layout */
export const FRAME_FILE = {
  MAGIC: "PSEQ",
  FIXED_HEADER_BYTES: 32,
  /** Version 1 files end the fixed header four bytes earlier */
  V1_FIXED_HEADER_BYTES: 28,
  /** Bytes forwarded per frame when the listener does not ask */
  DEFAULT_CHANNELS: 2206,
  /** Directory the relay looks in for companion files */
  DEFAULT_DIR: "/home/fpp/media/audio-fseq",
} as const;

/** Per-frame PCM layout inside a companion record */
export const PCM_FRAME = {
  SYNC_MARKER: [0xaa, 0x55],
  BYTES_PER_SAMPLE: 2,
  SAMPLE_RATE: 44100,
} as const;

// ============================================================================
// Status Exports
// ============================================================================

export {
  ItemIdSchema,
  ControllerStateSchema,
  PlaylistRefSchema,
  ControllerStatusSchema,
  PlaybackStatusSchema,
  RelayStatusSchema,
  SyncSampleSchema,
  CONTROLLER_STATE,
  createIdleStatus,
  normalizeControllerStatus,
} from "./status.js";

export type {
  ItemId,
  ControllerState,
  PlaylistRef,
  ControllerStatus,
  PlaybackStatus,
  RelayStatus,
  SyncSample,
} from "./status.js";

// ============================================================================
// Command Exports
// ============================================================================

export {
  COMMAND_NAMES,
  CommandRequestSchema,
  SequenceListSchema,
  PlaylistListSchema,
  AdminGetSequencesRequestSchema,
  AdminStartSequenceRequestSchema,
  AdminStopPlaybackRequestSchema,
  AdminRequestSchema,
} from "./commands.js";

export type { CommandRequest, AdminRequest, AdminResponse } from "./commands.js";

// ============================================================================
// Event Exports
// ============================================================================

export {
  // Correction channel
  ItemStartedEventSchema,
  HardSeekEventSchema,
  SoftRateEventSchema,
  IdleEventSchema,
  SourceUnreachableEventSchema,
  LostSyncEventSchema,
  SyncRestoredEventSchema,
  CorrectionEventSchema,
  // Frame stream
  SeqOpenPayloadSchema,
  SeqOpenEventSchema,
  FrameEventSchema,
  NoDataEventSchema,
  StreamIdleEventSchema,
  StreamErrorEventSchema,
  FrameStreamEventSchema,
  // Requests
  StreamSubscribeEventSchema,
  StreamUnsubscribeEventSchema,
  // Constants
  SOCKET_EVENTS,
} from "./events.js";

export type {
  ItemStartedEvent,
  HardSeekEvent,
  SoftRateEvent,
  IdleEvent,
  SourceUnreachableEvent,
  LostSyncEvent,
  SyncRestoredEvent,
  CorrectionEvent,
  SeqOpenPayload,
  SeqOpenEvent,
  FrameEvent,
  NoDataEvent,
  StreamIdleEvent,
  StreamErrorEvent,
  FrameStreamEvent,
  FrameStreamEventBody,
  StreamSubscribeEvent,
  StreamUnsubscribeEvent,
} from "./events.js";

// ============================================================================
// Validator Exports
// ============================================================================

export {
  validateControllerStatus,
  validateRelayStatus,
  validateSequenceList,
  validatePlaylistList,
  validateCorrectionEvent,
  validateFrameStreamEvent,
  validateStreamSubscribe,
  validateStreamUnsubscribe,
  validateAdminRequest,
  formatZodError,
  toSequenceFileName,
  isNewerStreamEvent,
  isPlaybackCorrection,
} from "./validators.js";

export type { ValidationResult } from "./validators.js";
