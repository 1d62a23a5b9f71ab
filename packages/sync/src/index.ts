/**
 * @lumasync/sync
 *
 * Keeps a local audio clock locked to a remotely polled playback position.
 */

export { createDriftModel, ppmToRate, predictOffsetMs } from "./driftModel.js";
export type { DriftModel } from "./driftModel.js";

export {
  PositionSyncEstimator,
  DEFAULT_ESTIMATOR_CONFIG,
  estimateStatusInstant,
} from "./estimator.js";
export type { EstimatorConfig, CorrectionDecision } from "./estimator.js";

export { PositionCell, createIdleSnapshot } from "./positionCell.js";
export type { PositionSnapshot, SyncHealth } from "./positionCell.js";

export { PlaybackDriver, DEFAULT_DRIVER_CONFIG } from "./driver.js";
export type {
  StatusSource,
  AudioClient,
  DriverState,
  DriverConfig,
  DriverOptions,
} from "./driver.js";

export { StatusSourceError, describeError } from "./errors.js";
export type { StatusSourceErrorCode } from "./errors.js";
