/**
 * Position Sync Estimator
 *
 * Keeps an estimate of the controller's playback position from polled,
 * whole-second status values and decides how the audio client should be
 * corrected after every poll.
 *
 * Correction strategies:
 * - Large error (>= 1000ms) past the cooldown: hard seek to the reported position
 * - Anything else: proportional playback-rate nudge, clamped to ±2%
 * - Inside the deadband (< 500ms): rate stays at 1.0, since whole-second
 *   reporting makes errors of that size expected noise
 *
 * Rate decisions below the hard seek threshold act on the median of the
 * last few errors, so the sawtooth left by whole-second rounding never
 * reaches the audio client.
 *
 * Drift is measured between second tick-overs: the poll that first sees a
 * new second brackets the instant the controller crossed it. The implied
 * rate over a baseline of tick-overs is median filtered, then blended in
 * with an EWMA.
 */

import { SYNC_DEFAULTS, type SyncSample } from "@lumasync/shared";
import { createDriftModel, predictOffsetMs, type DriftModel } from "./driftModel.js";

// ============================================================================
// Configuration
// ============================================================================

export interface EstimatorConfig {
  /** Error at which a hard seek is considered (ms) */
  hardSeekThresholdMs: number;
  /** Minimum time between hard seeks (ms) */
  hardSeekCooldownMs: number;
  /** Errors below this never change the playback rate (ms) */
  deadbandMs: number;
  /** Maximum rate deviation from 1.0 */
  maxRateAdjust: number;
  /** Rate deviation per ms of error */
  rateGainPerMs: number;
  /** Smallest rate change worth sending to the client */
  minRateStepDelta: number;
  /** EWMA weight of a new drift observation */
  driftSmoothing: number;
  /** Weight of the observed offset when blending with the prediction */
  offsetBlend: number;
  /** Drift is only inferred over baselines at least this long (ms) */
  minDriftBaselineMs: number;
  /** Clamp for a single implied drift observation */
  maxDriftPpm: number;
  /** Samples in the error and drift median filters */
  filterWindowSize: number;
}

export const DEFAULT_ESTIMATOR_CONFIG: EstimatorConfig = {
  hardSeekThresholdMs: SYNC_DEFAULTS.HARD_SEEK_THRESHOLD_MS,
  hardSeekCooldownMs: SYNC_DEFAULTS.HARD_SEEK_COOLDOWN_MS,
  deadbandMs: SYNC_DEFAULTS.DEADBAND_MS,
  maxRateAdjust: SYNC_DEFAULTS.MAX_RATE_ADJUST,
  rateGainPerMs: 0.00002,
  minRateStepDelta: 0.001,
  driftSmoothing: 0.1,
  offsetBlend: 0.1,
  minDriftBaselineMs: 30_000,
  maxDriftPpm: 1000,
  filterWindowSize: 5,
};

// ============================================================================
// Decisions
// ============================================================================

export type CorrectionDecision =
  | {
      type: "hard_seek";
      /** Position the client must jump to (ms) */
      targetMs: number;
      errorMs: number;
      reason: "initial" | "error_exceeded";
    }
  | {
      type: "soft_rate";
      /** New playback rate multiplier */
      rateFactor: number;
      errorMs: number;
    }
  | {
      type: "none";
      errorMs: number;
      reason: "deadband" | "rate_unchanged" | "filling_window" | "stale_sample";
    };

/** Estimated local instant at which the reported position was valid */
export function estimateStatusInstant(sample: SyncSample): number {
  return sample.requestSentAt + (sample.requestReceivedAt - sample.requestSentAt) / 2;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

/** Append to a bounded history, dropping the oldest entries */
function pushBounded(history: number[], value: number, size: number): void {
  history.push(value);
  while (history.length > size) {
    history.shift();
  }
}

// ============================================================================
// Estimator
// ============================================================================

export class PositionSyncEstimator {
  private readonly config: EstimatorConfig;

  private model: DriftModel = createDriftModel();

  /** Rate most recently handed to the audio client */
  private currentRate = 1.0;

  constructor(config: Partial<EstimatorConfig> = {}) {
    this.config = { ...DEFAULT_ESTIMATOR_CONFIG, ...config };
  }

  /**
   * Process one poll result and decide on a correction.
   * An item change inside the sample resets the model first.
   */
  onPoll(sample: SyncSample): CorrectionDecision {
    if (this.model.itemId !== sample.currentItemId) {
      this.onItemChanged(sample.currentItemId);
    }

    const model = this.model;
    const statusAt = estimateStatusInstant(sample);
    const observedMs = sample.reportedElapsedSeconds * 1000;

    // First sample for this item: align the client once
    if (model.lastSampleAt === null) {
      model.estimatedOffsetMs = observedMs;
      model.lastSampleAt = statusAt;
      model.lastReportedSeconds = sample.reportedElapsedSeconds;
      model.lastReportedAt = statusAt;
      model.lastHardSeekAt = sample.requestReceivedAt;
      model.sampleCount = 1;
      this.currentRate = 1.0;
      return { type: "hard_seek", targetMs: observedMs, errorMs: 0, reason: "initial" };
    }

    if (statusAt <= model.lastSampleAt) {
      return { type: "none", errorMs: 0, reason: "stale_sample" };
    }

    const predictedMs = predictOffsetMs(model, statusAt) ?? observedMs;
    const errorMs = observedMs - predictedMs;
    const absErrorMs = Math.abs(errorMs);
    const now = sample.requestReceivedAt;

    const cooldownElapsed =
      model.lastHardSeekAt === null ||
      now - model.lastHardSeekAt >= this.config.hardSeekCooldownMs;

    if (absErrorMs >= this.config.hardSeekThresholdMs && cooldownElapsed) {
      // Drift is not inferred across a seek; start a new baseline here
      model.estimatedOffsetMs = observedMs;
      model.lastSampleAt = statusAt;
      model.lastReportedSeconds = sample.reportedElapsedSeconds;
      model.lastReportedAt = statusAt;
      model.edgeAnchorAt = null;
      model.errorHistory = [];
      model.lastHardSeekAt = now;
      model.sampleCount++;
      this.currentRate = 1.0;

      console.log(
        `[estimator] hard seek item=${sample.currentItemId} error=${errorMs.toFixed(0)}ms target=${observedMs}ms`
      );

      return { type: "hard_seek", targetMs: observedMs, errorMs, reason: "error_exceeded" };
    }

    this.updateDrift(statusAt, sample.reportedElapsedSeconds);
    model.estimatedOffsetMs = predictedMs + this.config.offsetBlend * errorMs;
    model.lastSampleAt = statusAt;
    model.sampleCount++;
    pushBounded(model.errorHistory, errorMs, this.config.filterWindowSize);

    return this.decideRate(errorMs);
  }

  /** Reset the model for a new item */
  onItemChanged(itemId: string | null = null): void {
    if (this.model.itemId !== null && itemId !== null) {
      console.log(`[estimator] item changed ${this.model.itemId} -> ${itemId}, model reset`);
    }
    this.model = createDriftModel(itemId);
    this.currentRate = 1.0;
  }

  /** Reset the model when playback goes idle */
  onIdle(): void {
    this.model = createDriftModel();
    this.currentRate = 1.0;
  }

  /** Snapshot of the drift model */
  getModel(): DriftModel {
    return {
      ...this.model,
      errorHistory: [...this.model.errorHistory],
      driftHistory: [...this.model.driftHistory],
    };
  }

  /** Rate most recently issued to the audio client */
  getCurrentRate(): number {
    return this.currentRate;
  }

  /** Estimated controller position at a local instant, or null before the first sample */
  positionAt(at: number): number | null {
    return predictOffsetMs(this.model, at);
  }

  /** Record a second tick-over and blend the rate it implies into the drift estimate */
  private updateDrift(statusAt: number, reportedSeconds: number): void {
    const model = this.model;
    const previousSeconds = model.lastReportedSeconds;
    const previousAt = model.lastReportedAt;
    model.lastReportedSeconds = reportedSeconds;
    model.lastReportedAt = statusAt;

    if (previousSeconds === null || previousAt === null) return;
    if (reportedSeconds === previousSeconds) return;
    if (reportedSeconds !== previousSeconds + 1) {
      // Jumped; positions on either side share no baseline
      model.edgeAnchorAt = null;
      return;
    }

    const edgeAt = previousAt + (statusAt - previousAt) / 2;
    const edgeMs = reportedSeconds * 1000;
    if (model.edgeAnchorAt === null) {
      model.edgeAnchorAt = edgeAt;
      model.edgeAnchorMs = edgeMs;
      return;
    }

    const baselineMs = edgeAt - model.edgeAnchorAt;
    if (baselineMs < this.config.minDriftBaselineMs) return;

    const impliedRate = (edgeMs - model.edgeAnchorMs) / baselineMs;
    const impliedPpm = clamp(
      (impliedRate - 1) * 1e6,
      -this.config.maxDriftPpm,
      this.config.maxDriftPpm
    );
    pushBounded(model.driftHistory, impliedPpm, this.config.filterWindowSize);

    const alpha = this.config.driftSmoothing;
    model.estimatedDriftRatePpm =
      (1 - alpha) * model.estimatedDriftRatePpm + alpha * median(model.driftHistory);
  }

  /** Proportional rate decision with deadband and step debounce */
  private decideRate(errorMs: number): CorrectionDecision {
    const { deadbandMs, maxRateAdjust, rateGainPerMs, minRateStepDelta } = this.config;
    const history = this.model.errorHistory;

    // Errors past the seek threshold (held back by the cooldown) act at once
    const bypassFilter = Math.abs(errorMs) >= this.config.hardSeekThresholdMs;
    const filling = !bypassFilter && history.length < this.config.filterWindowSize;
    const signalMs = bypassFilter ? errorMs : filling ? 0 : median(history);

    const targetRate =
      Math.abs(signalMs) < deadbandMs
        ? 1.0
        : 1.0 + clamp(signalMs * rateGainPerMs, -maxRateAdjust, maxRateAdjust);

    const returningToNormal = targetRate === 1.0 && this.currentRate !== 1.0;
    if (!returningToNormal && Math.abs(targetRate - this.currentRate) < minRateStepDelta) {
      return {
        type: "none",
        errorMs,
        reason: filling ? "filling_window" : targetRate === 1.0 ? "deadband" : "rate_unchanged",
      };
    }

    this.currentRate = targetRate;
    return { type: "soft_rate", rateFactor: targetRate, errorMs };
  }
}
