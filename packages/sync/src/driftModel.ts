/**
 * Drift model state for one playing item.
 *
 * Owned by the estimator and reset whenever a new item starts or playback
 * leaves idle, so nothing learned about one item leaks into the next.
 */

export interface DriftModel {
  /** Item this model was built for (null until the first sample) */
  itemId: string | null;
  /** Believed true elapsed time at lastSampleAt (ms) */
  estimatedOffsetMs: number;
  /** Signed rate of the controller's time base against the local clock */
  estimatedDriftRatePpm: number;
  /** Local time of the last hard seek, including the initial alignment */
  lastHardSeekAt: number | null;
  /** Samples accepted since the last reset */
  sampleCount: number;
  /** Status instant of the last accepted sample */
  lastSampleAt: number | null;
  /** Whole seconds reported by the last accepted sample */
  lastReportedSeconds: number | null;
  /** Status instant at which lastReportedSeconds was seen */
  lastReportedAt: number | null;
  /**
   * First second tick-over seen since the last reset or hard seek.
   * A tick-over pins the controller to an exact whole second, so drift is
   * measured between tick-overs and never between rounded samples.
   */
  edgeAnchorAt: number | null;
  /** Controller position at edgeAnchorAt (ms) */
  edgeAnchorMs: number;
  /** Recent prediction errors, newest last */
  errorHistory: number[];
  /** Recent implied drift readings, newest last */
  driftHistory: number[];
}

/** Create an empty drift model */
export function createDriftModel(itemId: string | null = null): DriftModel {
  return {
    itemId,
    estimatedOffsetMs: 0,
    estimatedDriftRatePpm: 0,
    lastHardSeekAt: null,
    sampleCount: 0,
    lastSampleAt: null,
    lastReportedSeconds: null,
    lastReportedAt: null,
    edgeAnchorAt: null,
    edgeAnchorMs: 0,
    errorHistory: [],
    driftHistory: [],
  };
}

/** Convert a ppm rate to a multiplier on elapsed local time */
export function ppmToRate(ppm: number): number {
  return 1 + ppm / 1e6;
}

/**
 * Predict the controller position at a local instant.
 * Returns null when the model has not seen a sample yet.
 */
export function predictOffsetMs(model: DriftModel, at: number): number | null {
  if (model.lastSampleAt === null) return null;
  const elapsedMs = at - model.lastSampleAt;
  return model.estimatedOffsetMs + elapsedMs * ppmToRate(model.estimatedDriftRatePpm);
}
