/**
 * Playback Client Driver
 *
 * Runs the poll loop against a status source, feeds the estimator, applies
 * its decisions to an audio client and republishes the position cell after
 * every processed poll.
 *
 * States:
 * - idle: the controller reports nothing playing
 * - playing: an item is playing and polls are succeeding (or failing briefly)
 * - lost: enough consecutive polls failed that sync can no longer be trusted
 *
 * Polls overlap when the source is slow. Every poll carries a sequence
 * number and a response is only processed if it is newer than the last one
 * processed, so corrections are always applied in poll order.
 */

import { CADENCE, SYNC_DEFAULTS, type CorrectionEvent, type PlaybackStatus } from "@lumasync/shared";
import { ppmToRate } from "./driftModel.js";
import { describeError, StatusSourceError } from "./errors.js";
import { PositionSyncEstimator, type CorrectionDecision, type EstimatorConfig } from "./estimator.js";
import { createIdleSnapshot, PositionCell, type SyncHealth } from "./positionCell.js";

// ============================================================================
// Collaborators
// ============================================================================

/** Where polled playback status comes from */
export interface StatusSource {
  fetchStatus(signal: AbortSignal): Promise<PlaybackStatus>;
}

/** The audio player being kept in sync */
export interface AudioClient {
  loadItem(itemId: string): void;
  hardSeek(targetMs: number): void;
  setRate(rateFactor: number): void;
  stop(): void;
}

export type DriverState = "idle" | "playing" | "lost";

type CorrectionListener = (event: CorrectionEvent) => void;

export interface DriverConfig {
  pollIntervalMs: number;
  pollTimeoutMs: number;
  /** Consecutive failed polls before LOST_SYNC */
  lostSyncFailures: number;
  estimator: Partial<EstimatorConfig>;
}

export const DEFAULT_DRIVER_CONFIG: DriverConfig = {
  pollIntervalMs: CADENCE.STATUS_POLL_MS,
  pollTimeoutMs: CADENCE.STATUS_TIMEOUT_MS,
  lostSyncFailures: SYNC_DEFAULTS.LOST_SYNC_FAILURES,
  estimator: {},
};

export interface DriverOptions {
  source: StatusSource;
  audio?: AudioClient;
  cell?: PositionCell;
  config?: Partial<DriverConfig>;
  /** Local clock in ms */
  now?: () => number;
}

// ============================================================================
// Driver
// ============================================================================

export class PlaybackDriver {
  private readonly source: StatusSource;
  private readonly audio: AudioClient | null;
  private readonly cell: PositionCell;
  private readonly config: DriverConfig;
  private readonly now: () => number;
  private readonly estimator: PositionSyncEstimator;

  private timer: ReturnType<typeof setInterval> | null = null;
  private state: DriverState = "idle";
  private itemId: string | null = null;
  private hasStatus = false;

  private pollSeq = 0;
  private lastProcessedSeq = 0;
  private consecutiveFailures = 0;
  private inFlight = new Map<number, AbortController>();

  private listeners = new Set<CorrectionListener>();

  constructor(options: DriverOptions) {
    this.source = options.source;
    this.audio = options.audio ?? null;
    this.cell = options.cell ?? new PositionCell();
    this.config = { ...DEFAULT_DRIVER_CONFIG, ...options.config };
    this.now = options.now ?? (() => Date.now());
    this.estimator = new PositionSyncEstimator(this.config.estimator);
  }

  /** Start polling. The first poll goes out immediately. */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.config.pollIntervalMs);

    console.log(`[driver] started (${this.config.pollIntervalMs}ms interval)`);
    this.tick();
  }

  /** Stop polling, drop in-flight polls and return to idle */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("[driver] stopped");
    }

    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();
    this.lastProcessedSeq = this.pollSeq;

    if (this.itemId !== null) {
      this.audio?.stop();
    }
    this.estimator.onIdle();
    this.itemId = null;
    this.hasStatus = false;
    this.state = "idle";
    this.consecutiveFailures = 0;
    this.cell.publish(createIdleSnapshot(this.now()));
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getState(): DriverState {
    return this.state;
  }

  getCell(): PositionCell {
    return this.cell;
  }

  getEstimator(): PositionSyncEstimator {
    return this.estimator;
  }

  /** Subscribe to correction and signal events */
  subscribe(listener: CorrectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Poll loop
  // ==========================================================================

  private tick(): void {
    this.poll().catch((error: unknown) => {
      console.error("[driver] poll handler failed", error);
    });
  }

  private async poll(): Promise<void> {
    const seq = ++this.pollSeq;
    const controller = new AbortController();
    this.inFlight.set(seq, controller);

    const requestSentAt = this.now();
    try {
      const status = await this.fetchWithTimeout(controller);
      this.handleStatus(seq, requestSentAt, this.now(), status);
    } catch (error) {
      this.handleFailure(seq, error);
    } finally {
      this.inFlight.delete(seq);
    }
  }

  private async fetchWithTimeout(controller: AbortController): Promise<PlaybackStatus> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new StatusSourceError(
            "TIMEOUT",
            `status poll timed out after ${this.config.pollTimeoutMs}ms`
          )
        );
      }, this.config.pollTimeoutMs);
    });

    try {
      return await Promise.race([this.source.fetchStatus(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private handleStatus(
    seq: number,
    requestSentAt: number,
    requestReceivedAt: number,
    status: PlaybackStatus
  ): void {
    if (seq <= this.lastProcessedSeq) {
      return;
    }
    this.lastProcessedSeq = seq;

    if (this.consecutiveFailures > 0) {
      console.log(`[driver] status source back after ${this.consecutiveFailures} failed polls`);
      this.consecutiveFailures = 0;
      this.emit({ type: "SYNC_RESTORED" });
    }

    if (!status.isPlaying) {
      this.enterIdle(requestReceivedAt);
      return;
    }

    const itemId = status.currentItemId;
    this.hasStatus = true;
    this.state = "playing";

    if (itemId !== this.itemId) {
      console.log(`[driver] item started item=${itemId}`);
      this.estimator.onItemChanged(itemId);
      this.itemId = itemId;
      this.emit({ type: "ITEM_STARTED", itemId });
      this.audio?.loadItem(itemId);
    }

    const decision = this.estimator.onPoll({
      requestSentAt,
      requestReceivedAt,
      reportedElapsedSeconds: status.elapsedSeconds,
      currentItemId: itemId,
    });
    this.applyDecision(itemId, decision);
    this.publishPlaying("synced");
  }

  private handleFailure(seq: number, error: unknown): void {
    if (seq <= this.lastProcessedSeq) {
      return;
    }
    this.lastProcessedSeq = seq;
    this.consecutiveFailures++;

    const message = describeError(error);
    this.emit({
      type: "SOURCE_UNREACHABLE",
      consecutiveFailures: this.consecutiveFailures,
      message,
    });

    if (this.consecutiveFailures === this.config.lostSyncFailures) {
      console.warn(`[driver] lost sync after ${this.consecutiveFailures} failed polls: ${message}`);
      this.state = "lost";
      this.emit({ type: "LOST_SYNC", consecutiveFailures: this.consecutiveFailures });
    }

    // The model is kept; readers keep extrapolating from the last estimate
    if (this.itemId !== null) {
      this.publishPlaying(this.state === "lost" ? "lost" : "unreachable");
    } else {
      this.cell.publish({
        ...this.cell.read(),
        sync: this.state === "lost" ? "lost" : "unreachable",
      });
    }
  }

  private enterIdle(at: number): void {
    const wasPlaying = this.itemId !== null;
    const firstStatus = !this.hasStatus;
    this.hasStatus = true;
    this.state = "idle";

    if (wasPlaying) {
      console.log(`[driver] playback ended item=${this.itemId}`);
      this.estimator.onIdle();
      this.audio?.stop();
      this.itemId = null;
    }

    if (wasPlaying || firstStatus) {
      this.emit({ type: "IDLE" });
    }
    this.cell.publish(createIdleSnapshot(at));
  }

  private applyDecision(itemId: string, decision: CorrectionDecision): void {
    switch (decision.type) {
      case "hard_seek":
        this.audio?.hardSeek(decision.targetMs);
        this.emit({
          type: "HARD_SEEK",
          itemId,
          targetMs: decision.targetMs,
          errorMs: decision.errorMs,
        });
        break;
      case "soft_rate":
        this.audio?.setRate(decision.rateFactor);
        this.emit({
          type: "SOFT_RATE",
          itemId,
          rateFactor: decision.rateFactor,
          errorMs: decision.errorMs,
        });
        break;
      case "none":
        break;
    }
  }

  private publishPlaying(sync: SyncHealth): void {
    const model = this.estimator.getModel();
    if (model.lastSampleAt === null) {
      return;
    }
    this.cell.publish({
      itemId: this.itemId,
      playing: true,
      anchorMs: model.estimatedOffsetMs,
      anchorAt: model.lastSampleAt,
      rate: ppmToRate(model.estimatedDriftRatePpm),
      sync,
    });
  }

  private emit(event: CorrectionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
