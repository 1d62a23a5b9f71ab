/**
 * FramePlayer - schedules decoded PCM frames back to back.
 *
 * Each frame becomes a one-shot buffer source started exactly where the
 * previous one ends, a fixed lead ahead of the context clock. When frames
 * stop arriving the schedule falls behind the clock and the next frame
 * starts a fresh run; when it runs too far ahead the backlog is dropped.
 */

import { PCM_FRAME } from "@lumasync/shared";

// ============================================================================
// Web Audio surface
// ============================================================================

/** The parts of AudioBuffer the player writes */
export interface PcmAudioBuffer {
  copyToChannel(source: Float32Array, channelNumber: number): void;
}

/** The parts of AudioBufferSourceNode the player drives */
export interface PcmBufferSource {
  buffer: PcmAudioBuffer | null;
  connect(destination: object): unknown;
  start(when?: number): void;
}

/** The parts of AudioContext the player needs */
export interface PcmAudioContext {
  readonly currentTime: number;
  readonly destination: object;
  createBuffer(numberOfChannels: number, length: number, sampleRate: number): PcmAudioBuffer;
  createBufferSource(): PcmBufferSource;
}

// ============================================================================
// Player
// ============================================================================

export interface FramePlayerOptions {
  sampleRate?: number;
  /** Seconds between the clock and the first frame of a run */
  leadSec?: number;
  /** Past this much queued audio the schedule restarts */
  maxLeadSec?: number;
}

export class FramePlayer {
  private readonly ctx: PcmAudioContext;
  private readonly sampleRate: number;
  private readonly leadSec: number;
  private readonly maxLeadSec: number;

  /** Context time the next frame starts at, null between runs */
  private nextStartTime: number | null = null;

  constructor(ctx: PcmAudioContext, options: FramePlayerOptions = {}) {
    this.ctx = ctx;
    this.sampleRate = options.sampleRate ?? PCM_FRAME.SAMPLE_RATE;
    this.leadSec = options.leadSec ?? 0.1;
    this.maxLeadSec = options.maxLeadSec ?? 0.5;
  }

  /**
   * Queue one frame. Returns the context time it starts at,
   * or null for an empty frame.
   */
  schedule(samples: Float32Array): number | null {
    if (samples.length === 0) return null;

    const now = this.ctx.currentTime;
    if (
      this.nextStartTime === null ||
      this.nextStartTime < now ||
      this.nextStartTime > now + this.maxLeadSec
    ) {
      this.nextStartTime = now + this.leadSec;
    }

    const buffer = this.ctx.createBuffer(1, samples.length, this.sampleRate);
    buffer.copyToChannel(samples, 0);

    const source = this.ctx.createBufferSource();
    source.buffer = buffer;
    source.connect(this.ctx.destination);

    const startAt = this.nextStartTime;
    source.start(startAt);
    this.nextStartTime = startAt + samples.length / this.sampleRate;
    return startAt;
  }

  /** Forget the schedule; the next frame starts a new run */
  reset(): void {
    this.nextStartTime = null;
  }

  getNextStartTime(): number | null {
    return this.nextStartTime;
  }
}
