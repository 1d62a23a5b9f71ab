import { describe, it, expect, vi } from "vitest";
import { FramePlayer, type PcmAudioBuffer, type PcmBufferSource } from "./framePlayer.js";

function createFakeContext() {
  const starts: number[] = [];
  const buffers: PcmAudioBuffer[] = [];
  const destination = {};
  const ctx = {
    currentTime: 0,
    destination,
    createBuffer: vi.fn((_channels: number, _length: number, _sampleRate: number) => {
      const buffer: PcmAudioBuffer = { copyToChannel: vi.fn() };
      buffers.push(buffer);
      return buffer;
    }),
    createBufferSource: vi.fn(() => {
      const source: PcmBufferSource = {
        buffer: null,
        connect: vi.fn(),
        start: (when?: number) => {
          starts.push(when ?? 0);
        },
      };
      return source;
    }),
  };
  return { ctx, starts, buffers, destination };
}

/** 125 samples at 1kHz: 0.125s per frame */
const frame = () => new Float32Array(125);

describe("FramePlayer", () => {
  const options = { sampleRate: 1000, leadSec: 0.25, maxLeadSec: 0.5 };

  it("starts the first frame a lead ahead and queues the rest back to back", () => {
    const { ctx, starts } = createFakeContext();
    const player = new FramePlayer(ctx, options);

    player.schedule(frame());
    player.schedule(frame());
    player.schedule(frame());

    expect(starts).toEqual([0.25, 0.375, 0.5]);
    expect(player.getNextStartTime()).toBe(0.625);
  });

  it("builds a mono buffer per frame and connects it to the destination", () => {
    const { ctx, buffers, destination } = createFakeContext();
    const player = new FramePlayer(ctx, options);
    const samples = frame();

    player.schedule(samples);

    expect(ctx.createBuffer).toHaveBeenCalledWith(1, 125, 1000);
    expect(buffers[0]?.copyToChannel).toHaveBeenCalledWith(samples, 0);
    const source = ctx.createBufferSource.mock.results[0]?.value;
    expect(source?.buffer).toBe(buffers[0]);
    expect(source?.connect).toHaveBeenCalledWith(destination);
  });

  it("starts a new run after a gap", () => {
    const { ctx, starts } = createFakeContext();
    const player = new FramePlayer(ctx, options);

    player.schedule(frame());
    ctx.currentTime = 2;
    player.schedule(frame());

    expect(starts).toEqual([0.25, 2.25]);
  });

  it("drops the backlog when the schedule runs too far ahead", () => {
    const { ctx, starts } = createFakeContext();
    const player = new FramePlayer(ctx, options);

    for (let i = 0; i < 4; i++) {
      player.schedule(frame());
    }

    expect(starts).toEqual([0.25, 0.375, 0.5, 0.25]);
  });

  it("restarts after reset", () => {
    const { ctx, starts } = createFakeContext();
    const player = new FramePlayer(ctx, options);

    player.schedule(frame());
    player.reset();
    expect(player.getNextStartTime()).toBeNull();

    player.schedule(frame());
    expect(starts).toEqual([0.25, 0.25]);
  });

  it("skips empty frames", () => {
    const { ctx, starts } = createFakeContext();
    const player = new FramePlayer(ctx, options);

    expect(player.schedule(new Float32Array(0))).toBeNull();
    expect(starts).toEqual([]);
    expect(ctx.createBufferSource).not.toHaveBeenCalled();
  });
});
