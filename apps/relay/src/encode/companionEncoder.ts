/**
 * Turns a WAV soundtrack into an audio companion frame file: mono 16-bit
 * PCM, one record per show frame.
 */

import { readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { PCM_FRAME } from "@lumasync/shared";
import { itemBaseName } from "../fseq/companion.js";
import { encodePcmFrames, pcmRecordSize, samplesPerFrame, writeFseqFile } from "../fseq/writer.js";
import { decodeWav, mixToMono, resampleLinear } from "./wav.js";

export interface EncodeCompanionOptions {
  input: string;
  /** Defaults to "<name>_Audio.fseq" beside the input */
  output?: string;
  frameDurationMs: number;
  sampleRate?: number;
}

export interface EncodeCompanionSummary {
  output: string;
  sourceRate: number;
  sourceChannels: number;
  sampleRate: number;
  samplesPerFrame: number;
  recordSizeBytes: number;
  frameCount: number;
  bytesWritten: number;
}

/** Companion path the relay looks for first */
export function defaultCompanionPath(input: string): string {
  return join(dirname(input), `${itemBaseName(input)}_Audio.fseq`);
}

/** Frame duration from the options: an explicit step wins over the frame rate */
export function frameDurationFor(fps: number, stepTimeMs?: number): number {
  return stepTimeMs ?? Math.floor(1000 / fps);
}

export async function encodeCompanion(options: EncodeCompanionOptions): Promise<EncodeCompanionSummary> {
  const sampleRate = options.sampleRate ?? PCM_FRAME.SAMPLE_RATE;
  const output = options.output ?? defaultCompanionPath(options.input);

  const wav = decodeWav(await readFile(options.input));
  const mono = resampleLinear(mixToMono(wav.samples, wav.channels), wav.sampleRate, sampleRate);

  const perFrame = samplesPerFrame(options.frameDurationMs, sampleRate);
  const frames = encodePcmFrames(mono, perFrame);
  const bytesWritten = await writeFseqFile(output, {
    frames,
    recordSizeBytes: pcmRecordSize(perFrame),
    frameDurationMs: options.frameDurationMs,
    mediaFilename: basename(options.input),
  });

  return {
    output,
    sourceRate: wav.sampleRate,
    sourceChannels: wav.channels,
    sampleRate,
    samplesPerFrame: perFrame,
    recordSizeBytes: pcmRecordSize(perFrame),
    frameCount: frames.length,
    bytesWritten,
  };
}
