/**
 * FSEQ v2 writer for audio companion files.
 *
 * Each record carries one frame of mono 16-bit PCM:
 *   [0xAA, 0x55, hi0, lo0, hi1, lo1, ...]
 * Takes decoded samples; WAV input goes through ../encode/wav.ts first.
 */

import { writeFile } from "node:fs/promises";
import { PCM_FRAME } from "@lumasync/shared";
import { FIXED_HEADER_BYTES, type FrameFileHeader } from "./header.js";

const DEFAULT_PRODUCER = "lumasync fseq writer";

export interface FseqBuildOptions {
  frames: readonly Buffer[];
  /** Defaults to the size of the first frame */
  recordSizeBytes?: number;
  frameDurationMs: number;
  mediaFilename: string;
  producer?: string;
}

/** Samples per frame for a sample rate and frame duration */
export function samplesPerFrame(frameDurationMs: number, sampleRate: number = PCM_FRAME.SAMPLE_RATE): number {
  return Math.floor((sampleRate * frameDurationMs) / 1000);
}

/** Record size for a number of mono samples per frame */
export function pcmRecordSize(samples: number): number {
  return PCM_FRAME.SYNC_MARKER.length + samples * PCM_FRAME.BYTES_PER_SAMPLE;
}

/**
 * Pack signed 16-bit samples into records, padding the last one with silence.
 * Values outside the 16-bit range are clamped.
 */
export function encodePcmFrames(samples: ArrayLike<number>, perFrame: number): Buffer[] {
  if (!Number.isInteger(perFrame) || perFrame <= 0) {
    throw new RangeError(`samples per frame must be a positive integer, got ${perFrame}`);
  }

  const frames: Buffer[] = [];
  const recordSize = pcmRecordSize(perFrame);

  for (let start = 0; start < samples.length; start += perFrame) {
    const record = Buffer.alloc(recordSize);
    record[0] = PCM_FRAME.SYNC_MARKER[0];
    record[1] = PCM_FRAME.SYNC_MARKER[1];

    const end = Math.min(start + perFrame, samples.length);
    for (let i = start; i < end; i++) {
      const sample = Math.max(-32768, Math.min(32767, Math.round(samples[i] ?? 0)));
      record.writeInt16BE(sample, 2 + (i - start) * 2);
    }
    frames.push(record);
  }

  return frames;
}

/** Variable header tags: two-letter code, 16-bit length, NUL-terminated value */
export function buildVariableHeader(tags: Record<string, string>): Buffer {
  const parts: Buffer[] = [];
  for (const [code, value] of Object.entries(tags)) {
    if (code.length !== 2) {
      throw new RangeError(`Tag code must be two characters: "${code}"`);
    }
    const valueBytes = Buffer.from(`${value}\0`, "utf8");
    const entry = Buffer.alloc(4);
    entry.write(code, 0, "latin1");
    entry.writeUInt16LE(valueBytes.length, 2);
    parts.push(entry, valueBytes);
  }
  return Buffer.concat(parts);
}

/** Build an uncompressed FSEQ v2 file in memory */
export function buildFseqFile(options: FseqBuildOptions): Buffer {
  const { frames, frameDurationMs } = options;
  const recordSize = options.recordSizeBytes ?? frames[0]?.length ?? 0;

  if (recordSize <= 0) {
    throw new RangeError("Record size must be positive");
  }
  if (!Number.isInteger(frameDurationMs) || frameDurationMs < 1 || frameDurationMs > 255) {
    throw new RangeError(`Frame duration must be 1-255ms, got ${frameDurationMs}`);
  }
  frames.forEach((frame, index) => {
    if (frame.length !== recordSize) {
      throw new RangeError(`Frame ${index} is ${frame.length} bytes, expected ${recordSize}`);
    }
  });

  const baseName = options.mediaFilename.split(/[\\/]/).pop() ?? options.mediaFilename;
  const variableHeader = buildVariableHeader({
    mf: baseName,
    sp: options.producer ?? DEFAULT_PRODUCER,
  });

  const unaligned = FIXED_HEADER_BYTES + variableHeader.length;
  const padding = (4 - (unaligned % 4)) % 4;
  const dataOffset = unaligned + padding;
  if (dataOffset > 0xffff) {
    throw new RangeError("Variable header too large");
  }

  const header = Buffer.alloc(FIXED_HEADER_BYTES);
  header.write("PSEQ", 0, "latin1");
  header.writeUInt16LE(dataOffset, 4);
  header.writeUInt8(0, 6);
  header.writeUInt8(2, 7);
  header.writeUInt16LE(FIXED_HEADER_BYTES, 8);
  header.writeUInt32LE(recordSize, 10);
  header.writeUInt32LE(frames.length, 14);
  header.writeUInt8(frameDurationMs, 18);
  // flags, compression, block and sparse counts, unique id stay zero

  return Buffer.concat([header, variableHeader, Buffer.alloc(padding), ...frames]);
}

export async function writeFseqFile(path: string, options: FseqBuildOptions): Promise<number> {
  const file = buildFseqFile(options);
  await writeFile(path, file);
  return file.length;
}

/** Read the variable header tags back out of a whole file */
export function parseVariableHeaderTags(
  file: Buffer,
  header: FrameFileHeader
): Record<string, string> {
  const tags: Record<string, string> = {};
  const start = header.variableHeaderOffset || FIXED_HEADER_BYTES;
  const end = Math.min(header.dataOffsetBytes, file.length);

  let pos = start;
  while (pos + 4 <= end) {
    const code = file.toString("latin1", pos, pos + 2);
    if (code === "\0\0") break;

    const length = file.readUInt16LE(pos + 2);
    const valueEnd = Math.min(pos + 4 + length, end);
    const raw = file.toString("utf8", pos + 4, valueEnd);
    tags[code] = raw.endsWith("\0") ? raw.slice(0, -1) : raw;
    pos = valueEnd;
  }

  return tags;
}
