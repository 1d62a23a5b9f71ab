/**
 * FSEQ fixed header.
 *
 * Layout (little-endian):
 *   0-3   magic "PSEQ"
 *   4-5   offset of the first record
 *   6     minor version
 *   7     major version
 *   8-9   offset of the variable header
 *   10-13 record size (channels per frame)
 *   14-17 record count
 *   18    frame duration (ms)
 *   19    flags
 *   20    compression type (low nibble, v2 only)
 *   21    compression block count
 *   22    sparse range count
 *   23    reserved
 *   24-31 unique id
 *
 * Version 1 headers stop at byte 28; bytes 20-27 carry universe and gamma
 * settings there and no compression.
 */

import { FRAME_FILE } from "@lumasync/shared";

export const FIXED_HEADER_BYTES = FRAME_FILE.FIXED_HEADER_BYTES;

/** Size of the fixed header for a major version */
export function fixedHeaderBytes(versionMajor: number): number {
  return versionMajor === 1 ? FRAME_FILE.V1_FIXED_HEADER_BYTES : FIXED_HEADER_BYTES;
}

export interface FrameFileHeader {
  magicTag: string;
  dataOffsetBytes: number;
  versionMajor: number;
  versionMinor: number;
  variableHeaderOffset: number;
  /** Bytes per record, the file's channel count */
  recordSizeBytes: number;
  recordCount: number;
  frameDurationMs: number;
  compressionType: number;
}

export type FrameFileParseErrorCode = "BAD_MAGIC" | "TRUNCATED" | "UNSUPPORTED" | "INVALID";

export class FrameFileParseError extends Error {
  readonly code: FrameFileParseErrorCode;

  constructor(code: FrameFileParseErrorCode, message: string) {
    super(message);
    this.name = "FrameFileParseError";
    this.code = code;
  }
}

export type HeaderParseResult =
  | { success: true; header: FrameFileHeader }
  | { success: false; error: FrameFileParseError };

function fail(code: FrameFileParseErrorCode, message: string): HeaderParseResult {
  return { success: false, error: new FrameFileParseError(code, message) };
}

/** Parse the fixed header from the first bytes of a file */
export function parseFrameFileHeader(bytes: Buffer): HeaderParseResult {
  if (bytes.length < 4) {
    return fail("TRUNCATED", `File too small: ${bytes.length} bytes`);
  }

  const magicTag = bytes.toString("latin1", 0, 4);
  if (magicTag !== FRAME_FILE.MAGIC) {
    return fail("BAD_MAGIC", `Bad magic tag "${magicTag}"`);
  }

  if (bytes.length < 8) {
    return fail("TRUNCATED", `File too small for a version: ${bytes.length} bytes`);
  }

  const versionMinor = bytes.readUInt8(6);
  const versionMajor = bytes.readUInt8(7);
  if (versionMajor !== 1 && versionMajor !== 2) {
    return fail("UNSUPPORTED", `Unsupported version ${versionMajor}.${versionMinor}`);
  }

  const headerBytes = fixedHeaderBytes(versionMajor);
  if (bytes.length < headerBytes) {
    return fail(
      "TRUNCATED",
      `Header needs ${headerBytes} bytes, only ${bytes.length} available`
    );
  }

  const compressionType = versionMajor === 2 ? bytes.readUInt8(20) & 0x0f : 0;
  if (compressionType !== 0) {
    return fail("UNSUPPORTED", `Compressed frame data (type ${compressionType}) is not supported`);
  }

  const header: FrameFileHeader = {
    magicTag,
    dataOffsetBytes: bytes.readUInt16LE(4),
    versionMajor,
    versionMinor,
    variableHeaderOffset: bytes.readUInt16LE(8),
    recordSizeBytes: bytes.readUInt32LE(10),
    recordCount: bytes.readUInt32LE(14),
    frameDurationMs: bytes.readUInt8(18),
    compressionType,
  };

  if (header.dataOffsetBytes < headerBytes) {
    return fail("INVALID", `Data offset ${header.dataOffsetBytes} points inside the fixed header`);
  }
  if (header.recordSizeBytes === 0) {
    return fail("INVALID", "Record size is zero");
  }
  if (header.frameDurationMs === 0) {
    return fail("INVALID", "Frame duration is zero");
  }

  return { success: true, header };
}

/**
 * Frame index for a playback position.
 * Positions before the start or past the end hold the nearest frame.
 */
export function frameIndexForPosition(posMs: number, header: FrameFileHeader): number {
  const lastIndex = Math.max(0, header.recordCount - 1);
  if (Number.isNaN(posMs)) return 0;
  const index = Math.floor(posMs / header.frameDurationMs);
  return Math.min(lastIndex, Math.max(0, index));
}

/** Byte offset of a record */
export function recordOffset(header: FrameFileHeader, frameIndex: number): number {
  return header.dataOffsetBytes + frameIndex * header.recordSizeBytes;
}
