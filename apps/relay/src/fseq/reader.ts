/**
 * Frame-addressed record reader.
 *
 * One handle per opened file, owned by a single reader. The header is parsed
 * once on open and kept with the handle until it is closed.
 */

import { open, type FileHandle } from "node:fs/promises";
import {
  FIXED_HEADER_BYTES,
  parseFrameFileHeader,
  recordOffset,
  type FrameFileHeader,
  type FrameFileParseError,
} from "./header.js";

export type FrameReadResult = { kind: "frame"; data: Buffer } | { kind: "end_of_data" };

export type OpenFrameFileResult =
  | { success: true; handle: FrameFileHandle }
  | { success: false; error: FrameFileParseError };

const END_OF_DATA: FrameReadResult = { kind: "end_of_data" };

export class FrameFileHandle {
  private file: FileHandle | null;

  constructor(
    readonly path: string,
    readonly header: FrameFileHeader,
    file: FileHandle
  ) {
    this.file = file;
  }

  get closed(): boolean {
    return this.file === null;
  }

  /** Read one record. Out-of-range and short reads are end of data. */
  async read(frameIndex: number): Promise<FrameReadResult> {
    const file = this.file;
    if (file === null) return END_OF_DATA;

    const index = Number.isNaN(frameIndex) ? 0 : Math.max(0, Math.floor(frameIndex));
    if (index >= this.header.recordCount) return END_OF_DATA;

    const size = this.header.recordSizeBytes;
    const data = Buffer.alloc(size);
    const { bytesRead } = await file.read(data, 0, size, recordOffset(this.header, index));
    if (bytesRead < size) return END_OF_DATA;

    return { kind: "frame", data };
  }

  async close(): Promise<void> {
    const file = this.file;
    if (file === null) return;
    this.file = null;
    await file.close();
  }
}

/**
 * Open a frame file and parse its header.
 * Structural problems come back as a result; I/O errors reject.
 */
export async function openFrameFile(path: string): Promise<OpenFrameFileResult> {
  const file = await open(path, "r");
  try {
    const headerBytes = Buffer.alloc(FIXED_HEADER_BYTES);
    const { bytesRead } = await file.read(headerBytes, 0, FIXED_HEADER_BYTES, 0);
    const parsed = parseFrameFileHeader(headerBytes.subarray(0, bytesRead));
    if (!parsed.success) {
      await file.close();
      return { success: false, error: parsed.error };
    }
    return { success: true, handle: new FrameFileHandle(path, parsed.header, file) };
  } catch (error) {
    await file.close();
    throw error;
  }
}

export function readFrame(handle: FrameFileHandle, frameIndex: number): Promise<FrameReadResult> {
  return handle.read(frameIndex);
}

export function closeFrameFile(handle: FrameFileHandle): Promise<void> {
  return handle.close();
}
