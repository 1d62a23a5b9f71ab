/**
 * Tests for the frame-addressed record reader, against files from the writer.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildFseqFile, writeFseqFile } from "./writer.js";
import {
  closeFrameFile,
  openFrameFile,
  readFrame,
  type FrameFileHandle,
  type FrameReadResult,
} from "./reader.js";

const FRAMES = [
  Buffer.from([0xaa, 0x55, 0x00, 0x01]),
  Buffer.from([0xaa, 0x55, 0x00, 0x02]),
  Buffer.from([0xaa, 0x55, 0x00, 0x03]),
];

let dir: string;
let goodPath: string;

async function openOk(path: string): Promise<FrameFileHandle> {
  const result = await openFrameFile(path);
  if (!result.success) {
    throw new Error(`expected to open ${path}: ${result.error.message}`);
  }
  return result.handle;
}

function frameBytes(result: FrameReadResult): number[] | "end_of_data" {
  return result.kind === "frame" ? Array.from(result.data) : "end_of_data";
}

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "frame-reader-"));
  goodPath = join(dir, "Show_Audio.fseq");
  const written = await writeFseqFile(goodPath, {
    frames: FRAMES,
    frameDurationMs: 25,
    mediaFilename: "song.wav",
  });
  // 72 header bytes, three 4-byte records
  expect(written).toBe(84);
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("openFrameFile", () => {
  it("should parse the header of a written file", async () => {
    const handle = await openOk(goodPath);

    expect(handle.path).toBe(goodPath);
    expect(handle.header.dataOffsetBytes).toBe(72);
    expect(handle.header.recordSizeBytes).toBe(4);
    expect(handle.header.recordCount).toBe(3);
    expect(handle.header.frameDurationMs).toBe(25);

    await handle.close();
  });

  it("should return a parse error for a file that is not a frame file", async () => {
    const path = join(dir, "notes.fseq");
    await writeFile(path, Buffer.from("RIFF....WAVEfmt ", "latin1"));

    const result = await openFrameFile(path);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("BAD_MAGIC");
    }
  });

  it("should return TRUNCATED for a file cut inside the header", async () => {
    const path = join(dir, "cut.fseq");
    const whole = buildFseqFile({ frames: FRAMES, frameDurationMs: 25, mediaFilename: "a.wav" });
    await writeFile(path, whole.subarray(0, 20));

    const result = await openFrameFile(path);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("TRUNCATED");
    }
  });

  it("should open a version 1 file with its data right after a 28-byte header", async () => {
    const path = join(dir, "Legacy_Audio.fseq");
    const header = Buffer.alloc(28);
    header.write("PSEQ", 0, "latin1");
    header.writeUInt16LE(28, 4);
    header.writeUInt8(0, 6);
    header.writeUInt8(1, 7);
    header.writeUInt16LE(28, 8);
    header.writeUInt32LE(4, 10);
    header.writeUInt32LE(2, 14);
    header.writeUInt8(25, 18);
    await writeFile(path, Buffer.concat([header, FRAMES[0] ?? Buffer.alloc(4), FRAMES[1] ?? Buffer.alloc(4)]));

    const handle = await openOk(path);

    expect(handle.header.versionMajor).toBe(1);
    expect(handle.header.dataOffsetBytes).toBe(28);
    expect(frameBytes(await handle.read(1))).toEqual([0xaa, 0x55, 0x00, 0x02]);
    expect(frameBytes(await handle.read(2))).toBe("end_of_data");

    await handle.close();
  });

  it("should reject when the file does not exist", async () => {
    await expect(openFrameFile(join(dir, "missing.fseq"))).rejects.toThrow(/ENOENT/);
  });
});

describe("FrameFileHandle.read", () => {
  let handle: FrameFileHandle;

  beforeAll(async () => {
    handle = await openOk(goodPath);
  });

  afterAll(async () => {
    await handle.close();
  });

  it("should read the record at an index", async () => {
    expect(frameBytes(await handle.read(1))).toEqual([0xaa, 0x55, 0x00, 0x02]);
    expect(frameBytes(await readFrame(handle, 2))).toEqual([0xaa, 0x55, 0x00, 0x03]);
  });

  it("should clamp negative indices to the first record", async () => {
    expect(frameBytes(await handle.read(-5))).toEqual([0xaa, 0x55, 0x00, 0x01]);
  });

  it("should floor fractional indices and read NaN as zero", async () => {
    expect(frameBytes(await handle.read(1.7))).toEqual([0xaa, 0x55, 0x00, 0x02]);
    expect(frameBytes(await handle.read(Number.NaN))).toEqual([0xaa, 0x55, 0x00, 0x01]);
  });

  it("should report end of data at and past the record count", async () => {
    expect(frameBytes(await handle.read(3))).toBe("end_of_data");
    expect(frameBytes(await handle.read(103))).toBe("end_of_data");
  });
});

describe("short files and closing", () => {
  it("should report end of data for a record cut short", async () => {
    const path = join(dir, "short.fseq");
    const whole = buildFseqFile({ frames: FRAMES, frameDurationMs: 25, mediaFilename: "a.wav" });
    await writeFile(path, whole.subarray(0, whole.length - 2));
    const handle = await openOk(path);

    expect(frameBytes(await handle.read(1))).toEqual([0xaa, 0x55, 0x00, 0x02]);
    expect(frameBytes(await handle.read(2))).toBe("end_of_data");

    await handle.close();
  });

  it("should close once and read nothing afterwards", async () => {
    const handle = await openOk(goodPath);

    await closeFrameFile(handle);
    await closeFrameFile(handle);

    expect(handle.closed).toBe(true);
    expect(frameBytes(await handle.read(0))).toBe("end_of_data");
  });
});
