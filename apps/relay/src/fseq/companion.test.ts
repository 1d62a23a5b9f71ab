/**
 * Tests for companion file lookup.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { companionCandidates, fileExists, findCompanionFile, itemBaseName } from "./companion.js";

const AUDIO_DIR = "/media/audio-fseq";

function existsOnly(...paths: string[]) {
  return vi.fn(async (path: string) => paths.includes(path));
}

describe("itemBaseName", () => {
  it("should drop the directory and the extension", () => {
    expect(itemBaseName("Elvis.fseq")).toBe("Elvis");
    expect(itemBaseName("shows/Holiday Mix.fseq")).toBe("Holiday Mix");
    expect(itemBaseName("Christmas Playlist")).toBe("Christmas Playlist");
    expect(itemBaseName(".hidden")).toBe(".hidden");
  });
});

describe("companionCandidates", () => {
  it("should list names in priority order", () => {
    expect(companionCandidates(AUDIO_DIR, "Elvis.fseq")).toEqual([
      "/media/audio-fseq/Elvis_Audio.fseq",
      "/media/audio-fseq/Elvis_audio.fseq",
      "/media/audio-fseq/Elvis.fseq",
    ]);
  });
});

describe("findCompanionFile", () => {
  it("should prefer the _Audio name when several exist", async () => {
    const exists = existsOnly(
      "/media/audio-fseq/Elvis_Audio.fseq",
      "/media/audio-fseq/Elvis.fseq"
    );

    expect(await findCompanionFile(AUDIO_DIR, "Elvis.fseq", exists)).toBe(
      "/media/audio-fseq/Elvis_Audio.fseq"
    );
    expect(exists).toHaveBeenCalledTimes(1);
  });

  it("should fall back to the lowercase then the plain name", async () => {
    expect(
      await findCompanionFile(
        AUDIO_DIR,
        "Elvis.fseq",
        existsOnly("/media/audio-fseq/Elvis_audio.fseq", "/media/audio-fseq/Elvis.fseq")
      )
    ).toBe("/media/audio-fseq/Elvis_audio.fseq");

    expect(
      await findCompanionFile(AUDIO_DIR, "Elvis.fseq", existsOnly("/media/audio-fseq/Elvis.fseq"))
    ).toBe("/media/audio-fseq/Elvis.fseq");
  });

  it("should return null when no candidate exists", async () => {
    const exists = existsOnly();
    expect(await findCompanionFile(AUDIO_DIR, "Elvis.fseq", exists)).toBeNull();
    expect(exists).toHaveBeenCalledTimes(3);
  });
});

describe("fileExists", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "companion-"));
    await writeFile(join(dir, "Show_Audio.fseq"), Buffer.alloc(4));
    await mkdir(join(dir, "Folder_Audio.fseq"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should find real files only", async () => {
    expect(await fileExists(join(dir, "Show_Audio.fseq"))).toBe(true);
    expect(await fileExists(join(dir, "Missing.fseq"))).toBe(false);
    expect(await fileExists(join(dir, "Folder_Audio.fseq"))).toBe(false);
  });

  it("should find a companion on disk with the default check", async () => {
    expect(await findCompanionFile(dir, "Show.fseq")).toBe(join(dir, "Show_Audio.fseq"));
  });
});
