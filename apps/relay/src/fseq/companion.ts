/**
 * Companion frame file lookup.
 *
 * A playing item "Elvis.fseq" is accompanied by a frame file in the audio
 * directory. Candidate names are derived in priority order and the first
 * one that exists wins.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";

export type CompanionNameDerivation = (baseName: string) => string;

export const COMPANION_DERIVATIONS: readonly CompanionNameDerivation[] = [
  (base) => `${base}_Audio.fseq`,
  (base) => `${base}_audio.fseq`,
  (base) => `${base}.fseq`,
];

/** Item id without directory or extension */
export function itemBaseName(itemId: string): string {
  const fileName = itemId.split(/[\\/]/).pop() ?? itemId;
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

/** Candidate companion paths, highest priority first */
export function companionCandidates(audioDir: string, itemId: string): string[] {
  const base = itemBaseName(itemId);
  return COMPANION_DERIVATIONS.map((derive) => join(audioDir, derive(base)));
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/** First existing companion file, or null when the item has none */
export async function findCompanionFile(
  audioDir: string,
  itemId: string,
  exists: (path: string) => Promise<boolean> = fileExists
): Promise<string | null> {
  for (const candidate of companionCandidates(audioDir, itemId)) {
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return null;
}
