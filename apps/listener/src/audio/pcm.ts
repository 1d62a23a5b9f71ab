/**
 * PCM frame decoding.
 *
 * A frame record is the sync marker followed by big-endian signed 16-bit
 * mono samples:
 *   [0xAA, 0x55, hi0, lo0, hi1, lo1, ...]
 */

import { PCM_FRAME } from "@lumasync/shared";

const HEADER_BYTES = PCM_FRAME.SYNC_MARKER.length;

/** Decode the base64 payload of a FRAME event */
export function base64ToBytes(data: string): Uint8Array {
  const binary = atob(data);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Decode one frame to samples in [-1, 1).
 * Returns null when the marker is missing. A trailing odd byte is ignored.
 */
export function decodePcmFrame(bytes: Uint8Array): Float32Array | null {
  if (
    bytes.length < HEADER_BYTES ||
    bytes[0] !== PCM_FRAME.SYNC_MARKER[0] ||
    bytes[1] !== PCM_FRAME.SYNC_MARKER[1]
  ) {
    return null;
  }

  const count = Math.floor((bytes.length - HEADER_BYTES) / PCM_FRAME.BYTES_PER_SAMPLE);
  const samples = new Float32Array(count);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  for (let i = 0; i < count; i++) {
    samples[i] = view.getInt16(HEADER_BYTES + i * 2, false) / 32768;
  }
  return samples;
}
