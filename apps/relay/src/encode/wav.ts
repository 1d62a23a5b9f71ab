/**
 * RIFF/WAVE decoding to 16-bit samples, plus the mono mixdown and
 * resampling the companion encoder needs.
 */

export interface WavAudio {
  sampleRate: number;
  channels: number;
  /** Interleaved signed 16-bit samples */
  samples: Int16Array;
}

export class WavDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WavDecodeError";
  }
}

const FORMAT_PCM = 1;
const FORMAT_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

interface WavFormat {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

function readFormat(bytes: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new WavDecodeError(`fmt chunk is ${size} bytes, expected at least 16`);
  }
  let formatTag = bytes.readUInt16LE(offset);
  // Extensible files name the real format in the first two bytes of the sub-format GUID
  if (formatTag === FORMAT_EXTENSIBLE && size >= 26) {
    formatTag = bytes.readUInt16LE(offset + 24);
  }
  return {
    formatTag,
    channels: bytes.readUInt16LE(offset + 2),
    sampleRate: bytes.readUInt32LE(offset + 4),
    bitsPerSample: bytes.readUInt16LE(offset + 14),
  };
}

function readSample(bytes: Buffer, offset: number, format: WavFormat): number {
  if (format.formatTag === FORMAT_FLOAT) {
    const value = Math.round(bytes.readFloatLE(offset) * 32767);
    return Math.max(-32768, Math.min(32767, value));
  }
  switch (format.bitsPerSample) {
    case 8:
      return (bytes.readUInt8(offset) - 128) * 256;
    case 16:
      return bytes.readInt16LE(offset);
    case 24:
      return bytes.readIntLE(offset, 3) >> 8;
    default:
      return bytes.readInt32LE(offset) >> 16;
  }
}

/** Decode a WAV file held in memory */
export function decodeWav(bytes: Buffer): WavAudio {
  if (
    bytes.length < 12 ||
    bytes.toString("latin1", 0, 4) !== "RIFF" ||
    bytes.toString("latin1", 8, 12) !== "WAVE"
  ) {
    throw new WavDecodeError("Not a RIFF/WAVE file");
  }

  let format: WavFormat | null = null;
  let data: Buffer | null = null;

  let pos = 12;
  while (pos + 8 <= bytes.length) {
    const id = bytes.toString("latin1", pos, pos + 4);
    const size = bytes.readUInt32LE(pos + 4);
    const body = pos + 8;

    if (id === "fmt ") {
      format = readFormat(bytes, body, size);
    } else if (id === "data") {
      // Streamed files may claim more than they hold
      data = bytes.subarray(body, Math.min(body + size, bytes.length));
    }

    // Chunks are padded to an even length
    pos = body + size + (size % 2);
  }

  if (format === null) throw new WavDecodeError("Missing fmt chunk");
  if (data === null) throw new WavDecodeError("Missing data chunk");

  const isFloat = format.formatTag === FORMAT_FLOAT && format.bitsPerSample === 32;
  const isPcm = format.formatTag === FORMAT_PCM && [8, 16, 24, 32].includes(format.bitsPerSample);
  if (!isFloat && !isPcm) {
    throw new WavDecodeError(
      `Unsupported encoding: format ${format.formatTag}, ${format.bitsPerSample} bits`
    );
  }
  if (format.channels === 0 || format.sampleRate === 0) {
    throw new WavDecodeError("Channel count and sample rate must be positive");
  }

  const width = format.bitsPerSample / 8;
  const count = Math.floor(data.length / width);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = readSample(data, i * width, format);
  }

  return { sampleRate: format.sampleRate, channels: format.channels, samples };
}

/** Average interleaved channels into one, rounding down */
export function mixToMono(samples: Int16Array, channels: number): Int16Array {
  if (channels === 1) return samples;

  const frames = Math.floor(samples.length / channels);
  const mono = new Int16Array(frames);
  for (let frame = 0; frame < frames; frame++) {
    let sum = 0;
    for (let channel = 0; channel < channels; channel++) {
      sum += samples[frame * channels + channel] ?? 0;
    }
    mono[frame] = Math.floor(sum / channels);
  }
  return mono;
}

/** Linear-interpolation resampler for mono samples */
export function resampleLinear(samples: Int16Array, fromRate: number, toRate: number): Int16Array {
  if (fromRate === toRate) return samples;

  const ratio = fromRate / toRate;
  const length = Math.floor((samples.length * toRate) / fromRate);
  const out = new Int16Array(length);
  for (let i = 0; i < length; i++) {
    const position = i * ratio;
    const index = Math.floor(position);
    const fraction = position - index;
    const current = samples[Math.min(index, samples.length - 1)] ?? 0;
    const next = samples[index + 1];
    const value = next === undefined ? current : current * (1 - fraction) + next * fraction;
    out[i] = Math.trunc(Math.max(-32768, Math.min(32767, value)));
  }
  return out;
}
