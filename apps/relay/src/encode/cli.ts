/**
 * encode-companion: WAV soundtrack in, audio companion frame file out.
 *
 *   npm run encode:companion -- Elvis.wav --fps 40
 *   npm run encode:companion -- Elvis.wav -o /home/fpp/media/audio-fseq/Elvis_Audio.fseq
 */

import { Command } from "commander";
import { z } from "zod";
import { CADENCE, PCM_FRAME, formatZodError } from "@lumasync/shared";
import { encodeCompanion, frameDurationFor } from "./companionEncoder.js";

const CliOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  fps: z.coerce.number().int().min(4).max(1000).default(CADENCE.FRAME_RATE),
  stepTime: z.coerce.number().int().min(1).max(255).optional(),
  sampleRate: z.coerce.number().int().min(1000).max(192_000).default(PCM_FRAME.SAMPLE_RATE),
});

async function main(): Promise<void> {
  const program = new Command();
  program
    .name("encode-companion")
    .description("Encode a WAV soundtrack into an audio companion frame file")
    .argument("<input>", "WAV file to encode")
    .option("-o, --output <path>", "output file (default: <name>_Audio.fseq beside the input)")
    .option("--fps <n>", "show frame rate")
    .option("--step-time <ms>", "frame duration in ms, overrides --fps")
    .option("--sample-rate <hz>", "output sample rate");
  program.parse(process.argv);

  const input = program.args[0];
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success || input === undefined) {
    console.error(`[encode] ${parsed.success ? "Missing input file" : formatZodError(parsed.error)}`);
    process.exitCode = 1;
    return;
  }

  const options = parsed.data;
  const frameDurationMs = frameDurationFor(options.fps, options.stepTime);
  console.log(`[encode] ${input} at ${frameDurationMs}ms frames, ${options.sampleRate}Hz`);

  const summary = await encodeCompanion({
    input,
    output: options.output,
    frameDurationMs,
    sampleRate: options.sampleRate,
  });

  console.log(
    `[encode] source ${summary.sourceRate}Hz ${summary.sourceChannels}ch -> ${summary.frameCount} frames of ${summary.samplesPerFrame} samples`
  );
  console.log(`[encode] wrote ${summary.output} (${summary.bytesWritten} bytes, ${summary.recordSizeBytes} channels)`);
}

main().catch((error: unknown) => {
  console.error("[encode] failed:", error);
  process.exitCode = 1;
});
