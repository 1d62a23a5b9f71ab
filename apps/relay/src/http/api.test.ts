/**
 * Tests for the relay HTTP API routes.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { PlaybackStatus } from "@lumasync/shared";
import { StatusSourceError } from "@lumasync/sync";
import { CommandDispatchError } from "../fpp/commandClient.js";
import { getRelayStatus, handleAdminRequest, type ApiDeps } from "./api.js";

function createDeps() {
  const fetchStatus = vi.fn<(signal?: AbortSignal) => Promise<PlaybackStatus>>();
  const commands = {
    startPlaylist: vi.fn<(name: string) => Promise<void>>().mockResolvedValue(undefined),
    stopNow: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    listSequences: vi.fn<() => Promise<string[]>>().mockResolvedValue(["Elvis.fseq"]),
    listPlaylists: vi.fn<() => Promise<string[]>>().mockResolvedValue(["Christmas"]),
  };
  const deps: ApiDeps = { status: { fetchStatus }, commands, now: () => 1_700_000_000_000 };
  return { deps, fetchStatus, commands };
}

describe("HTTP API", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  describe("getRelayStatus", () => {
    it("should answer the status with the relay timestamp", async () => {
      const { deps, fetchStatus } = createDeps();
      fetchStatus.mockResolvedValue({
        isPlaying: true,
        currentItemId: "Elvis.fseq",
        elapsedSeconds: 38,
      });

      await expect(getRelayStatus(deps)).resolves.toEqual({
        statusCode: 200,
        body: {
          isPlaying: true,
          currentItemId: "Elvis.fseq",
          elapsedSeconds: 38,
          serverTs: 1_700_000_000_000,
        },
      });
    });

    it("should answer 502 when the controller cannot be polled", async () => {
      const { deps, fetchStatus } = createDeps();
      fetchStatus.mockRejectedValue(
        new StatusSourceError("UNREACHABLE", "Controller unreachable: fetch failed")
      );

      await expect(getRelayStatus(deps)).resolves.toEqual({
        statusCode: 502,
        body: { error: "Controller unreachable: fetch failed" },
      });
    });

    it("should rethrow unexpected errors", async () => {
      const { deps, fetchStatus } = createDeps();
      fetchStatus.mockRejectedValue(new Error("boom"));

      await expect(getRelayStatus(deps)).rejects.toThrow("boom");
    });
  });

  describe("handleAdminRequest", () => {
    it("should list sequences and playlists", async () => {
      const { deps } = createDeps();

      await expect(handleAdminRequest({ action: "get_sequences" }, deps)).resolves.toEqual({
        statusCode: 200,
        body: { success: true, sequences: ["Elvis.fseq"], playlists: ["Christmas"] },
      });
    });

    it("should start the chosen sequence", async () => {
      const { deps, commands } = createDeps();

      const result = await handleAdminRequest(
        { action: "start_sequence", sequence: " Elvis.fseq " },
        deps
      );

      expect(result).toEqual({ statusCode: 200, body: { success: true } });
      expect(commands.startPlaylist).toHaveBeenCalledWith("Elvis.fseq");
    });

    it("should stop playback", async () => {
      const { deps, commands } = createDeps();

      const result = await handleAdminRequest({ action: "stop_playback" }, deps);

      expect(result).toEqual({ statusCode: 200, body: { success: true } });
      expect(commands.stopNow).toHaveBeenCalledTimes(1);
    });

    it("should refuse a start without a sequence", async () => {
      const { deps, commands } = createDeps();

      const result = await handleAdminRequest({ action: "start_sequence", sequence: "  " }, deps);

      expect(result).toEqual({
        statusCode: 400,
        body: { success: false, error: "sequence: Nothing selected" },
      });
      expect(commands.startPlaylist).not.toHaveBeenCalled();
    });

    it("should refuse an unknown action", async () => {
      const { deps } = createDeps();

      const result = await handleAdminRequest({ action: "reboot" }, deps);

      expect(result.statusCode).toBe(400);
      expect(result.body.success).toBe(false);
    });

    it("should answer 502 when the command fails", async () => {
      const { deps, commands } = createDeps();
      commands.stopNow.mockRejectedValue(new CommandDispatchError("Stop Now failed: HTTP 500"));

      await expect(handleAdminRequest({ action: "stop_playback" }, deps)).resolves.toEqual({
        statusCode: 502,
        body: { success: false, error: "Controller command failed" },
      });
    });
  });
});
