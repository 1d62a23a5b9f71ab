/**
 * Tests for controller command dispatch and listings.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CommandDispatchError, FppCommandClient } from "./commandClient.js";

const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("FppCommandClient", () => {
  const client = new FppCommandClient({
    baseUrl: "http://fpp.local",
    commandTimeoutMs: 1000,
    listTimeoutMs: 1000,
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe("commands", () => {
    it("should POST Start Playlist with the item name", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ Status: "OK" }));

      await client.startPlaylist("Elvis.fseq");

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://fpp.local/api/command");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe('{"command":"Start Playlist","args":["Elvis.fseq"]}');
    });

    it("should POST Stop Now without arguments", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ Status: "OK" }));

      await client.stopNow();

      expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"command":"Stop Now"}');
    });

    it("should reject with CommandDispatchError on an HTTP error", async () => {
      fetchMock.mockResolvedValue(jsonResponse({}, 500));

      const pending = client.stopNow();
      await expect(pending).rejects.toBeInstanceOf(CommandDispatchError);
      await expect(pending).rejects.toThrow("Stop Now failed: HTTP 500");
    });

    it("should reject with CommandDispatchError when the controller is down", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));

      await expect(client.startPlaylist("Elvis.fseq")).rejects.toThrow(
        "Start Playlist failed: fetch failed"
      );
    });
  });

  describe("listings", () => {
    it("should list sequences with their file extension", async () => {
      fetchMock.mockResolvedValue(jsonResponse(["Elvis", "Intro.fseq"]));

      await expect(client.listSequences()).resolves.toEqual(["Elvis.fseq", "Intro.fseq"]);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://fpp.local/api/sequence");
    });

    it("should accept playlists listed as an object", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ "0": "Christmas", "1": "Halloween" }));

      await expect(client.listPlaylists()).resolves.toEqual(["Christmas", "Halloween"]);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://fpp.local/api/playlists");
    });

    it("should return an empty list when the controller fails", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 404));
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      fetchMock.mockResolvedValueOnce(jsonResponse({ sequences: 3 }));

      await expect(client.listSequences()).resolves.toEqual([]);
      await expect(client.listSequences()).resolves.toEqual([]);
      await expect(client.listSequences()).resolves.toEqual([]);
    });
  });
});
