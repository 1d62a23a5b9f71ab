import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FrameStreamEvent } from "@lumasync/shared";
import { FrameStreamClient } from "./frameStreamClient.js";

describe("FrameStreamClient", () => {
  let client: FrameStreamClient;
  let received: FrameStreamEvent[];

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    client = new FrameStreamClient({ relayUrl: "http://relay.local:3001" });
    received = [];
    client.onEvent((event) => received.push(event));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("handleStreamEvent", () => {
    it("passes on valid events", () => {
      expect(client.handleStreamEvent({ id: 0, type: "IDLE" })).toBe(true);
      expect(received).toEqual([{ id: 0, type: "IDLE" }]);
    });

    it("drops events whose id does not increase", () => {
      client.handleStreamEvent({ id: 5, type: "IDLE" });

      expect(client.handleStreamEvent({ id: 5, type: "IDLE" })).toBe(false);
      expect(client.handleStreamEvent({ id: 3, type: "IDLE" })).toBe(false);
      expect(client.handleStreamEvent({ id: 7, type: "IDLE" })).toBe(true);
      expect(received.map((e) => e.id)).toEqual([5, 7]);
    });

    it("drops malformed events", () => {
      expect(client.handleStreamEvent({ id: 1, type: "FRAME" })).toBe(false);
      expect(client.handleStreamEvent({ type: "IDLE" })).toBe(false);
      expect(received).toEqual([]);
    });

    it("accepts ids from zero again after a disconnect", () => {
      client.handleStreamEvent({ id: 9, type: "IDLE" });
      client.disconnect();

      expect(client.handleStreamEvent({ id: 0, type: "IDLE" })).toBe(true);
    });

    it("stops delivering to a listener that unsubscribed", () => {
      const listener = vi.fn();
      const unsubscribe = client.onEvent(listener);

      unsubscribe();
      client.handleStreamEvent({ id: 0, type: "IDLE" });

      expect(listener).not.toHaveBeenCalled();
      expect(received).toHaveLength(1);
    });
  });

  describe("buildSubscribeRequest", () => {
    it("only includes the options that are set", () => {
      expect(client.buildSubscribeRequest()).toEqual({ type: "STREAM_SUBSCRIBE" });

      const tuned = new FrameStreamClient({
        relayUrl: "http://relay.local:3001",
        channels: 2206,
        fps: 20,
      });
      expect(tuned.buildSubscribeRequest()).toEqual({
        type: "STREAM_SUBSCRIBE",
        channels: 2206,
        fps: 20,
      });
    });
  });

  it("starts disconnected and stays quiet when disconnecting without a socket", () => {
    const onStatus = vi.fn();
    client.onStatusChange(onStatus);

    client.disconnect();

    expect(client.getStatus()).toBe("disconnected");
    expect(onStatus).not.toHaveBeenCalled();
  });
});
