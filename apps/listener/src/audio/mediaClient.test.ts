import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MediaElementAudioClient, mediaUrlFor } from "./mediaClient.js";

function createFakeElement() {
  return {
    src: "",
    currentTime: 0,
    playbackRate: 1,
    preservesPitch: false,
    play: vi.fn(() => Promise.resolve()),
    pause: vi.fn(),
  };
}

describe("MediaElementAudioClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("preserves pitch from the start", () => {
    const element = createFakeElement();
    new MediaElementAudioClient({ element, resolveMediaUrl: () => null });
    expect(element.preservesPitch).toBe(true);
  });

  it("loads and plays the item's media", () => {
    const element = createFakeElement();
    element.playbackRate = 1.02;
    const client = new MediaElementAudioClient({
      element,
      resolveMediaUrl: (itemId) => mediaUrlFor("https://show.example/media", itemId),
    });

    client.loadItem("Elvis.fseq");

    expect(element.src).toBe("https://show.example/media/Elvis.mp3");
    expect(element.playbackRate).toBe(1);
    expect(element.play).toHaveBeenCalledTimes(1);
  });

  it("pauses when an item has no media", () => {
    const element = createFakeElement();
    element.src = "https://show.example/media/Intro.mp3";
    const client = new MediaElementAudioClient({ element, resolveMediaUrl: () => null });

    client.loadItem("Elvis.fseq");

    expect(element.src).toBe("https://show.example/media/Intro.mp3");
    expect(element.pause).toHaveBeenCalledTimes(1);
    expect(element.play).not.toHaveBeenCalled();
  });

  it("applies hard seeks in seconds", () => {
    const element = createFakeElement();
    const client = new MediaElementAudioClient({ element, resolveMediaUrl: () => null });

    client.hardSeek(45_000);
    expect(element.currentTime).toBe(45);

    client.hardSeek(-200);
    expect(element.currentTime).toBe(0);
  });

  it("applies rate corrections and resets the rate on stop", () => {
    const element = createFakeElement();
    const client = new MediaElementAudioClient({ element, resolveMediaUrl: () => null });

    client.setRate(1.02);
    expect(element.playbackRate).toBe(1.02);
    expect(element.preservesPitch).toBe(true);

    client.stop();
    expect(element.pause).toHaveBeenCalledTimes(1);
    expect(element.playbackRate).toBe(1);
  });

  it("reports a refused play()", async () => {
    const element = createFakeElement();
    const refusal = new Error("NotAllowedError");
    element.play.mockImplementation(() => Promise.reject(refusal));
    const onPlaybackBlocked = vi.fn();
    const client = new MediaElementAudioClient({
      element,
      resolveMediaUrl: () => "https://show.example/media/Elvis.mp3",
      onPlaybackBlocked,
    });

    client.loadItem("Elvis.fseq");
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(onPlaybackBlocked).toHaveBeenCalledWith(refusal);
  });
});

describe("mediaUrlFor", () => {
  it("swaps the extension and escapes the name", () => {
    expect(mediaUrlFor("https://show.example/media/", "Holiday Mix.fseq")).toBe(
      "https://show.example/media/Holiday%20Mix.mp3"
    );
    expect(mediaUrlFor("/media", "shows/Elvis.fseq", ".ogg")).toBe("/media/Elvis.ogg");
  });
});
