import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("youtube-transcript", () => {
  class YoutubeTranscriptError extends Error {}
  return {
    YoutubeTranscript: { fetchTranscript: vi.fn() },
    YoutubeTranscriptError,
    YoutubeTranscriptTooManyRequestError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptDisabledError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableLanguageError: class extends YoutubeTranscriptError {},
  };
});

import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
} from "youtube-transcript";
import { createTranscriptProvider } from "../../src/transcript/index.ts";
import { TranscriptFetchError, TranscriptUnavailableError } from "../../src/lib/errors.ts";

const mockFetch = vi.mocked(YoutubeTranscript.fetchTranscript);

describe("createTranscriptProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("joins segment texts with single spaces in order", async () => {
    mockFetch.mockResolvedValue([
      { text: "hello", duration: 1, offset: 0 },
      { text: "brave new", duration: 1, offset: 1 },
      { text: "world", duration: 1, offset: 2 },
    ]);

    const provider = createTranscriptProvider();
    const text = await provider.fetchTranscript("vid123");

    expect(text).toBe("hello brave new world");
    expect(mockFetch).toHaveBeenCalledWith("vid123", undefined);
  });

  it("passes the configured language", async () => {
    mockFetch.mockResolvedValue([{ text: "hallo", duration: 1, offset: 0 }]);

    const provider = createTranscriptProvider({ lang: "de" });
    await provider.fetchTranscript("vid123");

    expect(mockFetch).toHaveBeenCalledWith("vid123", { lang: "de" });
  });

  it("returns an empty string for an empty transcript", async () => {
    mockFetch.mockResolvedValue([]);
    const provider = createTranscriptProvider();
    await expect(provider.fetchTranscript("vid123")).resolves.toBe("");
  });

  it.each([
    ["captions disabled", () => new YoutubeTranscriptDisabledError("vid123")],
    ["no transcript", () => new YoutubeTranscriptNotAvailableError("vid123")],
    [
      "language missing",
      () => new YoutubeTranscriptNotAvailableLanguageError("de", ["en"], "vid123"),
    ],
  ])("maps %s to TranscriptUnavailableError", async (_label, makeError) => {
    const cause = makeError();
    mockFetch.mockRejectedValue(cause);

    const provider = createTranscriptProvider();
    const err = await provider.fetchTranscript("vid123").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TranscriptUnavailableError);
    expect(err).toMatchObject({
      message: "A transcript is not available for this video. Captions may be disabled.",
      code: "TRANSCRIPT_UNAVAILABLE",
      cause,
    });
  });

  it("maps other library errors to TranscriptFetchError", async () => {
    mockFetch.mockRejectedValue(new YoutubeTranscriptTooManyRequestError());

    const provider = createTranscriptProvider();
    await expect(provider.fetchTranscript("vid123")).rejects.toBeInstanceOf(
      TranscriptFetchError,
    );
  });

  it("maps network failures to TranscriptFetchError", async () => {
    const cause = new Error("fetch failed");
    mockFetch.mockRejectedValue(cause);

    const provider = createTranscriptProvider();
    const err = await provider.fetchTranscript("vid123").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TranscriptFetchError);
    expect(err).toMatchObject({
      message: "An unexpected error occurred while trying to get the video transcript.",
      cause,
    });
  });
});
