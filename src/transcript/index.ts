import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
} from "youtube-transcript";
import { createChildLogger } from "../lib/logger.ts";
import { TranscriptFetchError, TranscriptUnavailableError } from "../lib/errors.ts";

const log = createChildLogger("transcript");

export interface TranscriptProvider {
  fetchTranscript(videoId: string): Promise<string>;
}

export function createTranscriptProvider(opts: { lang?: string } = {}): TranscriptProvider {
  const { lang } = opts;

  return {
    async fetchTranscript(videoId: string): Promise<string> {
      try {
        const segments = await YoutubeTranscript.fetchTranscript(
          videoId,
          lang ? { lang } : undefined,
        );
        log.debug({ videoId, segments: segments.length }, "Transcript fetched");
        return segments.map((segment) => segment.text).join(" ");
      } catch (err) {
        if (isUnavailable(err)) {
          log.info({ videoId, err }, "No transcript available");
          throw new TranscriptUnavailableError(
            "A transcript is not available for this video. Captions may be disabled.",
            err,
          );
        }
        log.error({ videoId, err }, "Transcript fetch failed");
        throw new TranscriptFetchError(
          "An unexpected error occurred while trying to get the video transcript.",
          err,
        );
      }
    },
  };
}

function isUnavailable(err: unknown): boolean {
  return (
    err instanceof YoutubeTranscriptDisabledError ||
    err instanceof YoutubeTranscriptNotAvailableError ||
    err instanceof YoutubeTranscriptNotAvailableLanguageError
  );
}
