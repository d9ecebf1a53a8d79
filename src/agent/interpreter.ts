import type { Message, Part } from "../lib/types.ts";

const YOUTUBE_URL_PATTERN =
  /https?:\/\/(www\.)?(youtube\.com\/watch\?v=|youtu\.be\/)[\w\-=&]+/;

const YOUTUBE_HOSTS = new Set(["youtube.com", "www.youtube.com"]);

/**
 * Finds the YouTube URL the user most recently referred to.
 *
 * Parts are scanned newest first, and so are the items nested inside a data
 * part. Within a single text the first URL is taken.
 */
export function extractVideoReference(message: Message): string | undefined {
  for (const part of [...message.parts].reverse()) {
    const match = matchPart(part);
    if (match) return match;
  }
  return undefined;
}

function matchPart(part: Part): string | undefined {
  if (part.kind === "text") {
    return matchText(part.text);
  }

  if (part.kind !== "data" || !Array.isArray(part.data)) return undefined;

  for (const item of [...part.data].reverse()) {
    if (!isRecord(item)) continue;
    const text = item["text"];
    if (item["kind"] === "text" && typeof text === "string" && text) {
      const match = matchText(text);
      if (match) return match;
    }
  }
  return undefined;
}

function matchText(text: string): string | undefined {
  return YOUTUBE_URL_PATTERN.exec(text)?.[0];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveVideoId(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }

  const { hostname, pathname } = parsed;

  if (hostname === "youtu.be") {
    return pathname.slice(1) || undefined;
  }

  if (YOUTUBE_HOSTS.has(hostname)) {
    if (pathname === "/watch") {
      return parsed.searchParams.get("v") || undefined;
    }
    if (pathname.startsWith("/embed/") || pathname.startsWith("/v/")) {
      return pathname.split("/")[2] || undefined;
    }
  }

  return undefined;
}
