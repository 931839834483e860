import { fetch } from "undici";

import type { FetchResult } from "./types";

const REQUEST_HEADERS = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "accept-language": "en-US,en;q=0.9",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

export async function fetchPageText(url: string, timeoutMs: number): Promise<FetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: REQUEST_HEADERS,
    });

    if (!response.ok) {
      return { ok: false, reason: `HTTP_${response.status}` };
    }

    // Invalid UTF-8 sequences become U+FFFD instead of throwing.
    const bytes = await response.arrayBuffer();
    return { ok: true, text: new TextDecoder("utf-8").decode(bytes) };
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, reason: "FETCH_TIMEOUT" };
    }
    return { ok: false, reason: `FETCH_ERROR:${error instanceof Error ? error.message : String(error)}` };
  } finally {
    clearTimeout(timeout);
  }
}
