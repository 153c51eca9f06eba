/**
 * Snapshot fetch: one GET against the feed URL, no retries
 */

import { apiError, errorMessage } from "../utils/errors";

export interface FetchSnapshotOptions {
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Downloads the snapshot text.
 *
 * @throws API_ERROR on network failure, timeout, non-2xx status, or a media type other than text/plain
 */
export async function fetchSnapshot(url: string, options: FetchSnapshotOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw apiError(`Snapshot request to ${url} failed: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    throw apiError(`Snapshot request to ${url} returned HTTP ${response.status}`, response.status);
  }

  const contentType = response.headers.get("content-type") ?? "";
  const mediaType = contentType.split(";", 1)[0].trim().toLowerCase();
  if (mediaType !== "text/plain") {
    throw apiError(`Expected 'text/plain' from ${url}, got '${mediaType || "none"}'`, response.status);
  }

  return response.text();
}
