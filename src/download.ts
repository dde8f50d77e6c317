import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import path from "node:path";

import {
  CONNECT_TIMEOUT_MS,
  DOWNLOAD_CHUNK_SIZE_BYTES,
  DOWNLOAD_USER_AGENT,
  FALLBACK_FILENAME,
} from "./constants.js";
import { describeError, type AvatarReasonCode } from "./shared.js";

const BYTES_PER_MB = 1024 * 1024;

export type DownloadProgress = {
  bytesDownloaded: number;
  /** `null` when the server sent no usable `Content-Length`. */
  totalBytes: number | null;
  /** Whole percent in [0, 100], or `null` while the total is unknown. */
  percent: number | null;
  elapsedMs: number;
};

export type DownloadProgressCallback = (progress: DownloadProgress) => void;

export type AvatarDownloadRequestOptions = {
  chunkSizeBytes?: number;
  connectTimeoutMs?: number;
  userAgent?: string;
  signal?: AbortSignal;
};

export type AvatarDownloadOutcome =
  | {
      ok: true;
      state: "downloaded";
      filePath: string;
      filename: string;
      bytesDownloaded: number;
      totalBytes: number | null;
      elapsedMs: number;
      /** Non-fatal problems, such as a progress callback that threw. */
      warnings: string[];
    }
  | {
      ok: false;
      state: "failed";
      reasonCode: AvatarReasonCode;
      message: string;
      status?: number;
      /** Set once the destination was opened; a partial file may remain there. */
      filePath?: string;
    };

type FailedOutcome = Extract<AvatarDownloadOutcome, { ok: false }>;

class FileWriteError extends Error {
  constructor(readonly cause: unknown) {
    super(describeError(cause, "write failed"));
    this.name = "FileWriteError";
  }
}

type OpenResponseResult =
  | { ok: true; response: Response }
  | { ok: false; status?: number; message: string };

function positiveOr(value: number | undefined, fallback: number) {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  const whole = Math.trunc(value);
  return whole > 0 ? whole : fallback;
}

function failed(reasonCode: AvatarReasonCode, message: string, extra?: { status?: number; filePath?: string }): FailedOutcome {
  return { ok: false, state: "failed", reasonCode, message, ...extra };
}

/**
 * Name of the file a download URL is saved under: the last path segment with query and fragment removed.
 */
export function deriveFilename(url: string): string {
  const withoutQuery = url.split(/[?#]/, 1)[0] ?? "";
  const segment = withoutQuery.slice(withoutQuery.lastIndexOf("/") + 1);
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = segment;
  }
  const candidate = path.basename(decoded.trim());
  if (!candidate || candidate === "." || candidate === "..") return FALLBACK_FILENAME;
  return candidate;
}

export function parseContentLength(value: string | null): number | null {
  if (value === null || !value.trim()) return null;
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed) || parsed <= 0) return null;
  return parsed;
}

export function computeProgressPercent(bytesDownloaded: number, totalBytes: number | null): number | null {
  if (totalBytes === null || totalBytes <= 0) return null;
  const capped = Math.min(Math.max(bytesDownloaded, 0), totalBytes);
  return Math.min(100, Math.floor((capped * 100) / totalBytes));
}

export function formatProgressReport(progress: DownloadProgress): string {
  const downloadedMb = (progress.bytesDownloaded / BYTES_PER_MB).toFixed(2);
  const seconds = (progress.elapsedMs / 1000).toFixed(2);
  if (progress.totalBytes === null || progress.percent === null) {
    return `Downloaded ${downloadedMb} MB in ${seconds} seconds`;
  }
  const totalMb = (progress.totalBytes / BYTES_PER_MB).toFixed(2);
  return `Downloaded ${progress.percent}% (${downloadedMb} MB / ${totalMb} MB) in ${seconds} seconds`;
}

async function openResponse(
  url: string,
  controller: AbortController,
  timeoutMs: number,
  userAgent: string,
): Promise<OpenResponseResult> {
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { "user-agent": userAgent, accept: "*/*" },
      redirect: "follow",
      signal: controller.signal,
    });

    if (!response.ok) {
      await response.body?.cancel().catch(() => undefined);
      return {
        ok: false,
        status: response.status,
        message: `Model download failed (${response.status}${response.statusText ? ` ${response.statusText}` : ""}).`,
      };
    }

    return { ok: true, response };
  } catch (error) {
    if (timedOut) {
      return { ok: false, message: `Model download timed out after ${timeoutMs} ms.` };
    }
    if (controller.signal.aborted) {
      return { ok: false, message: "Download was cancelled." };
    }
    return { ok: false, message: `Model download failed: ${describeError(error, "network request failed")}` };
  } finally {
    clearTimeout(timeout);
  }
}

async function writeFully(handle: FileHandle, bytes: Uint8Array) {
  let offset = 0;
  while (offset < bytes.byteLength) {
    const { bytesWritten } = await handle.write(bytes, offset, bytes.byteLength - offset);
    offset += bytesWritten;
  }
}

async function streamBodyToFile(input: {
  body: ReadableStream<Uint8Array> | null;
  handle: FileHandle;
  filePath: string;
  filename: string;
  chunkSize: number;
  totalBytes: number | null;
  startedAt: number;
  signal?: AbortSignal;
  onProgress?: DownloadProgressCallback;
}): Promise<AvatarDownloadOutcome> {
  const { handle, filePath, chunkSize, totalBytes, startedAt } = input;
  const chunk = new Uint8Array(chunkSize);
  let filled = 0;
  let bytesDownloaded = 0;
  const warnings: string[] = [];

  const report = () => {
    if (!input.onProgress) return;
    try {
      input.onProgress({
        bytesDownloaded,
        totalBytes,
        percent: computeProgressPercent(bytesDownloaded, totalBytes),
        elapsedMs: performance.now() - startedAt,
      });
    } catch (error) {
      const warning = `Progress callback failed: ${describeError(error, "unknown error")}`;
      if (!warnings.includes(warning)) warnings.push(warning);
    }
  };

  const flush = async () => {
    if (filled === 0) return;
    try {
      await writeFully(handle, chunk.subarray(0, filled));
    } catch (error) {
      throw new FileWriteError(error);
    }
    bytesDownloaded += filled;
    filled = 0;
    report();
  };

  // Writes the unflushed tail before a failed outcome; a write error only extends the message.
  const savePending = async (message: string) => {
    if (filled === 0) return message;
    try {
      await writeFully(handle, chunk.subarray(0, filled));
      filled = 0;
      return message;
    } catch (error) {
      return `${message} Received data could not be saved: ${describeError(error, "write failed")}`;
    }
  };

  const reader = input.body?.getReader() ?? null;
  try {
    while (reader) {
      if (input.signal?.aborted) {
        await reader.cancel().catch(() => undefined);
        return failed("network_error", await savePending("Download was cancelled."), { filePath });
      }

      const { done, value } = await reader.read();
      if (done) break;

      const piece: Uint8Array = value;
      let offset = 0;
      while (offset < piece.byteLength) {
        const take = Math.min(chunkSize - filled, piece.byteLength - offset);
        chunk.set(piece.subarray(offset, offset + take), filled);
        filled += take;
        offset += take;
        if (filled === chunkSize) await flush();
      }
    }
    await flush();
  } catch (error) {
    if (error instanceof FileWriteError) {
      await reader?.cancel().catch(() => undefined);
      return failed("filesystem_error", `Could not write ${filePath}: ${error.message}`, {
        filePath,
      });
    }
    if (input.signal?.aborted) {
      return failed("network_error", await savePending("Download was cancelled."), { filePath });
    }
    const message = await savePending(`Model download interrupted: ${describeError(error, "stream read failed")}`);
    return failed("network_error", message, { filePath });
  }

  return {
    ok: true,
    state: "downloaded",
    filePath,
    filename: input.filename,
    bytesDownloaded,
    totalBytes,
    elapsedMs: performance.now() - startedAt,
    warnings,
  };
}

/**
 * Streams `url` into `destinationDir`, one fixed-size chunk at a time.
 *
 * Expected failures come back as a `failed` outcome; a partially written file is left in place.
 */
export async function downloadAvatarFile(
  url: string,
  destinationDir: string,
  onProgress?: DownloadProgressCallback,
  options?: AvatarDownloadRequestOptions,
): Promise<AvatarDownloadOutcome> {
  const chunkSize = positiveOr(options?.chunkSizeBytes, DOWNLOAD_CHUNK_SIZE_BYTES);
  const timeoutMs = positiveOr(options?.connectTimeoutMs, CONNECT_TIMEOUT_MS);
  const userAgent = options?.userAgent ?? DOWNLOAD_USER_AGENT;
  const signal = options?.signal;
  const filename = deriveFilename(url);
  const filePath = path.join(destinationDir, filename);
  const startedAt = performance.now();

  if (signal?.aborted) {
    return failed("network_error", "Download was cancelled.");
  }

  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const opened = await openResponse(url, controller, timeoutMs, userAgent);
    if (!opened.ok) {
      return failed("network_error", opened.message, opened.status === undefined ? undefined : { status: opened.status });
    }

    const { response } = opened;
    const totalBytes = parseContentLength(response.headers.get("content-length"));

    let handle: FileHandle;
    try {
      handle = await open(filePath, "w");
    } catch (error) {
      await response.body?.cancel().catch(() => undefined);
      return failed("filesystem_error", `Could not create ${filePath}: ${describeError(error, "open failed")}`);
    }

    let outcome: AvatarDownloadOutcome = failed("filesystem_error", `Download into ${filePath} did not complete.`, {
      filePath,
    });
    try {
      outcome = await streamBodyToFile({
        body: response.body,
        handle,
        filePath,
        filename,
        chunkSize,
        totalBytes,
        startedAt,
        signal,
        onProgress,
      });
    } finally {
      const closeError = await handle.close().then(
        () => null,
        (error: unknown) => error,
      );
      if (closeError !== null && outcome.ok) {
        outcome = failed("filesystem_error", `Could not close ${filePath}: ${describeError(closeError, "close failed")}`, {
          filePath,
        });
      }
    }
    return outcome;
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }
}
