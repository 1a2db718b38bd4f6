import path from "path";
import { CaptureMeta } from "../types/captureMeta";
import { nowUtcIsoSeconds } from "../utils/time";
import { sha256 } from "../utils/hash";
import { writeBinary, writeJson } from "../utils/fs";

export interface DownloadOptions {
  url: string;
  /** When set, the raw body and its meta.json are kept there. */
  outDir: string | null;
  fileName: string;
  capturedAt?: string;
}

export interface DownloadResult {
  meta: CaptureMeta;
  buffer: Buffer;
  raw_path: string | null;
}

export async function downloadArtifact(options: DownloadOptions): Promise<DownloadResult> {
  const startTime = Date.now();
  const response = await fetch(options.url);
  if (!response.ok) {
    throw new Error(`Download failed (${response.status}) for ${options.url}`);
  }

  const arrayBuffer = await response.arrayBuffer();
  const buffer = Buffer.from(arrayBuffer);

  const meta: CaptureMeta = {
    captured_at: options.capturedAt ?? nowUtcIsoSeconds(),
    final_url: response.url || options.url,
    status_code: response.status,
    content_type: response.headers.get("content-type"),
    content_hash_sha256: sha256(buffer),
    byte_length: buffer.length,
    timings: {
      total_ms: Date.now() - startTime
    }
  };

  let rawPath: string | null = null;
  if (options.outDir) {
    rawPath = path.join(options.outDir, options.fileName);
    await writeBinary(rawPath, buffer);
    await writeJson(path.join(options.outDir, "meta.json"), meta);
  }

  return { meta, buffer, raw_path: rawPath };
}
