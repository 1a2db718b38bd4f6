export interface CaptureTimings {
  total_ms: number;
}

export interface CaptureMeta {
  captured_at: string;
  final_url: string;
  status_code: number;
  content_type: string | null;
  content_hash_sha256: string;
  byte_length: number;
  timings: CaptureTimings;
}
