import { createHash } from "crypto";

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function md5(content: string): string {
  return createHash("md5").update(content).digest("hex");
}
