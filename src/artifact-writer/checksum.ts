import { createHash } from "node:crypto";
import fs from "node:fs";

/** Hex sha256 of a serialized trace or manifest. */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Hex sha256 of a trace file as it is on disk. */
export function sha256OfFile(filePath: string): string {
  return sha256Hex(fs.readFileSync(filePath));
}
