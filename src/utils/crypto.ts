import { createHash, randomBytes, randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";

export const SHA256_HEX_PATTERN = /^[a-f0-9]{64}$/;

export async function computeFileChecksum(filePath: string, signal?: AbortSignal): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath, { signal })) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function computeStringHash(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function generateShortId(): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let result = "";
  for (const byte of randomBytes(6)) {
    result += chars.charAt(byte % chars.length);
  }
  return result;
}

export function generateUUID(): string {
  return randomUUID();
}
