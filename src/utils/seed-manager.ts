import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex chars fit an unsigned 32-bit seed
  return parseInt(hash.slice(0, 8), 16);
}

/**
 * Stable hex digest of `value`, truncated to `length` characters.
 */
export function stableHexId(value: string, length: number = 24): string {
  return crypto.createHash("sha256").update(value).digest("hex").slice(0, length);
}
