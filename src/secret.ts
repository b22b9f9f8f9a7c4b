import { randomBytes } from "node:crypto";

export const MIN_SECRET_BYTES = 32;

/** Fresh session-signing key, hex encoded. */
export function generateSecret(bytes = MIN_SECRET_BYTES): string {
  if (!Number.isInteger(bytes) || bytes < MIN_SECRET_BYTES) {
    throw new RangeError(`secret needs at least ${MIN_SECRET_BYTES} bytes, got ${bytes}`);
  }
  return randomBytes(bytes).toString("hex");
}

export function maskSecret(secret: string): string {
  return `${secret.slice(0, 8)}…`;
}
