import crypto from "node:crypto";

export function sha256Base64(input: string): string {
  return crypto.createHash("sha256").update(input).digest("base64");
}

/** Case- and surrounding-whitespace-insensitive digest used as a cache key. */
export function contentKey(text: string): string {
  return sha256Base64(text.trim().toLowerCase());
}
