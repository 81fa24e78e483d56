import { createHmac } from "node:crypto";

/**
 * JSON with object keys sorted at every depth and `", "` / `": "` separators,
 * non-ASCII escaped as \uXXXX. Matches the encoding the API side signs.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    const encoded = JSON.stringify(value);
    if (encoded === undefined) {
      throw new Error(`Cannot canonicalize value of type ${typeof value}`);
    }
    return escapeNonAscii(encoded);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(", ")}]`;
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${escapeNonAscii(JSON.stringify(key))}: ${canonicalJson(item)}`);
  return `{${entries.join(", ")}}`;
}

export function signPayload(payload: unknown, secret: string): string {
  return createHmac("sha256", secret).update(canonicalJson(payload)).digest("hex");
}

function escapeNonAscii(encoded: string): string {
  return encoded.replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
}
