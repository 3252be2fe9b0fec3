import { createHash } from "node:crypto";

export function sha256HexBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function canonicalJson(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  }
  if (typeof value === "object") {
    const obj = value as Record<string, unknown>;
    const keys = Object.keys(obj).sort();
    const parts = keys.map((k) => {
      return JSON.stringify(k) + ":" + canonicalJson(obj[k]);
    });
    return "{" + parts.join(",") + "}";
  }
  return JSON.stringify(value);
}

/** Stable digest of a JSON-shaped value: equal values hash equal regardless of key order. */
export function canonicalSha256(value: unknown): string {
  return createHash("sha256").update(Buffer.from(canonicalJson(value), "utf8")).digest("hex");
}
