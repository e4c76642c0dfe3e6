import { createHash } from "node:crypto";
import { stableJsonStringify } from "./stable-json";

export function sha256Hex(input: Buffer | string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function sha256Prefixed(input: Buffer | string): string {
  return `sha256:${sha256Hex(input)}`;
}

export function hashStableJson(value: unknown): string {
  return sha256Prefixed(Buffer.from(stableJsonStringify(value), "utf8"));
}
