type JsonPrimitive = string | number | boolean | null;
type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const compareKeys = (a: unknown, b: unknown): number => {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a).localeCompare(String(b));
};

const normalizeForStableJson = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => normalizeForStableJson(entry));
  }
  if (
    value instanceof Float64Array ||
    value instanceof Float32Array ||
    value instanceof Int32Array ||
    value instanceof Uint8Array
  ) {
    return Array.from(value, (entry) => normalizeForStableJson(entry));
  }
  if (value instanceof Map) {
    // Maps become [key, value] pairs ordered by key; numeric keys sort numerically.
    return Array.from(value.entries())
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([k, v]) => [normalizeForStableJson(k), normalizeForStableJson(v)]);
  }
  if (isPlainObject(value)) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b));
    const out: Record<string, JsonValue> = {};
    for (const [k, v] of entries) {
      out[k] = normalizeForStableJson(v);
    }
    return out;
  }
  return String(value);
};

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(normalizeForStableJson(value));
}
