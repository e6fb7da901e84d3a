import type { JsonObject, JsonValue } from "./json.mjs";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readJsonObject(value: JsonValue | undefined): JsonObject | null {
  return isJsonObject(value) ? value : null;
}

export function readJsonArray(value: JsonValue | undefined): readonly JsonValue[] | null {
  return Array.isArray(value) ? value : null;
}

export function readString(value: JsonValue | undefined): string | null {
  return typeof value === "string" ? value : null;
}

export function readNumber(value: JsonValue | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function readBoolean(value: JsonValue | undefined): boolean | null {
  return typeof value === "boolean" ? value : null;
}

export function readStringArray(value: JsonValue | undefined): string[] | null {
  const array = readJsonArray(value);
  if (array == null) {
    return null;
  }

  const strings: string[] = [];
  for (const item of array) {
    const str = readString(item);
    if (str == null) {
      return null;
    }
    strings.push(str);
  }

  return strings;
}
