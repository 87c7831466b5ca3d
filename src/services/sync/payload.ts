/**
 * Split a flat `"key":value,"key":value` body into fields.
 *
 * Separators only count at the top level: commas and colons inside quoted
 * strings or nested `{}` / `[]` stay part of the value, so timestamps such as
 * `"2024-08-12T16:35:00.000Z"` survive intact.
 */

import type { ParsedPayload, ReadingField } from "../../types/index.js";

/**
 * Split on `separator` outside quotes and brackets.
 * @param limit - stop after this many parts; the rest goes into the last one
 */
export function splitTopLevel(
  text: string,
  separator: string,
  limit = Number.POSITIVE_INFINITY
): string[] {
  const parts: string[] = [];
  let depth = 0;
  let inString = false;
  let escaped = false;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === "{" || char === "[") depth++;
    else if (char === "}" || char === "]") depth = Math.max(depth - 1, 0);
    else if (char === separator && depth === 0 && parts.length < limit - 1) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }

  parts.push(text.slice(start));
  return parts;
}

function unquote(text: string): string | null {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    return null;
  }
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === "string" ? value : null;
  } catch {
    return text.slice(1, -1);
  }
}

export function parsePayload(raw: string): ParsedPayload {
  const fields: ReadingField[] = [];
  const malformed: string[] = [];

  if (raw.trim() === "") {
    return { fields, malformed };
  }

  for (const part of splitTopLevel(raw, ",")) {
    const field = part.trim();
    if (field === "") continue;

    const [rawKey, rawValue] = splitTopLevel(field, ":", 2);
    const sensor = unquote(rawKey?.trim() ?? "");
    if (sensor === null || sensor === "" || rawValue === undefined) {
      malformed.push(field);
      continue;
    }

    const valueText = rawValue.trim();
    fields.push({ sensor, value: unquote(valueText) ?? valueText });
  }

  return { fields, malformed };
}
