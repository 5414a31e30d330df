// backend/services/shared/src/http/jsonFraming.ts

const WS = new Set([" ", "\t", "\n", "\r"]);

/**
 * Index just past the first top-level object or array in `text`, or -1 when
 * the text does not open with one or never closes it. Brackets inside string
 * literals are skipped. The slice is not validated here; JSON.parse does that.
 */
export function firstValueEnd(text: string): number {
  let i = 0;
  while (i < text.length && WS.has(text[i])) i++;
  if (text[i] !== "{" && text[i] !== "[") return -1;

  let depth = 0;
  let inString = false;
  for (; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** True when `text` holds one valid JSON value followed by anything but whitespace. */
export function hasTrailingData(text: string): boolean {
  const end = firstValueEnd(text);
  if (end < 0) return false;
  const rest = text.slice(end);
  if ([...rest].every((ch) => WS.has(ch))) return false;
  try {
    JSON.parse(text.slice(0, end));
    return true;
  } catch {
    // first value itself is malformed
    return false;
  }
}
