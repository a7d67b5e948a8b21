export interface JsonSpan {
  start: number;
  /** Exclusive. */
  end: number;
  text: string;
}

/**
 * Balanced top-level `[...]` spans in `text`, in order of appearance.
 *
 * Scanning starts at each `[` found outside an earlier span and tracks bracket
 * depth; `[` and `]` inside double-quoted strings (with backslash escapes) do
 * not count. Only square brackets are balanced, so `{` / `}` mismatches are
 * left for the JSON parser to report. A `[` that never closes is skipped and
 * scanning resumes at the next `[`. Quotes before a `[` are prose, not string
 * delimiters.
 */
export function findJsonArraySpans(text: string): JsonSpan[] {
  const spans: JsonSpan[] = [];
  let i = text.indexOf('[');

  while (i !== -1) {
    const end = scanArray(text, i);
    if (end === -1) {
      i = text.indexOf('[', i + 1);
      continue;
    }
    spans.push({ start: i, end, text: text.slice(i, end) });
    i = text.indexOf('[', end);
  }
  return spans;
}

function scanArray(text: string, start: number): number {
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '[') depth++;
    else if (ch === ']') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}
