const CODE_FENCE_RE = /```json\n?|```\n?/gi;

export function stripMarkdownCodeFence(output: string): string {
  const trimmed = output.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(CODE_FENCE_RE, '').trim();
}

export interface JsonObjectMatch {
  value: Record<string, unknown>;
  start: number;
  end: number;
}

export interface JsonScan {
  /** Top-level `{...}` spans that parsed as JSON objects */
  objects: JsonObjectMatch[];
  /** Brace-delimited spans that did not parse, plus a trailing unclosed one */
  fragments: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find every top-level brace-balanced span in free text.
 * Braces inside JSON string literals don't count toward nesting.
 */
function findBraceSpans(text: string): { spans: Array<[number, number]>; unclosedAt: number } {
  const spans: Array<[number, number]> = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) {
        spans.push([start, i + 1]);
        start = -1;
      }
    }
  }

  return { spans, unclosedAt: depth > 0 ? start : -1 };
}

/**
 * Scan model output for JSON objects without trusting that the output is JSON.
 */
export function scanJsonObjects(output: string): JsonScan {
  const { spans, unclosedAt } = findBraceSpans(output);
  const objects: JsonObjectMatch[] = [];
  const fragments: string[] = [];

  for (const [start, end] of spans) {
    try {
      const value: unknown = JSON.parse(output.slice(start, end));
      if (isPlainObject(value)) {
        objects.push({ value, start, end });
      } else {
        fragments.push(output.slice(start, end));
      }
    } catch {
      fragments.push(output.slice(start, end));
    }
  }

  if (unclosedAt !== -1) {
    fragments.push(output.slice(unclosedAt));
  }

  return { objects, fragments };
}

