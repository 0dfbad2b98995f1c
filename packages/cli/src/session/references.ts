/**
 * Reference classification
 *
 * Decides whether a piece of text names an entity by id ("2", "#2") or points
 * back at one ("that post", "it"). Pure, so the parser can use it without
 * seeing any session state.
 */

export type ReferenceForm =
  | { kind: 'literal'; id: number }
  | { kind: 'anaphor' }
  | { kind: 'unrecognized' };

const LITERAL_RE = /^#?(\d+)$/;
const BARE_ANAPHORS = new Set(['it', 'that', 'this', 'that one', 'this one', 'the same', 'the same one']);
const DETERMINERS = ['that', 'this', 'the same', 'the previous', 'the last', 'same', 'previous', 'last', 'the'];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalize(surface: string): string {
  return surface.trim().toLowerCase().replace(/[.!?,;:]+$/, '').replace(/\s+/g, ' ');
}

export function classifyReference(entity: string, surface: string): ReferenceForm {
  const text = normalize(surface);

  const literal = LITERAL_RE.exec(text);
  if (literal) {
    return { kind: 'literal', id: Number(literal[1]) };
  }

  if (BARE_ANAPHORS.has(text)) {
    return { kind: 'anaphor' };
  }

  const kind = escapeRegExp(entity.toLowerCase());
  const pattern = new RegExp(`^(?:(?:${DETERMINERS.join('|')}) )?${kind}$`);
  return pattern.test(text) ? { kind: 'anaphor' } : { kind: 'unrecognized' };
}

/**
 * Matches "that post", "the previous post", ... inside a longer query.
 */
export function anaphorPattern(entity: string): RegExp {
  const kind = escapeRegExp(entity);
  return new RegExp(`\\b(?:that|this|the same|the previous|the last) ${kind}\\b`, 'gi');
}
