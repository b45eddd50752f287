import micromatch from 'micromatch';
import { ValidationError } from './errors.js';

/**
 * One position inside a path segment.
 * - char: a literal character
 * - any: `?`, exactly one character
 * - class: a `[...]` bracket expression, exactly one character
 * - star: `*`, any run of characters (including none)
 */
type SegmentToken =
  | { type: 'char'; value: string }
  | { type: 'any' }
  | { type: 'class'; source: string }
  | { type: 'star' };

type Segment = { type: 'globstar' } | { type: 'segment'; tokens: SegmentToken[] };

export const MAX_BRACE_ALTERNATIVES = 64;

// Printable ASCII, used to test whether two single-character sets intersect
const PROBE_CHARS = Array.from({ length: 95 }, (_, i) => String.fromCharCode(32 + i));

/**
 * Normalize a path pattern: backslashes to slashes, drop leading "./",
 * collapse duplicate slashes and strip a trailing slash.
 * @example normalizePattern("./src//lib/") -> "src/lib"
 */
export function normalizePattern(pattern: string): string {
  let normalized = pattern.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Check whether a pattern contains glob syntax.
 */
export function isGlob(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}

function tokenizeSegment(segment: string): SegmentToken[] {
  const tokens: SegmentToken[] = [];
  let i = 0;

  while (i < segment.length) {
    const ch = segment[i];
    if (ch === '*') {
      // Runs of stars inside a segment behave like a single star
      if (tokens[tokens.length - 1]?.type !== 'star') {
        tokens.push({ type: 'star' });
      }
      i++;
    } else if (ch === '?') {
      tokens.push({ type: 'any' });
      i++;
    } else if (ch === '[') {
      const close = segment.indexOf(']', i + 2);
      if (close === -1) {
        tokens.push({ type: 'char', value: ch });
        i++;
      } else {
        tokens.push({ type: 'class', source: segment.slice(i, close + 1) });
        i = close + 1;
      }
    } else if (ch === '\\' && i + 1 < segment.length) {
      tokens.push({ type: 'char', value: segment[i + 1] });
      i += 2;
    } else {
      tokens.push({ type: 'char', value: ch });
      i++;
    }
  }

  return tokens;
}

function parsePattern(pattern: string): Segment[] {
  return pattern
    .split('/')
    .filter(part => part.length > 0)
    .map((part): Segment => (part === '**' ? { type: 'globstar' } : { type: 'segment', tokens: tokenizeSegment(part) }));
}

function charMatches(token: SegmentToken, ch: string): boolean {
  switch (token.type) {
    case 'char':
      return token.value === ch;
    case 'any':
      return ch !== '/';
    case 'class':
      return micromatch.isMatch(ch, token.source, { dot: true });
    case 'star':
      return true;
  }
}

function isNegatedClass(token: SegmentToken): boolean {
  return token.type === 'class' && /^\[[!^]/.test(token.source);
}

// Characters written inside a class, range endpoints included
function classChars(token: SegmentToken): string[] {
  return token.type === 'class' ? Array.from(token.source.slice(1, -1)) : [];
}

/**
 * Whether two single-character tokens can match the same character.
 * A positive class is finite, so its own characters plus printable ASCII
 * are enough candidates; two overlapping ranges share an endpoint.
 */
function charsIntersect(a: SegmentToken, b: SegmentToken): boolean {
  if (a.type === 'char') return charMatches(b, a.value);
  if (b.type === 'char') return charMatches(a, b.value);
  if (a.type === 'any' && b.type === 'any') return true;

  // Negated classes exclude finitely many characters
  const openA = a.type === 'any' || isNegatedClass(a);
  const openB = b.type === 'any' || isNegatedClass(b);
  if (openA && openB) return true;

  const candidates = new Set([...PROBE_CHARS, ...classChars(a), ...classChars(b)]);
  for (const ch of candidates) {
    if (ch !== '/' && charMatches(a, ch) && charMatches(b, ch)) return true;
  }
  return false;
}

/**
 * Whether some string is matched by both token sequences.
 */
function segmentsIntersect(a: SegmentToken[], b: SegmentToken[]): boolean {
  const memo = new Map<number, boolean>();

  const visit = (i: number, j: number): boolean => {
    const key = i * (b.length + 1) + j;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result: boolean;
    if (i === a.length && j === b.length) {
      result = true;
    } else if (i < a.length && a[i].type === 'star') {
      // Star matches nothing, or swallows the next single character of b
      result = visit(i + 1, j) || (j < b.length && b[j].type !== 'star' && visit(i, j + 1));
      if (!result && j < b.length && b[j].type === 'star') {
        result = visit(i, j + 1);
      }
    } else if (j < b.length && b[j].type === 'star') {
      result = visit(i, j + 1) || (i < a.length && visit(i + 1, j));
    } else if (i < a.length && j < b.length) {
      result = charsIntersect(a[i], b[j]) && visit(i + 1, j + 1);
    } else {
      result = false;
    }

    memo.set(key, result);
    return result;
  };

  return visit(0, 0);
}

/**
 * Whether some path is matched by both segment sequences.
 * A globstar matches zero or more whole segments.
 */
function pathsIntersect(a: Segment[], b: Segment[]): boolean {
  const memo = new Map<number, boolean>();

  const visit = (i: number, j: number): boolean => {
    const key = i * (b.length + 1) + j;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result: boolean;
    const left = a[i];
    const right = b[j];
    if (i === a.length && j === b.length) {
      result = true;
    } else if (left?.type === 'globstar') {
      result = visit(i + 1, j) || (j < b.length && visit(i, j + 1));
    } else if (right?.type === 'globstar') {
      result = visit(i, j + 1) || (i < a.length && visit(i + 1, j));
    } else if (left && right) {
      result = segmentsIntersect(left.tokens, right.tokens) && visit(i + 1, j + 1);
    } else {
      result = false;
    }

    memo.set(key, result);
    return result;
  };

  return visit(0, 0);
}

/**
 * Expand brace sets ({a,b}, {1..3}) into plain alternatives.
 * @throws ValidationError above MAX_BRACE_ALTERNATIVES alternatives
 */
export function expandBraces(pattern: string): string[] {
  if (!/[{}]/.test(pattern)) return [pattern];

  let expanded: string[];
  try {
    expanded = micromatch.braces(pattern, { expand: true });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ValidationError(`Too many brace alternatives in pattern: ${pattern}`, 'INVALID_PATH_PATTERN');
    }
    throw error;
  }

  if (expanded.length > MAX_BRACE_ALTERNATIVES) {
    throw new ValidationError(
      `Pattern expands to ${expanded.length} alternatives; the limit is ${MAX_BRACE_ALTERNATIVES}`,
      'INVALID_PATH_PATTERN'
    );
  }
  return expanded.length > 0 ? expanded : [pattern];
}

/**
 * Check whether two path patterns can match a common file.
 * `*` stays within a segment, `**` crosses segments.
 * @example patternsOverlap("src/**", "src/foo.py") -> true
 * @example patternsOverlap("src/*.ts", "src/*.py") -> false
 * @example patternsOverlap("src/*", "src/lib/a.ts") -> false
 */
export function patternsOverlap(a: string, b: string): boolean {
  const left = normalizePattern(a);
  const right = normalizePattern(b);
  if (left === right) return true;

  if (!isGlob(left) && !isGlob(right)) {
    return false;
  }

  for (const altA of expandBraces(left)) {
    const segmentsA = parsePattern(altA);
    for (const altB of expandBraces(right)) {
      if (pathsIntersect(segmentsA, parsePattern(altB))) {
        return true;
      }
    }
  }

  return false;
}

/**
 * Get the file paths a pattern matches.
 */
export function matchingPaths(filePaths: string[], pattern: string): string[] {
  return micromatch(filePaths.map(normalizePattern), normalizePattern(pattern), { dot: true });
}
