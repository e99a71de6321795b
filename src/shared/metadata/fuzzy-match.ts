/**
 * Best-effort option label matching.
 *
 * Strategies run in order and the first one that produces an outcome wins.
 * Under ambiguity nothing is picked: the candidates are returned instead.
 * Pure: no logging, no cache writes.
 */

export type FuzzyStrategy =
  | 'normalized'
  | 'symbol-normalized'
  | 'extreme-normalized'
  | 'unit-completion'
  | 'unique-substring';

export type FuzzyOutcome =
  | { kind: 'match'; label: string; value: string; strategy: FuzzyStrategy }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'none' };

interface PreparedInput {
  raw: string;
  normalized: string;
}

type Strategy = (
  input: PreparedInput,
  options: ReadonlyMap<string, string>,
) => FuzzyOutcome | undefined;

// ─────────────────────────────────────────────────────────────────────────────
// Normalizers
// ─────────────────────────────────────────────────────────────────────────────

/** Lower-case, trim, drop ASCII spaces. */
export function normalizeLabel(text: string): string {
  return text.toLowerCase().trim().replace(/ /g, '');
}

const ALL_WHITESPACE = /[\s\u00A0\u2000-\u200B\u202F\u205F\u3000]+/g;

const SYMBOL_FOLDS: ReadonlyArray<[string, string]> = [
  ['\uFF08', '('],
  ['\uFF09', ')'],
  ['\uFF0C', ','],
  ['\uFF1B', ';'],
  ['\uFF1A', ':'],
  ['\u00B0', ''],
  ['deg', ''],
];

/** Fold full-width punctuation and degree markers, remove every kind of whitespace. */
export function normalizeSymbols(text: string): string {
  let out = text.toLowerCase().replace(ALL_WHITESPACE, '');
  for (const [from, to] of SYMBOL_FOLDS) {
    out = out.split(from).join(to);
  }
  return out;
}

/** Letters, digits and underscore only. */
export function extremeNormalize(text: string): string {
  return text.replace(/[^\p{L}\p{N}_]/gu, '').toLowerCase();
}

const UNIT_SUFFIXES = new Set(['g', 'm', 'k', 't', 'p']);

// ─────────────────────────────────────────────────────────────────────────────
// Strategies
// ─────────────────────────────────────────────────────────────────────────────

function firstEqual(
  options: ReadonlyMap<string, string>,
  target: string,
  project: (label: string) => string,
  strategy: FuzzyStrategy,
): FuzzyOutcome | undefined {
  for (const [label, value] of options) {
    if (project(label) === target) {
      return { kind: 'match', label, value, strategy };
    }
  }
  return undefined;
}

const byNormalized: Strategy = (input, options) =>
  firstEqual(options, input.normalized, normalizeLabel, 'normalized');

const bySymbols: Strategy = (input, options) =>
  firstEqual(options, normalizeSymbols(input.raw), normalizeSymbols, 'symbol-normalized');

const byExtreme: Strategy = (input, options) => {
  const cleaned = extremeNormalize(input.raw);
  if (cleaned === '') {
    return undefined;
  }
  return firstEqual(options, cleaned, extremeNormalize, 'extreme-normalized');
};

const byUnitCompletion: Strategy = (input, options) => {
  const last = input.normalized.slice(-1);
  if (!UNIT_SUFFIXES.has(last)) {
    return undefined;
  }
  return firstEqual(options, `${input.normalized}b`, normalizeLabel, 'unit-completion');
};

const byUniqueSubstring: Strategy = (input, options) => {
  const candidates: Array<[string, string]> = [];
  for (const [label, value] of options) {
    const normalized = normalizeLabel(label);
    if (normalized.includes(input.normalized) || input.normalized.includes(normalized)) {
      candidates.push([label, value]);
    }
  }
  const [only] = candidates;
  if (candidates.length === 1 && only) {
    return { kind: 'match', label: only[0], value: only[1], strategy: 'unique-substring' };
  }
  if (candidates.length > 1) {
    return { kind: 'ambiguous', candidates: candidates.map(([label]) => label) };
  }
  return undefined;
};

const STRATEGIES: readonly Strategy[] = [
  byNormalized,
  bySymbols,
  byExtreme,
  byUnitCompletion,
  byUniqueSubstring,
];

/**
 * Match `target` against `options` (label -> value).
 *
 * @example
 * fuzzyMatchOption('32g', new Map([['32 GB', 'opt_32']]));
 * // { kind: 'match', label: '32 GB', value: 'opt_32', strategy: 'unit-completion' }
 */
export function fuzzyMatchOption(
  target: string,
  options: ReadonlyMap<string, string>,
): FuzzyOutcome {
  const input: PreparedInput = {
    raw: target.toLowerCase().trim(),
    normalized: normalizeLabel(target),
  };
  if (input.normalized === '') {
    return { kind: 'none' };
  }
  for (const strategy of STRATEGIES) {
    const outcome = strategy(input, options);
    if (outcome) {
      return outcome;
    }
  }
  return { kind: 'none' };
}
