import { RawOptionSchema } from '../../services/project/types.js';

/** Nesting limit for tree-select option sets. */
export const MAX_OPTION_DEPTH = 20;

/**
 * Flatten an option tree into `target` (trimmed label -> value).
 * Last write wins on label collisions; collisions, malformed entries and
 * depth overruns are reported through `warn`.
 */
export function flattenOptions(
  options: readonly unknown[],
  target: Map<string, string>,
  warn: (message: string) => void,
  depth = 0,
): void {
  if (depth > MAX_OPTION_DEPTH) {
    warn(`Option tree deeper than ${MAX_OPTION_DEPTH} levels; remaining levels skipped`);
    return;
  }
  for (const entry of options) {
    const parsed = RawOptionSchema.safeParse(entry);
    if (!parsed.success) {
      warn(`Skipping malformed option entry: ${JSON.stringify(entry)}`);
      continue;
    }
    const label = parsed.data.label?.trim();
    const value = parsed.data.value;
    if (label && value) {
      const existing = target.get(label);
      if (existing !== undefined && existing !== value) {
        warn(`Option label collision for '${label}': '${existing}' replaced by '${value}'`);
      }
      target.set(label, value);
    }
    const children = parsed.data.children;
    if (children && children.length > 0) {
      flattenOptions(children, target, warn, depth + 1);
    }
  }
}
