/**
 * Text summaries for tool responses. The structured payload carries the
 * data; these lines are what a reader sees first.
 */

const DEFAULT_PREVIEW_LIMIT = 5;

export function previewLinesFromItems<T>(
  items: readonly T[],
  format: (item: T) => string,
  limit = DEFAULT_PREVIEW_LIMIT,
): string[] {
  const lines = items.slice(0, limit).map((item) => `- ${format(item)}`);
  if (items.length > limit) {
    lines.push(`- ... and ${items.length - limit} more`);
  }
  return lines;
}

export function summarizeList(args: {
  subject: string;
  count: number;
  total?: number;
  pageNum?: number;
  previewLines?: string[];
  nextSteps?: string[];
}): string {
  const { subject, count, total, pageNum, previewLines = [], nextSteps = [] } = args;
  let head = `${subject}: ${count}`;
  if (total !== undefined && total !== count) {
    head += ` of ${total}`;
  }
  if (pageNum !== undefined) {
    head += ` (page ${pageNum})`;
  }
  const parts = [`${head}.`];
  if (previewLines.length > 0) {
    parts.push(previewLines.join('\n'));
  }
  if (nextSteps.length > 0) {
    parts.push(`Next: ${nextSteps.join(' ')}`);
  }
  return parts.join('\n\n');
}

export interface BatchFailure {
  id: string;
  error: string;
}

export function summarizeBatch(args: {
  action: string;
  ok: number;
  total: number;
  failures?: BatchFailure[];
}): string {
  const { action, ok, total, failures = [] } = args;
  const lines = [`${action}: ${ok} / ${total} succeeded.`];
  for (const failure of failures) {
    lines.push(`- ${failure.id}: ${failure.error}`);
  }
  return lines.join('\n');
}
