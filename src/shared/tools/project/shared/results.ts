import { ToolErrorOutputSchema } from '../../../../schemas/outputs.js';
import { logger } from '../../../../utils/logger.js';
import { maskIdentifiers, safeErrorMessage } from '../../../../utils/masking.js';
import { MetadataError } from '../../../metadata/errors.js';
import type { ToolResult } from '../../types.js';

/**
 * Failure response for a tool. Known errors keep their code, hint and
 * suggestion; anything else is reduced to a short masked message.
 */
export async function errorResult(tool: string, action: string, error: unknown): Promise<ToolResult> {
  const message = safeErrorMessage(error);
  await logger.error(tool, { message: `${action} failed`, error: message });

  const structured = ToolErrorOutputSchema.parse(
    error instanceof MetadataError
      ? {
          error: error.name,
          code: error.code,
          message,
          hint: error.hint === undefined ? undefined : maskIdentifiers(error.hint),
          suggestion: error.suggestion,
        }
      : { error: 'Error', code: 'INTERNAL_ERROR', message },
  );

  const lines = [`${action} failed: ${message}`];
  if (structured.hint) {
    lines.push(`Hint: ${structured.hint}`);
  }
  if (structured.suggestion) {
    lines.push(`Suggestion: ${structured.suggestion}`);
  }

  return {
    isError: true,
    content: [{ type: 'text', text: lines.join('\n') }],
    structuredContent: structured,
  };
}

/** Comma-separated input to a list of trimmed, non-empty values. */
export function splitCommaList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');
  return parts.length > 0 ? parts : undefined;
}
