/**
 * Masking helpers for anything that leaves the process (tool output, logs).
 * Opaque workspace and user keys are partially hidden; long hex ids are dropped.
 */

const PROJECT_KEY_PATTERN = /project_[a-zA-Z0-9_]+/g;
const USER_KEY_PATTERN = /user_[a-zA-Z0-9_]+/g;
const HEX_ID_PATTERN = /\b[0-9a-f]{32,}\b/gi;

const MAX_ERROR_LINES = 3;
const MAX_ERROR_LENGTH = 200;

export function maskProjectKeys(text: string): string {
  return text.replace(PROJECT_KEY_PATTERN, 'project_***');
}

export function maskUserKeys(text: string): string {
  return text.replace(USER_KEY_PATTERN, 'user_***');
}

export function maskHexIds(text: string): string {
  return text.replace(HEX_ID_PATTERN, '***');
}

/** All key masks in one pass. */
export function maskIdentifiers(text: string): string {
  return maskHexIds(maskUserKeys(maskProjectKeys(text)));
}

/**
 * Keep the first `visible` characters of a secret-like value.
 * Values no longer than `visible` are hidden entirely.
 */
export function maskSensitive(value: string | undefined, visible = 4): string {
  if (!value) {
    return '';
  }
  if (value.length <= visible) {
    return '***';
  }
  return `${value.slice(0, visible)}***`;
}

/**
 * Reduce an error to a short, masked, single-paragraph message.
 * Stack frames are removed, at most 3 lines and 200 characters are kept.
 */
export function safeErrorMessage(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);
  const lines = raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('at ') && !line.startsWith('Traceback'))
    .slice(0, MAX_ERROR_LINES);
  let message = lines.join(' ');
  if (message.length > MAX_ERROR_LENGTH) {
    message = `${message.slice(0, MAX_ERROR_LENGTH)}...`;
  }
  return maskIdentifiers(message);
}
