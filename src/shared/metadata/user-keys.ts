/**
 * Heuristic for identifiers that already are opaque user keys.
 * Not a validation: a false positive only skips one search call.
 */

const USER_KEY_PREFIXES = ['user_', 'ou_', 'usr_', 'u_'] as const;
const CJK = /[\u4e00-\u9fff]/;
const KEY_CHARSET = /^[A-Za-z0-9_-]+$/;

export function looksLikeUserKey(identifier: string): boolean {
  if (!identifier) {
    return false;
  }
  if (USER_KEY_PREFIXES.some((prefix) => identifier.startsWith(prefix))) {
    return true;
  }
  if (/\s/.test(identifier) || CJK.test(identifier)) {
    return false;
  }
  return identifier.length >= 5 && identifier.length <= 100 && KEY_CHARSET.test(identifier);
}
