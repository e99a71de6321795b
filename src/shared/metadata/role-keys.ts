/**
 * Role key derivation.
 *
 * Roles are not listed by a dedicated endpoint; they appear as options of the
 * operator-role field, whose values embed the short role key. The format is a
 * service convention, so it sits behind an adapter.
 */

/** Field whose options enumerate the roles of an item type. */
export const OPERATOR_ROLE_FIELD_KEY = 'current_status_operator_role';

export interface RoleKeyAdapter {
  /** Field key whose options carry role names (labels) and role keys (values). */
  readonly sourceFieldKey: string;
  /** Short role key for an option value, or undefined to skip the option. */
  toRoleKey(optionValue: string): string | undefined;
}

/**
 * `role_67dc_670f_role_a06e00` -> `role_a06e00`; values already starting
 * with `role_` are kept; anything else gets `role_` before its last segment.
 */
export const suffixRoleKeyAdapter: RoleKeyAdapter = {
  sourceFieldKey: OPERATOR_ROLE_FIELD_KEY,
  toRoleKey(optionValue) {
    const value = optionValue.trim();
    if (value === '') {
      return undefined;
    }
    const parts = value.split('_');
    if (parts.length >= 2 && parts[parts.length - 2] === 'role') {
      return `role_${parts[parts.length - 1]}`;
    }
    if (value.startsWith('role_')) {
      return value;
    }
    const last = parts[parts.length - 1] ?? value;
    return last.startsWith('role') ? last : `role_${last}`;
  },
};

/** Role name -> role key from the source field's options (label -> value). */
export function buildRoleMap(
  options: ReadonlyMap<string, string> | undefined,
  adapter: RoleKeyAdapter,
): Map<string, string> {
  const roles = new Map<string, string>();
  if (!options) {
    return roles;
  }
  for (const [label, value] of options) {
    const key = adapter.toRoleKey(value);
    if (key) {
      roles.set(label, key);
    }
  }
  return roles;
}
