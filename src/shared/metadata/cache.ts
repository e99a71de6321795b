/**
 * Metadata cache: human-readable names to opaque keys.
 *
 * Levels (each an independent BucketStore, each bucket TTL-scoped):
 * - workspaces: one bucket, name -> key, every listed workspace
 * - types: one bucket per workspace, name -> key, at most 50 workspaces
 * - fields: one bucket per (workspace, type) holding names, aliases, types,
 *   flattened options and roles
 * - user search: one bucket per searched identifier
 * - user names: one bucket per user key
 *
 * A workspace or type name missing from a cached bucket triggers one shared
 * reload of that bucket before NotFound is raised.
 *
 * Constructed explicitly and injected; there is no shared instance.
 */

import type { ProjectApis } from '../../services/project/api/index.js';
import type { RawUser } from '../../services/project/types.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { BucketStore, type BucketStoreStats } from './bucket-store.js';
import { notFoundError } from './errors.js';
import { type FuzzyStrategy, fuzzyMatchOption } from './fuzzy-match.js';
import { flattenOptions } from './options.js';
import { buildRoleMap, type RoleKeyAdapter, suffixRoleKeyAdapter } from './role-keys.js';
import { looksLikeUserKey } from './user-keys.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MetadataCacheTtls {
  workspacesMs: number;
  typesMs: number;
  fieldsMs: number;
  usersMs: number;
}

export const DEFAULT_TTLS: MetadataCacheTtls = {
  workspacesMs: 60 * 60 * 1000,
  typesMs: 30 * 60 * 1000,
  fieldsMs: 30 * 60 * 1000,
  usersMs: 30 * 60 * 1000,
};

/** Workspaces whose type lists are held at once. */
export const WORKSPACE_CACHE_LIMIT = 50;

/** Field bundles held at once, across workspaces. */
export const FIELD_CACHE_LIMIT = 200;

/** User search and user name buckets held at once, per store. */
export const USER_CACHE_LIMIT = 500;

/** Field names listed in a field NotFound error. */
const FIELD_HINT_LIMIT = 10;

/** Prefix of opaque field keys; such inputs pass through unresolved. */
const FIELD_KEY_PREFIX = 'field_';

/** Everything known about the fields of one (workspace, type) pair. */
export interface FieldBundle {
  /** field name and alias -> field key */
  readonly byName: ReadonlyMap<string, string>;
  readonly nameByKey: ReadonlyMap<string, string>;
  readonly typeByKey: ReadonlyMap<string, string>;
  /** field key -> (option label -> option value) */
  readonly optionsByKey: ReadonlyMap<string, ReadonlyMap<string, string>>;
  /** role name -> role key */
  readonly roles: ReadonlyMap<string, string>;
}

interface UserSearchBucket {
  /** name_cn / name_en / email -> user key */
  readonly identifiers: ReadonlyMap<string, string>;
  /** user key -> display name */
  readonly names: ReadonlyMap<string, string>;
  readonly firstKey: string;
}

export type OptionMatch =
  | {
      kind: 'match';
      label: string;
      value: string;
      strategy: 'exact' | 'value' | FuzzyStrategy;
    }
  | { kind: 'ambiguous'; candidates: string[]; available: string[] }
  | { kind: 'none'; available: string[] };

export interface MetadataCacheOptions {
  apis: Pick<ProjectApis, 'workspaces' | 'types' | 'fields' | 'users'>;
  ttls?: Partial<MetadataCacheTtls>;
  workspaceLimit?: number;
  roleKeyAdapter?: RoleKeyAdapter;
  now?: () => number;
  logger?: Logger;
}

/** `input` itself when it is already one of the bucket's keys. */
function keyPassthrough(map: ReadonlyMap<string, string>, input: string): string | undefined {
  for (const value of map.values()) {
    if (value === input) {
      return value;
    }
  }
  return undefined;
}

function displayName(user: RawUser): string | undefined {
  return user.name_cn || user.name_en || user.name || undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache
// ─────────────────────────────────────────────────────────────────────────────

export class MetadataCache {
  private readonly apis: MetadataCacheOptions['apis'];
  private readonly workspaceLimit: number;
  private readonly roleKeyAdapter: RoleKeyAdapter;
  private readonly log: Logger;

  private readonly workspaces: BucketStore<ReadonlyMap<string, string>>;
  private readonly types: BucketStore<ReadonlyMap<string, string>>;
  private readonly fields: BucketStore<FieldBundle>;
  private readonly userSearch: BucketStore<UserSearchBucket>;
  private readonly userNames: BucketStore<string>;

  constructor(options: MetadataCacheOptions) {
    const ttls = { ...DEFAULT_TTLS, ...options.ttls };
    const now = options.now;
    this.apis = options.apis;
    this.workspaceLimit = options.workspaceLimit ?? WORKSPACE_CACHE_LIMIT;
    this.roleKeyAdapter = options.roleKeyAdapter ?? suffixRoleKeyAdapter;
    this.log = options.logger ?? rootLogger;

    this.workspaces = new BucketStore({ name: 'workspaces', ttlMs: ttls.workspacesMs, now });
    this.types = new BucketStore({
      name: 'types',
      ttlMs: ttls.typesMs,
      maxBuckets: this.workspaceLimit,
      now,
    });
    this.fields = new BucketStore({
      name: 'fields',
      ttlMs: ttls.fieldsMs,
      maxBuckets: FIELD_CACHE_LIMIT,
      now,
    });
    this.userSearch = new BucketStore({
      name: 'user-search',
      ttlMs: ttls.usersMs,
      maxBuckets: USER_CACHE_LIMIT,
      now,
    });
    this.userNames = new BucketStore({
      name: 'user-names',
      ttlMs: ttls.usersMs,
      maxBuckets: USER_CACHE_LIMIT,
      now,
    });
  }

  // ─── Workspaces ────────────────────────────────────────────────────────────

  private loadWorkspaces = async (): Promise<ReadonlyMap<string, string>> => {
    const keys = await this.apis.workspaces.listKeys();
    const details = await this.apis.workspaces.getDetails(keys);
    const map = new Map<string, string>();
    for (const { key, name } of details) {
      map.set(name, key);
    }
    await this.log.debug('workspace_cache_loaded', { count: map.size });
    return map;
  };

  private workspaceMap(): Promise<ReadonlyMap<string, string>> {
    return this.workspaces.get('all', this.loadWorkspaces);
  }

  /**
   * Runs `find` against a name -> key bucket. When the bucket was already
   * cached and `find` misses, the bucket is reloaded once (shared with any
   * concurrent miss) and searched again. The returned map is the one last
   * searched.
   */
  private async findWithReload(
    store: BucketStore<ReadonlyMap<string, string>>,
    bucketKey: string,
    load: () => Promise<ReadonlyMap<string, string>>,
    find: (map: ReadonlyMap<string, string>) => string | undefined,
  ): Promise<{ key: string | undefined; map: ReadonlyMap<string, string> }> {
    const wasCached = store.peek(bucketKey) !== undefined;
    const map = await store.get(bucketKey, load);
    const key = find(map);
    if (key !== undefined || !wasCached) {
      return { key, map };
    }

    const reloaded = await store.refresh(bucketKey, load);
    await this.log.debug('cache_miss_reloaded', { store: store.name, bucket: bucketKey });
    return { key: find(reloaded), map: reloaded };
  }

  /** Workspace name -> key. */
  async listWorkspaces(): Promise<Map<string, string>> {
    return new Map(await this.workspaceMap());
  }

  async resolveWorkspaceKey(name: string): Promise<string> {
    const { key, map } = await this.findWithReload(
      this.workspaces,
      'all',
      this.loadWorkspaces,
      (names) => names.get(name) ?? names.get(name.trim()) ?? keyPassthrough(names, name),
    );
    if (key !== undefined) {
      return key;
    }
    throw notFoundError('workspace', name, [...map.keys()]);
  }

  // ─── Item types ────────────────────────────────────────────────────────────

  private async loadTypes(workspaceKey: string): Promise<ReadonlyMap<string, string>> {
    const types = await this.apis.types.list(workspaceKey);
    const map = new Map<string, string>();
    for (const t of types) {
      map.set(t.name, t.key);
    }
    await this.log.debug('type_cache_loaded', { workspaceKey, count: map.size });
    return map;
  }

  private typeMap(workspaceKey: string): Promise<ReadonlyMap<string, string>> {
    return this.types.get(workspaceKey, () => this.loadTypes(workspaceKey));
  }

  /** Item type name -> key, in service order. */
  async listTypes(workspaceKey: string): Promise<Map<string, string>> {
    return new Map(await this.typeMap(workspaceKey));
  }

  async resolveTypeKey(workspaceKey: string, typeName: string): Promise<string> {
    const { key, map } = await this.findWithReload(
      this.types,
      workspaceKey,
      () => this.loadTypes(workspaceKey),
      (names) => names.get(typeName) ?? keyPassthrough(names, typeName),
    );
    if (key !== undefined) {
      return key;
    }
    throw notFoundError('type', typeName, [...map.keys()]);
  }

  // ─── Fields ────────────────────────────────────────────────────────────────

  private fieldBundle(workspaceKey: string, typeKey: string): Promise<FieldBundle> {
    return this.fields.get(`${workspaceKey}::${typeKey}`, () =>
      this.loadFieldBundle(workspaceKey, typeKey),
    );
  }

  private async loadFieldBundle(workspaceKey: string, typeKey: string): Promise<FieldBundle> {
    const definitions = await this.apis.fields.listAll(workspaceKey, typeKey);
    const byName = new Map<string, string>();
    const nameByKey = new Map<string, string>();
    const typeByKey = new Map<string, string>();
    const optionsByKey = new Map<string, Map<string, string>>();
    const warnings: string[] = [];

    for (const def of definitions) {
      const name = def.field_name?.trim();
      const key = def.field_key ?? undefined;
      const alias = def.field_alias?.trim();

      if (name && key) {
        byName.set(name, key);
        if (!nameByKey.has(key)) {
          nameByKey.set(key, name);
        }
        if (alias) {
          byName.set(alias, key);
        }
      }
      if (key && def.field_type_key) {
        typeByKey.set(key, def.field_type_key);
      }
      if (key && def.options && def.options.length > 0) {
        const options = new Map<string, string>();
        flattenOptions(def.options, options, (message) =>
          warnings.push(`${key}: ${message}`),
        );
        optionsByKey.set(key, options);
      }
    }

    for (const message of warnings) {
      await this.log.warning('field_options', { workspaceKey, typeKey, message });
    }

    const roles = buildRoleMap(
      optionsByKey.get(this.roleKeyAdapter.sourceFieldKey),
      this.roleKeyAdapter,
    );
    await this.log.debug('field_cache_loaded', {
      workspaceKey,
      typeKey,
      fields: nameByKey.size,
      roles: roles.size,
    });
    return { byName, nameByKey, typeByKey, optionsByKey, roles };
  }

  /**
   * Field name or alias -> key. Order: exact name/alias, whitespace-insensitive
   * name, key passthrough, `field_`-prefixed passthrough for fields the
   * metadata omits.
   */
  async resolveFieldKey(workspaceKey: string, typeKey: string, nameOrAlias: string): Promise<string> {
    const bundle = await this.fieldBundle(workspaceKey, typeKey);

    const exact = bundle.byName.get(nameOrAlias);
    if (exact !== undefined) {
      return exact;
    }

    const trimmed = nameOrAlias.trim();
    for (const [name, key] of bundle.byName) {
      if (name.trim() === trimmed) {
        await this.log.info('field_match_trimmed', { input: nameOrAlias, name });
        return key;
      }
    }

    if (bundle.nameByKey.has(nameOrAlias) || bundle.typeByKey.has(nameOrAlias)) {
      return nameOrAlias;
    }

    if (nameOrAlias.startsWith(FIELD_KEY_PREFIX)) {
      await this.log.warning('field_key_passthrough', { fieldKey: nameOrAlias });
      return nameOrAlias;
    }

    throw notFoundError('field', nameOrAlias, [...bundle.byName.keys()].slice(0, FIELD_HINT_LIMIT));
  }

  /** Field name -> key (aliases included). */
  async listFields(workspaceKey: string, typeKey: string): Promise<Map<string, string>> {
    return new Map((await this.fieldBundle(workspaceKey, typeKey)).byName);
  }

  async hasField(workspaceKey: string, typeKey: string, nameOrAlias: string): Promise<boolean> {
    try {
      await this.resolveFieldKey(workspaceKey, typeKey, nameOrAlias);
      return true;
    } catch (error) {
      await this.log.debug('field_missing', {
        field: nameOrAlias,
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async resolveFieldName(
    workspaceKey: string,
    typeKey: string,
    fieldKey: string,
  ): Promise<string | undefined> {
    return (await this.fieldBundle(workspaceKey, typeKey)).nameByKey.get(fieldKey);
  }

  async resolveFieldType(
    workspaceKey: string,
    typeKey: string,
    fieldKey: string,
  ): Promise<string | undefined> {
    return (await this.fieldBundle(workspaceKey, typeKey)).typeByKey.get(fieldKey);
  }

  // ─── Options ───────────────────────────────────────────────────────────────

  /** Option label -> value for one field; empty when the field has no options. */
  async listOptions(workspaceKey: string, typeKey: string, fieldKey: string): Promise<Map<string, string>> {
    const bundle = await this.fieldBundle(workspaceKey, typeKey);
    return new Map(bundle.optionsByKey.get(fieldKey) ?? []);
  }

  /**
   * Non-throwing option lookup: exact label, value passthrough, then the
   * fuzzy strategies. Nothing learned here is written back to the cache.
   */
  async matchOption(
    workspaceKey: string,
    typeKey: string,
    fieldKey: string,
    label: string,
  ): Promise<OptionMatch> {
    const bundle = await this.fieldBundle(workspaceKey, typeKey);
    const options = bundle.optionsByKey.get(fieldKey) ?? new Map<string, string>();
    const available = [...options.keys()];

    const exact = options.get(label);
    if (exact !== undefined) {
      return { kind: 'match', label, value: exact, strategy: 'exact' };
    }
    for (const [optionLabel, value] of options) {
      if (value === label) {
        return { kind: 'match', label: optionLabel, value, strategy: 'value' };
      }
    }

    const fuzzy = fuzzyMatchOption(label, options);
    switch (fuzzy.kind) {
      case 'match':
        await this.log.info('option_fuzzy_match', {
          fieldKey,
          input: label,
          label: fuzzy.label,
          strategy: fuzzy.strategy,
        });
        return fuzzy;
      case 'ambiguous':
        await this.log.warning('option_ambiguous', {
          fieldKey,
          input: label,
          candidates: fuzzy.candidates,
        });
        return { kind: 'ambiguous', candidates: fuzzy.candidates, available };
      case 'none':
        return { kind: 'none', available };
    }
  }

  async resolveOptionValue(
    workspaceKey: string,
    typeKey: string,
    fieldKey: string,
    label: string,
  ): Promise<string> {
    const match = await this.matchOption(workspaceKey, typeKey, fieldKey, label);
    if (match.kind === 'match') {
      return match.value;
    }
    const candidates = match.kind === 'ambiguous' ? match.candidates : [];
    throw notFoundError('option', label, match.available, candidates);
  }

  // ─── Roles ─────────────────────────────────────────────────────────────────

  async resolveRoleKey(workspaceKey: string, typeKey: string, roleName: string): Promise<string> {
    const { roles } = await this.fieldBundle(workspaceKey, typeKey);

    const exact = roles.get(roleName);
    if (exact !== undefined) {
      return exact;
    }
    for (const key of roles.values()) {
      if (key === roleName) {
        return key;
      }
    }
    const wanted = roleName.trim().toLowerCase();
    for (const [name, key] of roles) {
      if (name.trim().toLowerCase() === wanted) {
        return key;
      }
    }
    throw notFoundError('role', roleName, [...roles.keys()]);
  }

  /** Role key -> name: exact key first, then a known key contained in the input. */
  async resolveRoleName(
    workspaceKey: string,
    typeKey: string,
    roleKey: string,
  ): Promise<string | undefined> {
    const { roles } = await this.fieldBundle(workspaceKey, typeKey);
    for (const [name, key] of roles) {
      if (key === roleKey) {
        return name;
      }
    }
    if (roleKey) {
      for (const [name, key] of roles) {
        if (roleKey.includes(key)) {
          return name;
        }
      }
    }
    return undefined;
  }

  // ─── Users ─────────────────────────────────────────────────────────────────

  private knownUserKey(identifier: string): string | undefined {
    for (const [, bucket] of this.userSearch.fresh()) {
      const key = bucket.identifiers.get(identifier);
      if (key !== undefined) {
        return key;
      }
    }
    return undefined;
  }

  private knownUserName(userKey: string): string | undefined {
    const direct = this.userNames.peek(userKey);
    if (direct !== undefined) {
      return direct;
    }
    for (const [, bucket] of this.userSearch.fresh()) {
      const name = bucket.names.get(userKey);
      if (name !== undefined) {
        return name;
      }
    }
    return undefined;
  }

  /**
   * Name or email -> user key. Identifiers shaped like keys skip the remote
   * call. Otherwise the exact name/email among the search results wins, then
   * the first result.
   */
  async resolveUserKey(identifier: string, workspaceKey?: string): Promise<string> {
    if (looksLikeUserKey(identifier)) {
      return identifier;
    }
    const known = this.knownUserKey(identifier);
    if (known !== undefined) {
      return known;
    }

    const bucket = await this.userSearch.get(`${workspaceKey ?? '*'}::${identifier}`, async () => {
      const users = await this.apis.users.search(identifier, workspaceKey);
      const identifiers = new Map<string, string>();
      const names = new Map<string, string>();
      let firstKey: string | undefined;
      for (const user of users) {
        const key = user.user_key;
        if (!key) {
          continue;
        }
        firstKey ??= key;
        const name = displayName(user);
        if (name) {
          identifiers.set(name, key);
          names.set(key, name);
        }
        if (user.email) {
          identifiers.set(user.email, key);
        }
      }
      if (firstKey === undefined) {
        throw notFoundError('user', identifier);
      }
      return { identifiers, names, firstKey };
    });

    return bucket.identifiers.get(identifier) ?? bucket.firstKey;
  }

  /** User key -> display name; undefined when unknown or on lookup failure. */
  async resolveUserName(userKey: string): Promise<string | undefined> {
    if (!userKey) {
      return undefined;
    }
    const known = this.knownUserName(userKey);
    if (known !== undefined) {
      return known;
    }
    try {
      return await this.userNames.get(userKey, async () => {
        const [user] = await this.apis.users.query([userKey]);
        const name = user ? displayName(user) : undefined;
        if (!name) {
          throw notFoundError('user', userKey);
        }
        return name;
      });
    } catch (error) {
      await this.log.warning('user_name_lookup_failed', {
        userKey,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  /** Names for many keys with at most one query call; unknown keys are omitted. */
  async batchResolveUserNames(userKeys: readonly string[]): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    const missing: string[] = [];
    for (const key of new Set(userKeys)) {
      if (!key) {
        continue;
      }
      const known = this.knownUserName(key);
      if (known !== undefined) {
        result.set(key, known);
      } else {
        missing.push(key);
      }
    }
    if (missing.length === 0) {
      return result;
    }
    try {
      const users = await this.apis.users.query(missing);
      for (const user of users) {
        const name = displayName(user);
        if (user.user_key && name) {
          this.userNames.prime(user.user_key, name);
          result.set(user.user_key, name);
        }
      }
    } catch (error) {
      await this.log.warning('user_names_batch_failed', {
        count: missing.length,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return result;
  }

  // ─── Invalidation ──────────────────────────────────────────────────────────

  invalidateWorkspaces(): void {
    this.workspaces.clear();
  }

  /** Drop the type list and every field bundle of one workspace. */
  invalidateWorkspace(workspaceKey: string): void {
    this.types.invalidate(workspaceKey);
    this.fields.invalidateWhere((key) => key.startsWith(`${workspaceKey}::`));
  }

  invalidateFields(workspaceKey: string, typeKey: string): void {
    this.fields.invalidate(`${workspaceKey}::${typeKey}`);
  }

  clear(): void {
    this.workspaces.clear();
    this.types.clear();
    this.fields.clear();
    this.userSearch.clear();
    this.userNames.clear();
  }

  stats(): BucketStoreStats[] {
    return [this.workspaces, this.types, this.fields, this.userSearch, this.userNames].map((s) =>
      s.stats(),
    );
  }
}
