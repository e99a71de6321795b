export { BucketStore, type BucketStoreStats, type CacheBucket } from './bucket-store.js';
export {
  DEFAULT_TTLS,
  type FieldBundle,
  MetadataCache,
  type MetadataCacheOptions,
  type MetadataCacheTtls,
  type OptionMatch,
  WORKSPACE_CACHE_LIMIT,
} from './cache.js';
export {
  describeWriteError,
  FieldValidationError,
  isNotFoundError,
  isRateLimitError,
  MetadataError,
  NotFoundError,
  notFoundError,
  RemoteApiError,
  RemoteHttpError,
  remoteErrorDetail,
  TransportError,
} from './errors.js';
export { type FuzzyOutcome, type FuzzyStrategy, fuzzyMatchOption } from './fuzzy-match.js';
export { flattenOptions, MAX_OPTION_DEPTH } from './options.js';
export {
  buildRoleMap,
  OPERATOR_ROLE_FIELD_KEY,
  type RoleKeyAdapter,
  suffixRoleKeyAdapter,
} from './role-keys.js';
export { looksLikeUserKey } from './user-keys.js';
