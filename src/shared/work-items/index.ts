export {
  DEFAULT_SCAN_LIMITS,
  findItemAcrossTypes,
  findItemNamesAcrossTypes,
  type FoundItem,
  type RelationScanLimits,
  type RelationScanResult,
  scanRelatedItems,
} from './cross-type.js';
export {
  classifyFieldValue,
  type FieldInput,
  type FieldValue,
  resolveFieldValueForUpdate,
  type ScalarInput,
  splitDelimited,
  toWireValue,
} from './field-values.js';
export {
  extractFieldValue,
  isItemRelatedTo,
  type NormalizedPage,
  normalizeApiResult,
  simplifyWorkItem,
  type WorkItemSummary,
} from './normalize.js';
export {
  type CreateIssueInput,
  type TaskFilters,
  type TaskPage,
  WorkItemProvider,
  type WorkItemProviderOptions,
} from './provider.js';
export { buildReadableDetails, type ReadableWorkItem } from './readable.js';
export { isWorkspaceKey, ProviderRegistry, type ProviderScopeInput } from './registry.js';
export {
  resolveUpdateFields,
  type UpdateOrchestratorOptions,
  UpdateOrchestrator,
  UpdateRejectedError,
  type UpdateRequest,
  type UpdateResult,
} from './update-orchestrator.js';
