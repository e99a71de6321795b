import { DEFAULT_WORK_ITEM_TYPE } from '../../config/env.js';
import type { ProjectApis } from '../../services/project/api/index.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { MetadataCache } from '../metadata/cache.js';
import type { RelationScanLimits } from './cross-type.js';
import { WorkItemProvider, type WorkspaceRef } from './provider.js';
import type { UpdateOrchestrator } from './update-orchestrator.js';

/** Workspace keys carry this prefix; anything else is taken as a workspace name. */
export const WORKSPACE_KEY_PREFIX = 'project_';

/** Providers kept at once; the least recently used scope is dropped first. */
export const PROVIDER_LIMIT = 100;

export function isWorkspaceKey(identifier: string): boolean {
  return identifier.startsWith(WORKSPACE_KEY_PREFIX);
}

export interface ProviderScopeInput {
  /** Workspace key or name; the configured default when absent */
  project?: string;
  /** Item type name; the configured default when absent */
  workItemType?: string;
}

export interface ProviderRegistryOptions {
  apis: Pick<ProjectApis, 'workItems'>;
  meta: MetadataCache;
  orchestrator: UpdateOrchestrator;
  defaultWorkspace: WorkspaceRef;
  /** Type used when a call names none */
  defaultTypeName: string;
  /** Only this type name may fall back to the workspace's first type */
  fallbackTypeName?: string;
  scanLimits?: RelationScanLimits;
  maxProviders?: number;
  logger?: Logger;
}

/**
 * Hands out one provider per (workspace, type) scope. All providers share
 * the metadata cache and the update orchestrator (and so its write gate).
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, WorkItemProvider>();

  constructor(private readonly options: ProviderRegistryOptions) {}

  get meta(): MetadataCache {
    return this.options.meta;
  }

  forScope(input: ProviderScopeInput = {}): WorkItemProvider {
    const project = input.project?.trim();
    const workspace: WorkspaceRef = project
      ? isWorkspaceKey(project)
        ? { key: project }
        : { name: project }
      : this.options.defaultWorkspace;
    const typeName = input.workItemType?.trim() || this.options.defaultTypeName;

    const id = `${workspace.key ?? ''}|${workspace.name ?? ''}|${typeName}`;
    let provider = this.providers.get(id);
    if (provider) {
      this.providers.delete(id);
    } else {
      provider = new WorkItemProvider({
        apis: this.options.apis,
        meta: this.options.meta,
        orchestrator: this.options.orchestrator,
        workspace,
        typeName,
        defaultTypeName: this.options.fallbackTypeName ?? DEFAULT_WORK_ITEM_TYPE,
        scanLimits: this.options.scanLimits,
        logger: this.options.logger ?? rootLogger,
      });
      const max = this.options.maxProviders ?? PROVIDER_LIMIT;
      for (const oldest of this.providers.keys()) {
        if (this.providers.size < max) {
          break;
        }
        this.providers.delete(oldest);
      }
    }
    this.providers.set(id, provider);
    return provider;
  }
}
