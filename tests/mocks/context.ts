import type { ToolContext } from '../../src/shared/tools/types.js';
import { ProviderRegistry, type ProviderRegistryOptions } from '../../src/shared/work-items/registry.js';
import { UpdateOrchestrator } from '../../src/shared/work-items/update-orchestrator.js';
import { silentLogger } from './logger.js';
import { WS, type WorkspaceFixture } from './workspace.js';

/** Orchestrator over the fixture that never sleeps. */
export function createOrchestrator(fixture: WorkspaceFixture): UpdateOrchestrator {
  return new UpdateOrchestrator({
    meta: fixture.meta,
    workItems: fixture.apis.workItems,
    sleep: async () => {},
    random: () => 0,
    logger: silentLogger,
  });
}

export function createRegistry(
  fixture: WorkspaceFixture,
  overrides: Partial<ProviderRegistryOptions> = {},
): ProviderRegistry {
  return new ProviderRegistry({
    apis: fixture.apis,
    meta: fixture.meta,
    orchestrator: createOrchestrator(fixture),
    defaultWorkspace: { key: WS },
    defaultTypeName: 'Issue',
    logger: silentLogger,
    ...overrides,
  });
}

export function createToolContext(
  fixture: WorkspaceFixture,
  overrides: Partial<ProviderRegistryOptions> = {},
): ToolContext {
  return { sessionId: 'test-session', providers: createRegistry(fixture, overrides) };
}
