#!/usr/bin/env node
/**
 * Stdio transport entry point.
 * The MCP client launches this process and speaks JSON-RPC over stdin/stdout.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config, DEFAULT_WORK_ITEM_TYPE } from './config/env.js';
import { buildServer } from './core/mcp.js';
import { createProjectApis } from './services/project/api/index.js';
import { ProjectHttpClient } from './services/project/client.js';
import { MetadataCache } from './shared/metadata/cache.js';
import { UpdateOrchestrator } from './shared/work-items/update-orchestrator.js';
import { ProviderRegistry } from './shared/work-items/registry.js';
import { logger } from './utils/logger.js';
import { safeErrorMessage } from './utils/masking.js';

// stdout belongs to JSON-RPC; everything else goes to stderr
console.log = (...args) => console.error(...args);
console.info = (...args) => console.error(...args);
console.warn = (...args) => console.error(...args);
console.debug = (...args) => console.error(...args);

async function main(): Promise<void> {
  if (!config.PROJECT_KEY && !config.PROJECT_NAME) {
    console.error('ERROR: PROJECT_KEY or PROJECT_NAME environment variable is required');
    process.exit(1);
  }
  if (!config.PROJECT_PLUGIN_TOKEN) {
    await logger.warning('startup', { message: 'PROJECT_PLUGIN_TOKEN is not set; remote calls will be rejected' });
  }

  const client = new ProjectHttpClient({
    baseUrl: config.PROJECT_API_BASE_URL,
    pluginToken: config.PROJECT_PLUGIN_TOKEN,
    userKey: config.PROJECT_USER_KEY,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  });
  const apis = createProjectApis(client, {
    userKey: config.PROJECT_USER_KEY,
    tenantGroupId: config.TENANT_GROUP_ID,
  });
  const meta = new MetadataCache({ apis });
  const orchestrator = new UpdateOrchestrator({
    meta,
    workItems: apis.workItems,
    concurrency: config.CONCURRENCY_LIMIT,
  });
  const providers = new ProviderRegistry({
    apis,
    meta,
    orchestrator,
    defaultWorkspace: { key: config.PROJECT_KEY, name: config.PROJECT_NAME },
    defaultTypeName: config.WORK_ITEM_TYPE,
  });

  const server = buildServer({
    name: config.MCP_TITLE,
    version: config.MCP_VERSION,
    providers,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  await logger.info('startup', {
    workspace: config.PROJECT_KEY ?? config.PROJECT_NAME,
    type: config.WORK_ITEM_TYPE,
    typeFallback: config.WORK_ITEM_TYPE === DEFAULT_WORK_ITEM_TYPE,
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start stdio server:', safeErrorMessage(error));
  process.exit(1);
});
