import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config/env.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      PROJECT_API_BASE_URL: 'https://project.feishu.cn',
      PROJECT_PLUGIN_TOKEN: undefined,
      PROJECT_USER_KEY: undefined,
      PROJECT_KEY: undefined,
      PROJECT_NAME: undefined,
      WORK_ITEM_TYPE: 'Issue',
      TENANT_GROUP_ID: 0,
      REQUEST_TIMEOUT_MS: 30_000,
      CONCURRENCY_LIMIT: 2,
      LOG_LEVEL: 'info',
      MCP_TITLE: 'Work Item Metadata MCP',
      MCP_VERSION: '0.1.0',
    });
  });

  it('trims values and treats blanks as unset', () => {
    const config = loadConfig({
      PROJECT_KEY: '   ',
      PROJECT_NAME: ' Alpha ',
      WORK_ITEM_TYPE: ' Story ',
      CONCURRENCY_LIMIT: '4',
    });
    expect(config.PROJECT_KEY).toBeUndefined();
    expect(config.PROJECT_NAME).toBe('Alpha');
    expect(config.WORK_ITEM_TYPE).toBe('Story');
    expect(config.CONCURRENCY_LIMIT).toBe(4);
  });

  it('lists every invalid value', () => {
    expect(() => loadConfig({ CONCURRENCY_LIMIT: '11', LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment configuration: CONCURRENCY_LIMIT: Number must be less than or equal to 10; LOG_LEVEL: Invalid enum value',
    );
  });
});
