/**
 * Global test setup (vitest).
 * Placeholder environment so config validation passes without a .env file.
 */

process.env.PROJECT_API_BASE_URL = 'https://project.example.test';
process.env.PROJECT_PLUGIN_TOKEN = 'test-secret';
process.env.PROJECT_USER_KEY = 'user_test';
process.env.PROJECT_KEY = 'project_alpha';
process.env.LOG_LEVEL = 'error';

export {
  apiError,
  FakeRemoteClient,
  httpError,
  ok,
} from './mocks/fake-remote-client.js';
