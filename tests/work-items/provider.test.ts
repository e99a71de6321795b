/**
 * Tests for WorkItemProvider against the in-process workspace fixture.
 */

import { describe, expect, it } from 'vitest';
import { WorkItemProvider, type WorkItemProviderOptions } from '../../src/shared/work-items/provider.js';
import { apiError, bodyField } from '../mocks/fake-remote-client.js';
import { createOrchestrator } from '../mocks/context.js';
import { captureLogger, silentLogger } from '../mocks/logger.js';
import { createWorkspaceFixture, ISSUE, STORY, WS, type WorkspaceFixture } from '../mocks/workspace.js';

const FILTER_PATH = `/open_api/${WS}/work_item/filter`;
const searchPath = (typeKey: string) => `/open_api/${WS}/work_item/${typeKey}/search/params`;

function makeProvider(
  fixture: WorkspaceFixture = createWorkspaceFixture(),
  overrides: Partial<WorkItemProviderOptions> = {},
): WorkItemProvider {
  return new WorkItemProvider({
    apis: fixture.apis,
    meta: fixture.meta,
    orchestrator: createOrchestrator(fixture),
    workspace: { key: WS },
    typeName: 'Issue',
    defaultTypeName: 'Issue',
    logger: silentLogger,
    ...overrides,
  });
}

function firstTypeKey(body: unknown): unknown {
  const keys = bodyField(body, 'work_item_type_keys');
  return Array.isArray(keys) ? keys[0] : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Scope
// ─────────────────────────────────────────────────────────────────────────────

describe('WorkItemProvider scope', () => {
  it('requires a workspace key or name', () => {
    expect(() => makeProvider(createWorkspaceFixture(), { workspace: {} })).toThrow(
      'A workspace key or name is required',
    );
  });

  it('resolves a workspace name and a type name', async () => {
    const provider = makeProvider(createWorkspaceFixture(), { workspace: { name: 'Alpha' }, typeName: 'Story' });
    expect(await provider.scope()).toEqual({ workspaceKey: WS, typeKey: STORY });
  });

  it('falls back to the first type when the default type is missing', async () => {
    const { logger, events } = captureLogger();
    const fixture = createWorkspaceFixture();
    fixture.client.onData('GET', `/open_api/${WS}/work_item/all-types`, [
      { name: 'Bug', type_key: 'bug' },
      { name: 'Task', type_key: 'task' },
    ]);
    const provider = makeProvider(fixture, { logger });

    expect(await provider.typeKey()).toBe('bug');
    expect(await provider.typeKey()).toBe('bug');
    expect(events().filter((e) => e === 'type_fallback')).toHaveLength(1);
  });

  it('does not fall back for other type names', async () => {
    const fixture = createWorkspaceFixture();
    fixture.client.onData('GET', `/open_api/${WS}/work_item/all-types`, [
      { name: 'Bug', type_key: 'bug' },
      { name: 'Task', type_key: 'task' },
    ]);
    const provider = makeProvider(fixture, { typeName: 'Epic' });
    await expect(provider.typeKey()).rejects.toThrow("Type 'Epic' not found. Available: Bug, Task");
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Listing
// ─────────────────────────────────────────────────────────────────────────────

describe('WorkItemProvider.getTasks', () => {
  it('turns filters into AND-joined search conditions', async () => {
    const fixture = createWorkspaceFixture();
    fixture.client.onReply('POST', searchPath(ISSUE), () => ({
      work_items: [{ id: 42, name: 'Crash' }],
      pagination: { total: 1, page_num: 1, page_size: 50 },
    }));
    const provider = makeProvider(fixture);

    const page = await provider.getTasks({ status: ['Open', 'In Progress'], priority: ['P1'], owner: 'Alice Chen' });

    expect(page).toEqual({ items: [{ id: 42, name: 'Crash' }], total: 1, pageNum: 1, pageSize: 50 });
    expect(fixture.client.callsTo('POST', searchPath(ISSUE))[0]?.body).toEqual({
      search_group: {
        conjunction: 'AND',
        search_params: [
          { field_key: 'status', operator: 'IN', value: ['open', 'in_progress'] },
          { field_key: 'priority', operator: 'IN', value: ['opt_p1'] },
          { field_key: 'owner', operator: 'IN', value: ['user_alice'] },
        ],
        search_groups: [],
      },
      page_num: 1,
      page_size: 50,
      fields: ['priority', 'status', 'owner'],
    });
  });

  it('sends an empty condition group without filters', async () => {
    const fixture = createWorkspaceFixture();
    fixture.client.onReply('POST', searchPath(ISSUE), () => []);
    const page = await makeProvider(fixture).getTasks({ pageNum: 2, pageSize: 10 });

    expect(page).toEqual({ items: [], total: 0, pageNum: 2, pageSize: 10 });
    expect(fixture.client.callsTo('POST', searchPath(ISSUE))[0]?.body).toEqual({
      search_group: { conjunction: 'AND', search_params: [], search_groups: [] },
      page_num: 2,
      page_size: 10,
    });
  });

  it('skips conditions on fields the type lacks and passes unknown values raw', async () => {
    const fixture = createWorkspaceFixture();
    fixture.client.onReply('POST', searchPath(STORY), () => []);
    await makeProvider(fixture, { typeName: 'Story' }).getTasks({ status: ['Draft', 'Weird'], priority: ['P1'] });

    expect(fixture.client.callsTo('POST', searchPath(STORY))[0]?.body).toEqual({
      search_group: {
        conjunction: 'AND',
        search_params: [{ field_key: 'status', operator: 'IN', value: ['draft', 'Weird'] }],
        search_groups: [],
      },
      page_num: 1,
      page_size: 50,
      fields: ['status'],
    });
  });

  it('uses the filter endpoint for name keywords and filters the rest locally', async () => {
    const fixture = createWorkspaceFixture();
    const item = (id: number, priority: string, owner: string) => ({
      id,
      name: `crash ${id}`,
      fields: [
        { field_key: 'priority', field_value: { label: priority, value: `opt_${priority.toLowerCase()}` } },
        { field_key: 'owner', field_value: owner },
      ],
    });
    fixture.client.onReply('POST', FILTER_PATH, () => [
      item(1, 'P1', 'user_alice'),
      item(2, 'P2', 'user_alice'),
      item(3, 'P1', 'user_bob'),
    ]);

    const page = await makeProvider(fixture).getTasks({
      nameKeyword: 'crash',
      status: ['Open'],
      priority: ['P1'],
      owner: 'Alice Chen',
    });

    expect(page.items.map((i) => i.id)).toEqual([1]);
    expect(page.total).toBe(3);
    expect(fixture.client.callsTo('POST', FILTER_PATH)[0]?.body).toEqual({
      work_item_type_keys: [ISSUE],
      page_num: 1,
      page_size: 50,
      work_item_name: 'crash',
      work_item_status: ['open'],
      fields: ['priority', 'status', 'owner'],
    });
  });

  it('runs a bounded scan for a relation filter alone', async () => {
    const fixture = createWorkspaceFixture();
    const link = (id: number, target: number) => ({
      id,
      fields: [{ field_key: 'field_related', field_value: [target] }],
    });
    fixture.client.onReply('POST', FILTER_PATH, (body) => {
      switch (bodyField(body, 'page_num')) {
        case 1:
          return [link(10, 77), link(11, 5)];
        case 2:
          return [link(12, 77)];
        default:
          return [];
      }
    });
    const provider = makeProvider(fixture, {
      scanLimits: { maxItems: 100, maxPages: 10, pageSize: 2, pagesInFlight: 3 },
    });

    const page = await provider.getTasks({ relatedTo: 77 });

    expect(page.items.map((i) => i.id)).toEqual([10, 12]);
    expect(page).toMatchObject({
      total: 2,
      pageNum: 1,
      pageSize: 2,
      hint: 'Found 2 items related to 77 (scanned 3 items, max 100). To search more items, add name_keyword, status, or priority filters.',
    });
  });
});

describe('WorkItemProvider.resolveRelatedTo', () => {
  function setup() {
    const fixture = createWorkspaceFixture();
    fixture.client.onReply('POST', FILTER_PATH, (body) => {
      const name = bodyField(body, 'work_item_name');
      if (typeof name !== 'string' || !name.startsWith('Login')) {
        return [];
      }
      return firstTypeKey(body) === ISSUE ? [{ id: 5, name: 'Login story v2' }] : [{ id: 7, name: 'Login story' }];
    });
    return makeProvider(fixture);
  }

  it('takes ids as they are', async () => {
    const provider = setup();
    expect(await provider.resolveRelatedTo(88)).toBe(88);
    expect(await provider.resolveRelatedTo(' 88 ')).toBe(88);
  });

  it('prefers an exact name in any type over a partial hit', async () => {
    expect(await setup().resolveRelatedTo('Login story')).toBe(7);
  });

  it('takes the first partial hit otherwise', async () => {
    expect(await setup().resolveRelatedTo('Login')).toBe(5);
  });

  it('throws when no type has a match', async () => {
    await expect(setup().resolveRelatedTo('Nothing')).rejects.toThrow("Item 'Nothing' not found");
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Writes
// ─────────────────────────────────────────────────────────────────────────────

describe('WorkItemProvider writes', () => {
  it('creates an item, then sets the default priority', async () => {
    const fixture = createWorkspaceFixture();
    const id = await makeProvider(fixture).createIssue({
      name: 'New bug',
      description: 'Steps',
      assignee: 'Alice Chen',
    });

    expect(id).toBe(1001);
    expect(fixture.client.callsTo('POST', `/open_api/${WS}/work_item/create`)[0]?.body).toEqual({
      work_item_type_key: ISSUE,
      name: 'New bug',
      field_value_pairs: [
        { field_key: 'description', field_value: 'Steps' },
        { field_key: 'owner', field_value: 'user_alice' },
      ],
    });
    expect(fixture.updates).toEqual([
      { typeKey: ISSUE, id: 1001, fields: [{ field_key: 'priority', field_value: 'opt_p2' }] },
    ]);
  });

  it('keeps the created item when the priority write fails', async () => {
    const { logger, events } = captureLogger();
    const fixture = createWorkspaceFixture();
    fixture.client.on('PUT', `/open_api/${WS}/work_item/${ISSUE}/1001`, () => apiError(10001, 'denied'));

    expect(await makeProvider(fixture, { logger }).createIssue({ name: 'New bug', priority: 'P0' })).toBe(1001);
    expect(events()).toContain('priority_update_failed');
  });

  it('updates through the orchestrator', async () => {
    const fixture = createWorkspaceFixture();
    const results = await makeProvider(fixture).updateIssue(42, { priority: 'P1' });
    expect(results).toEqual([
      { success: true, itemId: 42, fieldName: 'priority', message: 'Updated', value: { label: 'P1', value: 'opt_p1' } },
    ]);
  });

  it('does nothing for an empty batch', async () => {
    const fixture = createWorkspaceFixture();
    expect(await makeProvider(fixture).batchUpdateIssues([], { priority: 'P1' })).toEqual([]);
    expect(fixture.client.calls).toEqual([]);
  });

  it('deletes in the resolved type', async () => {
    const fixture = createWorkspaceFixture();
    await makeProvider(fixture).deleteIssue(42);
    expect(fixture.deleted).toEqual([{ typeKey: ISSUE, id: 42 }]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Reads
// ─────────────────────────────────────────────────────────────────────────────

describe('WorkItemProvider reads', () => {
  it('lists the options of a field', async () => {
    expect(await makeProvider().listAvailableOptions('priority')).toEqual({
      P0: 'opt_p0',
      P1: 'opt_p1',
      P2: 'opt_p2',
      P3: 'opt_p3',
    });
  });

  it('finds items stored under another type', async () => {
    const fixture = createWorkspaceFixture();
    fixture.items[STORY] = [{ id: 7, name: 'Login story' }];
    expect(await makeProvider(fixture).getIssueDetails(7)).toEqual({ id: 7, name: 'Login story' });
  });

  it('reports items missing from every type', async () => {
    await expect(makeProvider().getIssueDetails(999)).rejects.toThrow('Item 999 not found in any work item type');
  });

  it('replaces numeric owner keys with names in summaries', async () => {
    const fixture = createWorkspaceFixture();
    const summaries = await makeProvider(fixture).simplifyWorkItems([
      { id: 1, fields: [{ field_key: 'owner', field_value: '71234567890123' }] },
      { id: 2, fields: [{ field_key: 'owner', field_value: 'user_bob' }] },
    ]);
    expect(summaries.map((s) => s.owner)).toEqual(['Carol Wu', 'user_bob']);
    expect(fixture.client.callsTo('POST', '/open_api/user/query').map((c) => c.body)).toEqual([
      { user_keys: ['71234567890123'] },
    ]);
  });
});
