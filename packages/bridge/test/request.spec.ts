/* packages/bridge/test/request.spec.ts */
import { describe, it, expect } from 'vitest';
import { BadRequest } from '@ddlbridge/core';
import { DATABASE, SCHEMA, TASK, WAREHOUSE, normalizeRequest, parseScope, propertyLists, route } from '../src';

describe('normalizeRequest', () => {
  it('splits path, custom action and query', () => {
    const req = normalizeRequest({ method: 'post', url: '/api/v2/warehouses/my%20wh:resume?like=a&like=b' });
    expect(req).toEqual({
      method: 'POST',
      path: ['api', 'v2', 'warehouses', 'my wh'],
      customAction: 'resume',
      queryParams: { like: 'a' },
      body: {},
    });
    expect(Object.isFrozen(req)).toBe(true);
  });

  it('lets the explicit query map win over the URL', () => {
    const req = normalizeRequest({
      method: 'GET',
      url: '/api/v2/warehouses?like=a',
      query: { like: ['c', 'd'], showLimit: '5' },
    });
    expect(req.queryParams).toEqual({ like: 'c', showLimit: '5' });
  });

  it('treats a null body as empty', () => {
    expect(normalizeRequest({ method: 'GET', url: '/api/v2/warehouses', body: null }).body).toEqual({});
  });

  it('rejects unsupported methods and bad encodings', () => {
    expect(() => normalizeRequest({ method: 'PATCH', url: '/api/v2/warehouses' })).toThrow(BadRequest);
    expect(() => normalizeRequest({ method: 'GET', url: '/api/v2/warehouses/%E0%A4%A' })).toThrow(
      "Malformed path segment '%E0%A4%A'"
    );
  });
});

describe('route', () => {
  it('prefers the most specific template', () => {
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'S', 'tables', 'T'])).toBe('table');
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'S', 'tasks'])).toBe('task');
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'S', 'services', 'X', 'logs'])).toBe('service');
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'S', 'image-repositories'])).toBe('image-repository');
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'S'])).toBe('schema');
    expect(route(['api', 'v2', 'databases', 'D'])).toBe('database');
    expect(route(['api', 'v2', 'compute-pools'])).toBe('compute-pool');
    expect(route(['api', 'v2', 'warehouses', 'W'])).toBe('warehouse');
  });

  it('does not mistake a schema named like a collection for that collection', () => {
    expect(route(['api', 'v2', 'databases', 'D', 'schemas', 'tables'])).toBe('schema');
  });

  it('rejects anything else', () => {
    expect(() => route(['api', 'v1', 'warehouses'])).toThrow('Invalid URL');
  });
});

describe('parseScope', () => {
  const scope = (d: Parameters<typeof parseScope>[0], method: string, url: string, body?: Record<string, string>) =>
    parseScope(d, normalizeRequest({ method, url, body }));

  it('normalizes parent and object names', () => {
    const s = scope(SCHEMA, 'GET', '/api/v2/databases/my_db/schemas/%22Mixed%22');
    expect(s.parent).toEqual({ database: 'MY_DB' });
    expect(s.name).toBe('"Mixed"');
    expect(s.isCollection).toBe(false);
  });

  it('recognizes collections, sub-resources and actions', () => {
    expect(scope(TASK, 'GET', '/api/v2/databases/D/schemas/S/tasks').isCollection).toBe(true);
    const sub = scope(TASK, 'GET', '/api/v2/databases/D/schemas/S/tasks/T/dependents');
    expect(sub).toMatchObject({ name: 'T', subResource: 'dependents', parent: { database: 'D', schema: 'S' } });
    expect(scope(WAREHOUSE, 'POST', '/api/v2/warehouses/w:suspend').action).toBe('suspend');
  });

  it('takes the name from the body on PUT to a collection', () => {
    const s = scope(WAREHOUSE, 'PUT', '/api/v2/warehouses', { name: 'w1' });
    expect(s).toMatchObject({ name: 'W1', isCollection: false });
  });

  it('rejects malformed paths and unknown sub-resources', () => {
    expect(() => scope(WAREHOUSE, 'GET', '/api/v2/warehouses/W/extra')).toThrow('Malformed Resource URL');
    expect(() => scope(DATABASE, 'GET', '/api/v2/databases/D/bogus')).toThrow(
      "Unsupported sub-resource 'bogus' for database"
    );
  });
});

describe('propertyLists', () => {
  it('classifies required, optional and immutable properties', () => {
    const lists = propertyLists(TASK);
    expect(lists.required).toEqual(['name', 'definition']);
    expect(lists.immutable).toEqual(['user_task_managed_initial_warehouse_size']);
    expect(lists.optional).toContain('schedule');
    expect(lists.optional).not.toContain('name');
  });
});
