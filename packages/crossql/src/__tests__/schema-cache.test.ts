import { describe, expect, it } from 'vitest';
import { SchemaCache } from '../schema-cache.js';
import { silentLogger } from './helpers/catalog.js';
import { FakeExecutor } from './helpers/fake-executor.js';

function setup() {
  const executor = new FakeExecutor({
    school: { tables: { Students: [{ name: 'id', type: 'int' }], Teachers: [] } },
    music: { tables: { albums: [] } },
    broken: { listFailure: 'permission denied' },
  });
  return { executor, cache: new SchemaCache(executor, silentLogger) };
}

describe('SchemaCache', () => {
  it('lists lowercased tables once per source', async () => {
    const { executor, cache } = setup();

    expect(await cache.getTables('school')).toEqual(['students', 'teachers']);
    expect(await cache.getTables('school')).toEqual(['students', 'teachers']);
    expect(executor.listCalls).toEqual(['school']);
  });

  it('shares one lookup between concurrent callers', async () => {
    const { executor, cache } = setup();

    const [first, second] = await Promise.all([cache.getTables('music'), cache.getTables('music')]);

    expect(first).toEqual(['albums']);
    expect(second).toEqual(['albums']);
    expect(executor.listCalls).toEqual(['music']);
  });

  it('returns an empty list on failure and retries next time', async () => {
    const { executor, cache } = setup();

    expect(await cache.getTables('broken')).toEqual([]);
    expect(await cache.getTables('broken')).toEqual([]);
    expect(executor.listCalls).toEqual(['broken', 'broken']);
    expect(cache.snapshot('broken')).toBeUndefined();
  });

  it('hands out copies of the cached list', async () => {
    const { cache } = setup();

    const tables = await cache.getTables('school');
    tables.push('injected');

    expect(await cache.getTables('school')).toEqual(['students', 'teachers']);
  });

  it('reports cache statistics', async () => {
    const { cache } = setup();
    await cache.getTables('school');
    await cache.getTables('music');
    await cache.getTables('broken');

    expect(cache.getStats()).toEqual({ cached_sources: 2, total_tables: 3 });
    expect(cache.snapshot('music')).toEqual({ source: 'music', tables: ['albums'] });
  });

  it('describes columns without caching them', async () => {
    const { executor, cache } = setup();

    expect(await cache.getColumns('school', 'Students')).toEqual([{ name: 'id', type: 'int' }]);
    expect(await cache.getColumns('school', 'missing')).toEqual([]);
    expect(executor.describeCalls).toEqual(['school.Students', 'school.missing']);
  });
});
