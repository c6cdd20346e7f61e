import { describe, it, expect, vi } from 'vitest';
import { createMonitoringContext } from './context.js';
import { PostgresMonitorRepository } from './monitor-repository.js';
import { InMemoryMonitorStore, ManualClock, createMockFetcher } from '../../tests/helpers/mock-stores.js';
import {
  NEWS_URL,
  createTestConfig,
  newsDefinition,
  newsPage,
  templateSource,
} from '../../tests/helpers/fixtures.js';

vi.mock('pg', () => ({
  default: { Pool: vi.fn().mockImplementation(() => ({ query: vi.fn(), end: vi.fn(), on: vi.fn() })) },
}));

const config = createTestConfig({ scoringPolicy: 'field-ratio' });

describe('createMonitoringContext', () => {
  it('should wire the service from configuration and overrides', async () => {
    const store = new InMemoryMonitorStore();
    const fetcher = createMockFetcher({ [NEWS_URL]: newsPage('City', ['Parks reopen', 'Budget vote']) });
    const source = { load: vi.fn(async () => templateSource()) };

    const context = await createMonitoringContext(config, {
      store,
      fetcher,
      templateSource: source,
      clock: new ManualClock('2024-05-01T08:00:00Z'),
    });

    expect(context.templates.listChannels()).toEqual(['channel-videos', 'city-news']);
    expect(context.store).toBe(store);

    await context.service.syncDefinitions([newsDefinition()]);
    await context.service.checkMonitor('RND-CITY-news');
    fetcher.content.set(NEWS_URL, newsPage('Town', ['Parks reopen', 'Budget vote']));
    const result = await context.service.checkMonitor('RND-CITY-news', { force: true });

    // field-ratio: one of two fields changed
    expect(result).toMatchObject({ outcome: 'change_created', difference: 50 });
    expect([...store.changes.values()][0]?.createdBy).toBe('test-runner');

    await context.reloadTemplates();
    expect(source.load).toHaveBeenCalledTimes(2);
    await context.close();
  });

  it('should fall back to the database repository', async () => {
    const context = await createMonitoringContext(config, {
      templateSource: { load: async () => templateSource() },
    });

    expect(context.store).toBeInstanceOf(PostgresMonitorRepository);
    await context.close();
  });
});
