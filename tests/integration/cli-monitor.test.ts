/**
 * CLI Monitor Integration Tests
 *
 * Runs the monitor CLI commands in process against the shipped templates,
 * an in-memory store and canned pages.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createMonitorProgram } from '../../src/cli/monitor-program.js';
import { createMonitoringContext } from '../../src/monitoring/context.js';
import { InMemoryMonitorStore, ManualClock, createMockFetcher } from '../helpers/mock-stores.js';
import { createTestConfig } from '../helpers/fixtures.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = join(__dirname, '../..');

const CITY_URL = 'https://cityhall.example.org/news';
const CITY_GUID = 'RND-CITY-city-hall-news';

describe('CLI Monitor Integration Tests', () => {
  let store: InMemoryMonitorStore;
  let fetcher: ReturnType<typeof createMockFetcher>;
  let output: string[];
  let failures: string[];

  const config = createTestConfig({
    templatesDir: join(projectRoot, 'config/templates'),
    definitionsFile: join(projectRoot, 'config/monitors.yaml'),
  });

  async function runCli(...args: string[]): Promise<string[]> {
    output = [];
    const program = createMonitorProgram({
      openContext: () =>
        createMonitoringContext(config, { store, fetcher, clock: new ManualClock('2024-06-03T06:00:00Z') }),
      print: (line) => output.push(line),
      fail: (message) => failures.push(message),
    });
    program.exitOverride();
    await program.parseAsync(args, { from: 'user' });
    return output;
  }

  beforeEach(() => {
    store = new InMemoryMonitorStore();
    fetcher = createMockFetcher({
      [CITY_URL]: '<title>City Hall</title><h2 class="entry-title"><a href="/n/1">Budget approved</a></h2>',
    });
    failures = [];
  });

  it('should list templates', async () => {
    const lines = await runCli('templates');

    expect(lines).toEqual([
      'Providers: video-feed, wordpress-news',
      'Channels: city-hall-news, conference-talks, library-events',
    ]);
  });

  it('should show a resolved channel', async () => {
    const lines = await runCli('resolve', 'city-hall-news');

    expect(lines).toContain('   URL: https://cityhall.example.org/news');
    expect(lines).toContain('   Primary: headlines');
    expect(lines).toContain('   headlines: <h2 class="entry-title"><a href="[^"]*">(.*?)</a></h2> -> $1 [ALL]');
    expect(lines).toContain('      filters: trim, exclude');
  });

  it('should sync, check and list monitors', async () => {
    expect(await runCli('sync')).toEqual(['Synchronized 3 definitions: 3 created, 0 updated']);

    const check = await runCli('check', '--monitor', CITY_GUID);
    expect(check).toContain('  Monitors checked: 1');
    expect(check).toContain(`${CITY_GUID}: baseline`);

    const list = await runCli('list');
    expect(list).toContain(`\n${CITY_GUID} [ACTIVE]`);
    expect(list).toContain('\nEVT-LIB-library-events [DUE]');
    expect(list).toContain('   Channel: UC-test-channel');
    expect(failures).toEqual([]);
  });

  it('should filter listed monitors by type and channel', async () => {
    await runCli('sync');

    const videos = await runCli('list', '--type', 'video');
    expect(videos.filter((line) => line.startsWith('\n'))).toEqual(['\nMonitors\n', '\nVID-CONF-talks [DUE]']);
    expect(videos).toContain('   Type: Video channel');

    const channel = await runCli('list', '--channel', 'UC-other');
    expect(channel).toContain('No monitors found.');

    await runCli('list', '--type', 'podcast');
    expect(failures).toEqual([
      'Unknown content type "podcast", expected one of roundup, video, event, publication',
    ]);
  });

  it('should report when there are no changes', async () => {
    const lines = await runCli('changes');

    expect(lines).toContain('No changes recorded.');
  });

  it('should fail on an unknown review status', async () => {
    await runCli('review', 'change-1', 'done');

    expect(failures).toEqual(['Unknown status "done", expected one of NEW, UNDER_REVIEW, APPROVED, REJECTED']);
  });

  it('should fail on an unknown change', async () => {
    await runCli('review', 'change-1', 'approved');

    expect(failures).toEqual(['Change not found: change-1']);
  });
});
