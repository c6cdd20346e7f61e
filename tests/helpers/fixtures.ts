import { TemplateRegistry } from '../../src/templates/template-registry.js';
import { DEFAULT_MONITOR_SETTINGS, type MonitorDefinition } from '../../src/monitoring/monitor-config.js';
import type { TemplateDocument, TemplateSourceResult } from '../../src/templates/types.js';
import type { Config } from '../../src/types/index.js';

export const NEWS_URL = 'https://news.example.com/city';
export const VIDEOS_URL = 'https://video.example.com/channel/UC-test';

export const newsProvider: TemplateDocument = {
  name: 'news-site',
  kind: 'provider',
  body: {
    sites: 'news',
    primary: 'headlines',
    fields: {
      title: { expr: '<h1>(.*?)</h1>' },
      headlines: { expr: '<h2>(.*?)</h2>', match: 'ALL' },
    },
    filters: ['trim'],
  },
};

export const cityNews: TemplateDocument = {
  name: 'city-news',
  kind: 'channel',
  body: { provider: 'news-site', url: NEWS_URL },
};

export const channelVideos: TemplateDocument = {
  name: 'channel-videos',
  kind: 'channel',
  body: {
    url: VIDEOS_URL,
    sites: 'video',
    fields: {
      videos: { expr: '<li data-id="(?<id>[^"]+)">(.*?)</li>', format: '${id}: $2', match: 'ALL' },
    },
  },
};

export function templateSource(...documents: TemplateDocument[]): TemplateSourceResult {
  return { documents: documents.length ? documents : [newsProvider, cityNews, channelVideos], errors: [] };
}

export function loadTemplates(...documents: TemplateDocument[]): TemplateRegistry {
  const registry = new TemplateRegistry();
  registry.load(templateSource(...documents));
  return registry;
}

/**
 * A news page in the shape the news templates read
 */
export function newsPage(title: string, headlines: readonly string[]): string {
  return [
    '<html><body>',
    `<h1>${title}</h1>`,
    ...headlines.map((headline) => `<h2> ${headline} </h2>`),
    '</body></html>',
  ].join('\n');
}

export function videoPage(videos: ReadonlyArray<[id: string, title: string]>): string {
  return `<ul>${videos.map(([id, title]) => `<li data-id="${id}">${title}</li>`).join('')}</ul>`;
}

export function newsDefinition(overrides: Partial<MonitorDefinition> = {}): MonitorDefinition {
  return {
    code: 'CITY',
    name: 'news',
    contentType: 'roundup',
    template: 'city-news',
    sites: 'news',
    settings: { ...DEFAULT_MONITOR_SETTINGS },
    ...overrides,
  };
}

/**
 * Configuration for tests; nothing in it reaches a real service
 */
export function createTestConfig(overrides: Partial<Config['monitoring']> & { templatesDir?: string } = {}): Config {
  const { templatesDir = 'config/templates', ...monitoring } = overrides;
  return {
    postgres: { host: 'localhost', port: 5432, database: 'test_db', user: 'test_user', password: 'test_pass' },
    templates: { dir: templatesDir },
    monitoring: {
      definitionsFile: 'config/monitors.yaml',
      tickSeconds: 60,
      staleClaimMinutes: 30,
      recencyDays: 7,
      abnormalDecreasePercent: 50,
      scoringPolicy: 'similarity',
      createdBy: 'test-runner',
      ...monitoring,
    },
    fetcher: { timeoutMs: 1000, retries: 1, retryDelayMs: 0, userAgent: 'test-agent' },
    logLevel: 'silent',
    logPretty: false,
  };
}
