import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../types/index.js';
import { guidFor } from './content-types.js';
import type { ContentTypeName, MonitorSettings } from './types.js';

/**
 * A monitor as declared in the definitions file
 */
export interface MonitorDefinition {
  code: string;
  name: string;
  contentType: ContentTypeName;
  channelId?: string;
  template: string;
  url?: string;
  sites: string;
  settings: MonitorSettings;
}

const sortSchema = z.enum(['document', 'reverse', 'asc', 'desc']);

const settingsSchema = z.object({
  active: z.boolean(),
  interval: z.number().int().min(1),
  difference: z.number().int().min(0).max(100),
  sort: sortSchema,
  'max-results': z.number().int().min(0),
});

const defaultsSchema = settingsSchema.partial().default({});

const monitorSchema = settingsSchema
  .partial()
  .extend({
    code: z.string().min(1),
    name: z.string().min(1),
    'content-type': z.enum(['roundup', 'video', 'event', 'publication']),
    'channel-id': z.union([z.string().min(1), z.number()]).transform(String).optional(),
    template: z.string().min(1).optional(),
    url: z.string().url().optional(),
    sites: z.string().default(''),
  })
  .superRefine((value, ctx) => {
    if (value['content-type'] === 'video' && value['channel-id'] === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['channel-id'],
        message: 'Video monitors require a channel-id',
      });
    }
  });

const monitorsFileSchema = z.object({
  defaults: defaultsSchema,
  monitors: z.array(monitorSchema).default([]),
});

export const DEFAULT_MONITOR_SETTINGS: MonitorSettings = {
  active: true,
  interval: 60,
  minDifference: 5,
  sort: 'document',
  maxResults: 0,
};

/**
 * Parse monitor definitions from YAML text
 */
export function parseMonitorDefinitions(content: string, source = 'monitors'): MonitorDefinition[] {
  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: source }) ?? {};
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${errorMessage(error)}`, source);
  }

  const parsed = monitorsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid monitor definitions in ${source}: ${issues.join('; ')}`, source, parsed.error.issues);
  }

  const { defaults, monitors } = parsed.data;
  const seen = new Set<string>();

  return monitors.map((entry) => {
    const contentType = entry['content-type'];
    const guid = guidFor(contentType, entry.code, entry.name);
    if (seen.has(guid)) {
      throw new ConfigurationError(`Duplicate monitor ${guid} in ${source}`, source);
    }
    seen.add(guid);

    return {
      code: entry.code,
      name: entry.name,
      contentType,
      channelId: contentType === 'video' ? entry['channel-id'] : undefined,
      template: entry.template ?? entry.name,
      url: entry.url,
      sites: entry.sites,
      settings: {
        active: entry.active ?? defaults.active ?? DEFAULT_MONITOR_SETTINGS.active,
        interval: entry.interval ?? defaults.interval ?? DEFAULT_MONITOR_SETTINGS.interval,
        minDifference: entry.difference ?? defaults.difference ?? DEFAULT_MONITOR_SETTINGS.minDifference,
        sort: entry.sort ?? defaults.sort ?? DEFAULT_MONITOR_SETTINGS.sort,
        maxResults: entry['max-results'] ?? defaults['max-results'] ?? DEFAULT_MONITOR_SETTINGS.maxResults,
      },
    };
  });
}

/**
 * Read monitor definitions from a YAML file
 */
export async function readMonitorDefinitions(configPath: string): Promise<MonitorDefinition[]> {
  const absolute = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);
  const content = await readFile(absolute, 'utf-8');
  return parseMonitorDefinitions(content, configPath);
}
