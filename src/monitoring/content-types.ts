import { ConfigurationError } from '../types/index.js';
import type { ContentMonitor, ContentTypeName, MonitorSettings, PageMonitor, VideoMonitor } from './types.js';

/**
 * Fields shared by every monitor variant at creation time
 */
export interface MonitorInit extends MonitorSettings {
  id: string;
  code: string;
  name: string;
  template: string;
  url?: string;
  sites: string;
  createdAt: Date;
}

export interface ContentTypeVariant<T extends ContentTypeName> {
  name: T;
  code: string;
  label: string;
  create(init: MonitorInit, channelId?: string): ContentMonitor;
}

export function buildGuid(typeCode: string, code: string, name: string): string {
  return `${typeCode}-${code}-${name}`;
}

function pageVariant<T extends PageMonitor['contentType']>(
  name: T,
  code: string,
  label: string
): ContentTypeVariant<T> {
  return {
    name,
    code,
    label,
    create: (init) => {
      const monitor: PageMonitor = { ...initialState(init, code), contentType: name };
      return monitor;
    },
  };
}

function initialState(init: MonitorInit, typeCode: string) {
  return {
    ...init,
    guid: buildGuid(typeCode, init.code, init.name),
    snapshot: '',
    retry: 0,
    updatedAt: init.createdAt,
  };
}

const videoVariant: ContentTypeVariant<'video'> = {
  name: 'video',
  code: 'VID',
  label: 'Video channel',
  create: (init, channelId) => {
    if (!channelId) {
      throw new ConfigurationError(`Video monitor ${init.name} requires a channel id`);
    }
    const monitor: VideoMonitor = {
      ...initialState(init, 'VID'),
      contentType: 'video',
      channelId,
    };
    return monitor;
  },
};

/**
 * One constructor per content type
 */
export const CONTENT_TYPE_VARIANTS: { [T in ContentTypeName]: ContentTypeVariant<T> } = {
  roundup: pageVariant('roundup', 'RND', 'Roundup'),
  video: videoVariant,
  event: pageVariant('event', 'EVT', 'Event listing'),
  publication: pageVariant('publication', 'PUB', 'Publication listing'),
};

export const CONTENT_TYPE_NAMES = Object.keys(CONTENT_TYPE_VARIANTS).filter(isContentTypeName);

export function isContentTypeName(value: string): value is ContentTypeName {
  return value === 'roundup' || value === 'video' || value === 'event' || value === 'publication';
}

/**
 * Create a monitor of the given content type
 */
export function createMonitor(contentType: ContentTypeName, init: MonitorInit, channelId?: string): ContentMonitor {
  return CONTENT_TYPE_VARIANTS[contentType].create(init, channelId);
}

/**
 * guid of a monitor identified by type, code and name
 */
export function guidFor(contentType: ContentTypeName, code: string, name: string): string {
  return buildGuid(CONTENT_TYPE_VARIANTS[contentType].code, code, name);
}
