import type { ContentMonitor, ContentTypeName } from './types.js';

function guidKey(contentType: ContentTypeName, guid: string): string {
  return `${contentType}:${guid}`;
}

/**
 * In-memory index of monitors by id, (contentType, guid) and channel
 */
export class MonitorRegistry {
  private byId = new Map<string, ContentMonitor>();
  private byGuid = new Map<string, string>();

  /**
   * Replace the registry contents
   */
  load(monitors: readonly ContentMonitor[]): void {
    this.byId.clear();
    this.byGuid.clear();
    for (const monitor of monitors) {
      this.set(monitor);
    }
  }

  /**
   * Add a monitor, or replace the entry with the same id
   */
  set(monitor: ContentMonitor): void {
    const existing = this.byId.get(monitor.id);
    if (existing) {
      this.byGuid.delete(guidKey(existing.contentType, existing.guid));
    }
    this.byId.set(monitor.id, monitor);
    this.byGuid.set(guidKey(monitor.contentType, monitor.guid), monitor.id);
  }

  get(id: string): ContentMonitor | undefined {
    return this.byId.get(id);
  }

  getByGuid(contentType: ContentTypeName, guid: string): ContentMonitor | undefined {
    const id = this.byGuid.get(guidKey(contentType, guid));
    return id === undefined ? undefined : this.byId.get(id);
  }

  /**
   * Look up by id, or by guid across content types
   */
  find(idOrGuid: string): ContentMonitor | undefined {
    return this.byId.get(idOrGuid) ?? this.list().find((monitor) => monitor.guid === idOrGuid);
  }

  list(): ContentMonitor[] {
    return [...this.byId.values()].sort((a, b) => (a.guid < b.guid ? -1 : a.guid > b.guid ? 1 : 0));
  }

  listByContentType(contentType: ContentTypeName): ContentMonitor[] {
    return this.list().filter((monitor) => monitor.contentType === contentType);
  }

  listByChannelId(channelId: string): ContentMonitor[] {
    return this.list().filter((monitor) => monitor.contentType === 'video' && monitor.channelId === channelId);
  }

  get size(): number {
    return this.byId.size;
  }
}
