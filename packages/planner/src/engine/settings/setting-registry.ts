import type { Logger } from 'pino';
import { silentLogger } from '../../lib/logger.js';
import type { SettingEntry, SettingFields, SettingFilter, SettingTag } from '../../types/settings.js';
import { matchesFilter } from './filter.js';

export interface SettingRegistryOptions {
  logger?: Logger;
}

/**
 * Ordered collection of abstract setting entries. Entries change only
 * through add, update and remove.
 */
export class SettingRegistry {
  private items: SettingEntry[] = [];
  private readonly logger: Logger;

  constructor({ logger = silentLogger }: SettingRegistryOptions = {}) {
    this.logger = logger;
  }

  get size(): number {
    return this.items.length;
  }

  add(tag: SettingTag, fields: SettingFields): void {
    this.items.push({ tag, fields: structuredClone(fields) });
    this.logger.debug({ tag, fields }, 'setting added');
  }

  /**
   * Merge `fields` into every entry of `tag` matching `filter`. Appends a
   * new entry when nothing matched.
   */
  update(tag: SettingTag, fields: SettingFields, filter?: SettingFilter): void {
    let found = 0;

    for (const entry of this.items) {
      if (entry.tag !== tag || !matchesFilter(entry.fields, filter)) continue;
      Object.assign(entry.fields, structuredClone(fields));
      found++;
    }

    if (found === 0) {
      this.add(tag, fields);
      return;
    }

    this.logger.debug({ tag, fields, filter, matched: found }, 'setting updated');
  }

  /** Delete every entry of `tag` matching `filter`. Returns the count removed. */
  remove(tag: SettingTag, filter?: SettingFilter): number {
    const before = this.items.length;
    this.items = this.items.filter(
      (entry) => entry.tag !== tag || !matchesFilter(entry.fields, filter),
    );
    const removed = before - this.items.length;

    this.logger.debug({ tag, filter, removed }, 'setting removed');
    return removed;
  }

  find(tag: SettingTag, filter?: SettingFilter): SettingEntry[] {
    return this.items
      .filter((entry) => entry.tag === tag && matchesFilter(entry.fields, filter))
      .map((entry) => structuredClone(entry));
  }

  /** Deep copy of all entries in insertion order. */
  entries(): SettingEntry[] {
    return structuredClone(this.items);
  }
}
