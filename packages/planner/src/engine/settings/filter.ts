import { isFieldRecord } from '../../types/settings.js';
import type { FieldRecord, FieldValue, SettingFilter } from '../../types/settings.js';

/** Resolve a dotted path (`target.uuid`) through nested field records. */
export function resolvePath(fields: FieldRecord, path: string): FieldValue | undefined {
  let current: FieldValue | undefined = fields;
  for (const segment of path.split('.')) {
    if (!isFieldRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => fieldValuesEqual(item, b[i]));
  }
  if (isFieldRecord(a) && isFieldRecord(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => fieldValuesEqual(a[key], b[key]))
    );
  }
  return false;
}

/**
 * True when every filter pair matches. An absent or empty filter matches
 * everything.
 */
export function matchesFilter(fields: FieldRecord, filter?: SettingFilter): boolean {
  if (!filter) return true;
  for (const [path, expected] of Object.entries(filter)) {
    if (!fieldValuesEqual(resolvePath(fields, path), expected)) {
      return false;
    }
  }
  return true;
}
