import { isFieldRecord } from '../types/settings.js';
import type { FieldRecord, FieldValue } from '../types/settings.js';

function sortKeys(value: FieldValue): FieldValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isFieldRecord(value)) return value;

  const sorted: FieldRecord = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: FieldValue, indent?: number): string {
  return JSON.stringify(sortKeys(value), null, indent);
}
