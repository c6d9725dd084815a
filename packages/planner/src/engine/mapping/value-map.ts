import type { FieldValue } from '../../types/settings.js';

export type TranslationResult =
  | { ok: true; value: string }
  | { ok: false; message: string };

function stringForm(value: FieldValue): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

/**
 * Translate a value through a table of equality pairs (`on=ENABLED;off=DISABLED`)
 * or a boolean pair (`ENABLED;DISABLED`). Equality pairs compare against the
 * string form of the value; boolean pairs accept booleans only.
 */
export function translateValue(value: FieldValue, table: string): TranslationResult {
  if (table.length === 0) {
    return { ok: false, message: 'empty translation table' };
  }

  if (table.includes('=')) {
    const source = stringForm(value);
    for (const pair of table.split(';')) {
      const parts = pair.split('=');
      if (parts.length !== 2) {
        return { ok: false, message: `malformed translation pair '${pair}'` };
      }
      if (source !== null && parts[0] === source) {
        return { ok: true, value: parts[1] };
      }
    }
    return { ok: false, message: `no translation for value ${JSON.stringify(value)}` };
  }

  const choices = table.split(';');
  if (choices.length !== 2) {
    return { ok: false, message: `boolean translation '${table}' needs exactly two values` };
  }
  if (typeof value !== 'boolean') {
    return { ok: false, message: `boolean translation got ${JSON.stringify(value)}` };
  }
  return { ok: true, value: value ? choices[0] : choices[1] };
}
