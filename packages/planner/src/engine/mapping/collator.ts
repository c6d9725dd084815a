import type {
  CollationRule,
  CollationRules,
  FieldRecord,
  FieldValue,
  SettingEntry,
  SettingTag,
} from '../../types/settings.js';

function fold(entries: readonly SettingEntry[], rule: CollationRule): FieldRecord {
  const policy = rule.policy ?? 'keep-first';
  const labelOf = new Map<string, string>();
  for (const group of rule.groups) {
    for (const field of group.fields) labelOf.set(field, group.label);
  }

  const folded: FieldRecord = {};
  const parallel = new Map<string, FieldValue[]>();
  const grouped = new Map<string, FieldRecord[]>(rule.groups.map((group) => [group.label, []]));

  for (const entry of entries) {
    const records = new Map<string, FieldRecord>();

    for (const [field, value] of Object.entries(entry.fields)) {
      const label = labelOf.get(field);
      if (label === undefined) {
        if (policy === 'keep-last' || !(field in folded)) {
          folded[field] = structuredClone(value);
        }
        continue;
      }

      const record = records.get(label) ?? {};
      record[field] = structuredClone(value);
      records.set(label, record);
    }

    // Every field of a touched group gets one element per entry, null when absent.
    for (const group of rule.groups) {
      const record = records.get(group.label);
      if (record === undefined) continue;
      for (const field of group.fields) {
        const column = parallel.get(field) ?? [];
        column.push(structuredClone(record[field] ?? null));
        parallel.set(field, column);
      }
      grouped.get(group.label)?.push(record);
    }
  }

  for (const [field, column] of parallel) folded[field] = column;
  for (const [label, records] of grouped) {
    if (records.length > 0) folded[label] = records;
  }
  return folded;
}

/**
 * Fold every entry of a collated tag into a single entry at the position of
 * the first one. Entries of other tags pass through unchanged.
 */
export function collate(entries: readonly SettingEntry[], rules: CollationRules): SettingEntry[] {
  const result: SettingEntry[] = [];
  const done = new Set<SettingTag>();

  for (const entry of entries) {
    const rule = rules[entry.tag];
    if (!rule) {
      result.push(structuredClone(entry));
      continue;
    }
    if (done.has(entry.tag)) continue;

    const sameTag = entries.filter((candidate) => candidate.tag === entry.tag);
    result.push({ tag: entry.tag, fields: fold(sameTag, rule) });
    done.add(entry.tag);
  }

  return result;
}
