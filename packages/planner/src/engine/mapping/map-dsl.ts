export type LeafExpression =
  | { kind: 'literal'; value: string }
  | { kind: 'substitution'; field: string }
  | { kind: 'translation'; field: string; table: string };

export interface ListKey {
  key: string;
  group: string | null;
}

const GROUPED_KEY = /^([^[\]]+)\[([^[\]]+)\]$/;

/** Classify a string leaf of a map definition. */
export function parseLeaf(value: string): LeafExpression {
  if (value.startsWith('$')) {
    return { kind: 'substitution', field: value.slice(1) };
  }
  if (value.startsWith('@')) {
    const separator = value.indexOf(':');
    if (separator === -1) {
      return { kind: 'translation', field: value.slice(1), table: '' };
    }
    return {
      kind: 'translation',
      field: value.slice(1, separator),
      table: value.slice(separator + 1),
    };
  }
  return { kind: 'literal', value };
}

/** Split `changes[ids]` into the output key and its group label. */
export function parseListKey(key: string): ListKey {
  const match = GROUPED_KEY.exec(key);
  if (!match) return { key, group: null };
  return { key: match[1], group: match[2] };
}
