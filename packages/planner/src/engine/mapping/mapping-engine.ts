import { CompilationError } from '../../lib/errors.js';
import { isFieldRecord } from '../../types/settings.js';
import type {
  FieldRecord,
  FieldValue,
  MapDefinition,
  MapDefinitionSet,
  MapNode,
  SettingEntry,
  SettingTag,
  WireDto,
} from '../../types/settings.js';
import { parseLeaf, parseListKey } from './map-dsl.js';
import { translateValue } from './value-map.js';

interface RenderScope {
  tag: SettingTag;
  version?: string;
}

function isMapDefinition(node: MapNode): node is MapDefinition {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

function resolveLeaf(
  node: string | number | boolean | null,
  context: FieldRecord,
  scope: RenderScope,
): FieldValue {
  if (typeof node !== 'string') return node;

  const leaf = parseLeaf(node);
  switch (leaf.kind) {
    case 'literal':
      return leaf.value;

    case 'substitution': {
      const value = context[leaf.field];
      if (value === undefined) {
        throw new CompilationError(
          'unresolved-substitution',
          `Setting '${scope.tag}' has no value for '${leaf.field}'`,
          { tag: scope.tag, field: leaf.field, version: scope.version },
        );
      }
      return structuredClone(value);
    }

    case 'translation': {
      const value = context[leaf.field];
      if (value === undefined) {
        throw new CompilationError(
          'unresolved-translation',
          `Setting '${scope.tag}' has no value for '${leaf.field}'`,
          { tag: scope.tag, field: leaf.field, version: scope.version },
        );
      }
      const result = translateValue(value, leaf.table);
      if (!result.ok) {
        throw new CompilationError(
          'unresolved-translation',
          `Setting '${scope.tag}' field '${leaf.field}': ${result.message}`,
          { tag: scope.tag, field: leaf.field, version: scope.version },
        );
      }
      return result.value;
    }
  }
}

function renderElement(node: MapNode, context: FieldRecord, scope: RenderScope): FieldValue {
  if (Array.isArray(node)) {
    return node.map((item) => renderElement(item, context, scope));
  }
  if (isMapDefinition(node)) {
    return renderInto(node, context, {}, scope);
  }
  return resolveLeaf(node, context, scope);
}

function groupItems(group: string, context: FieldRecord, scope: RenderScope): FieldRecord[] {
  const items = context[group];
  if (!Array.isArray(items)) {
    throw new CompilationError(
      'invalid-group',
      `Setting '${scope.tag}' group '${group}' is not a list`,
      { tag: scope.tag, field: group, version: scope.version },
    );
  }

  const records: FieldRecord[] = [];
  for (const item of items) {
    if (!isFieldRecord(item)) {
      throw new CompilationError(
        'invalid-group',
        `Setting '${scope.tag}' group '${group}' holds a non-record item`,
        { tag: scope.tag, field: group, version: scope.version },
      );
    }
    records.push(item);
  }
  return records;
}

/**
 * Render `definition` against `context` into `target`. Mappings merge
 * recursively, lists append to an existing list and scalars overwrite.
 */
function renderInto(
  definition: MapDefinition,
  context: FieldRecord,
  target: FieldRecord,
  scope: RenderScope,
): FieldRecord {
  for (const [rawKey, node] of Object.entries(definition)) {
    if (isMapDefinition(node)) {
      const existing = target[rawKey];
      target[rawKey] = renderInto(node, context, isFieldRecord(existing) ? existing : {}, scope);
      continue;
    }

    if (Array.isArray(node)) {
      const { key, group } = parseListKey(rawKey);
      const rendered: FieldValue[] = [];

      if (group === null) {
        for (const element of node) {
          rendered.push(renderElement(element, context, scope));
        }
      } else {
        const items = groupItems(group, context, scope);
        for (const element of node) {
          for (const item of items) {
            rendered.push(renderElement(element, item, scope));
          }
        }
      }

      const existing = target[key];
      target[key] = Array.isArray(existing) ? [...existing, ...rendered] : rendered;
      continue;
    }

    target[rawKey] = resolveLeaf(node, context, scope);
  }

  return target;
}

export interface CompileOptions {
  /** Protocol version, reported in errors. */
  version?: string;
}

/**
 * Render ordered setting entries into one wire DTO. Pure: the definitions
 * and entries are left untouched.
 */
export function compile(
  definitions: MapDefinitionSet,
  entries: readonly SettingEntry[],
  options: CompileOptions = {},
): WireDto {
  const dto: WireDto = {};

  for (const entry of entries) {
    const definition = definitions[entry.tag];
    if (!definition) {
      throw new CompilationError(
        'missing-definition',
        `No definition for setting '${entry.tag}'${options.version ? ` in protocol version ${options.version}` : ''}`,
        { tag: entry.tag, version: options.version },
      );
    }
    renderInto(definition, entry.fields, dto, { tag: entry.tag, version: options.version });
  }

  return dto;
}
