import type { CollationRules, MapDefinitionSet, WireDto } from '../../../types/settings.js';
import { isFieldRecord } from '../../../types/settings.js';

// Flat `changes` list shape of the 5.9 generation.
export const LEGACY_DEFINITIONS = {
  name: { displayName: '$value' },
  type: { type: '$value' },

  scope: { changes: [{ type: 'SCOPE', 'scope[scope]': [{ uuid: '$value' }] }] },
  projection: { changes: [{ type: 'PROJECTION_PERIODS', projectionDays: '$list' }] },
  desiredState: {
    changes: [{ type: 'SET', projectionDays: [0], center: '$center', diameter: '$diameter' }],
  },
  histBaseline: { changes: [{ type: 'SET_HIST_BASELINE', value: '$value' }] },
  peakBaseline: {
    changes: [{ type: 'SET_PEAK_BASELINE', value: '$value', 'targets[ids]': [{ uuid: '$uuid' }] }],
  },
  addHistorical: { changes: [{ type: 'ADD_HIST', enable: '$value' }] },
  includeReserved: { changes: [{ type: 'INCLUDE_RESERVED', enable: '$value' }] },
  maxUtilization: {
    changes: [
      {
        type: 'SET_MAX_UTILIZATION',
        maxUtilType: '$type',
        value: '$util',
        'targets[ids]': [{ uuid: '$uuid' }],
      },
    ],
  },
  currentUtilization: {
    changes: [
      {
        type: 'SET_USED',
        value: '$util',
        projectionDays: ['$projection'],
        'targets[ids]': [{ uuid: '$uuid' }],
      },
    ],
  },

  'automation.provisionPM': {
    changes: [{ type: 'SET_ACTION_SETTING', name: 'provision', value: 'PhysicalMachine', enable: '$value' }],
  },
  'automation.suspendPM': {
    changes: [{ type: 'SET_ACTION_SETTING', name: 'suspend', value: 'PhysicalMachine', enable: '$value' }],
  },
  'automation.provisionDS': {
    changes: [{ type: 'SET_ACTION_SETTING', name: 'provision', value: 'Storage', enable: '$value' }],
  },
  'automation.suspendDS': {
    changes: [{ type: 'SET_ACTION_SETTING', name: 'suspend', value: 'Storage', enable: '$value' }],
  },
  'automation.resize': {
    changes: [{ type: '$type', name: 'resize', enable: '$value', description: '$desc' }],
  },

  constraint: {
    changes: [
      {
        type: 'CONSTRAINTCHANGED',
        projectionDays: ['$projection'],
        name: '$name',
        enable: '$value',
        targets: [{ uuid: '$uuid' }],
      },
    ],
  },

  'entity.add': {
    changes: [{ type: 'ADDED', projectionDays: '$projection', targets: [{ uuid: '$target' }] }],
  },
  'entity.migrate': {
    changes: [
      {
        type: 'MIGRATION',
        projectionDays: ['$projection'],
        targets: [{ uuid: '$source' }, { uuid: '$destination' }],
      },
    ],
  },
  'entity.remove': {
    changes: [{ type: 'REMOVED', projectionDays: ['$projection'], targets: [{ uuid: '$target' }] }],
  },
  'entity.replace': {
    changes: [
      {
        type: 'REPLACED',
        projectionDays: ['$projection'],
        targets: [{ uuid: '$target' }, { uuid: '$template' }],
      },
    ],
  },
} satisfies MapDefinitionSet;

export const LEGACY_COLLATION = {
  maxUtilization: { groups: [{ label: 'ids', fields: ['uuid'] }], policy: 'keep-last' },
  currentUtilization: { groups: [{ label: 'ids', fields: ['uuid'] }], policy: 'keep-last' },
  peakBaseline: { groups: [{ label: 'ids', fields: ['uuid'] }], policy: 'keep-last' },
} satisfies CollationRules;

/** Additions spread over more than one day are sent as ADD_REPEAT. */
export function finaliseLegacy(dto: WireDto): WireDto {
  const changes = dto.changes;
  if (!Array.isArray(changes)) return dto;

  for (const change of changes) {
    if (!isFieldRecord(change) || change.type !== 'ADDED') continue;
    const days = change.projectionDays;
    if (Array.isArray(days) && days.length > 1) {
      change.type = 'ADD_REPEAT';
    }
  }
  return dto;
}
