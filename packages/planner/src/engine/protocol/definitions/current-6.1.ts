import type { MapDefinitionSet } from '../../../types/settings.js';

function automation(entityType: string) {
  return {
    configChanges: {
      automationSettingList: [{ uuid: '$uuid', value: '$value', entityType }],
    },
  };
}

// Sectioned shape introduced in 6.1: scope, projectionDays, configChanges,
// loadChanges, timebasedTopologyChanges, topologyChanges.
export const CURRENT_DEFINITIONS = {
  name: { displayName: '$value' },
  type: { type: '$value' },
  scope: { 'scope[scope]': [{ uuid: '$value' }] },
  projection: { projectionDays: '$list' },

  desiredState: {
    configChanges: {
      automationSettingList: [
        { uuid: 'utilTarget', value: '$center' },
        { uuid: 'targetBand', value: '$diameter' },
      ],
    },
  },
  'automation.provisionPM': automation('PhysicalMachine'),
  'automation.suspendPM': automation('PhysicalMachine'),
  'automation.provisionDS': automation('Storage'),
  'automation.suspendDS': automation('Storage'),
  'automation.resize': automation('VirtualMachine'),

  osMigration: {
    configChanges: { osMigrationSettingsList: [{ uuid: '$uuid', value: '$value' }] },
  },
  constraint: {
    configChanges: {
      removeConstraintList: [
        { projectionDay: '$projection', constraintType: '$name', target: { uuid: '$uuid' } },
      ],
    },
  },

  histBaseline: { loadChanges: { baselineDate: '$date' } },
  peakBaseline: {
    loadChanges: { peakBaselineList: [{ date: '$date', target: { uuid: '$uuid' } }] },
  },
  maxUtilization: {
    loadChanges: {
      maxUtilizationList: [
        { maxPercentage: '$util', projectionDay: '$projection', target: { uuid: '$uuid' } },
      ],
    },
  },
  currentUtilization: {
    loadChanges: {
      utilizationList: [
        { percentage: '$util', projectionDay: '$projection', target: { uuid: '$uuid' } },
      ],
    },
  },

  addHistorical: { timebasedTopologyChanges: { addHistoryVMs: '$value' } },
  includeReserved: { timebasedTopologyChanges: { includeReservation: '$value' } },

  'entity.add': {
    topologyChanges: {
      addList: [{ count: '$count', projectionDays: '$projection', target: { uuid: '$target' } }],
    },
  },
  'entity.migrate': {
    topologyChanges: {
      migrateList: [
        {
          projectionDay: '$projection',
          source: { uuid: '$source' },
          destination: { uuid: '$destination' },
        },
      ],
    },
  },
  'entity.remove': {
    topologyChanges: {
      removeList: [{ projectionDay: '$projection', target: { uuid: '$target' } }],
    },
  },
  'entity.replace': {
    topologyChanges: {
      replaceList: [
        { projectionDay: '$projection', target: { uuid: '$target' }, template: { uuid: '$template' } },
      ],
    },
  },
  relievePressure: {
    topologyChanges: {
      relievePressureList: [
        {
          projectionDay: '$projection',
          'sources[sources]': [{ uuid: '$uuid' }],
          'destinations[destinations]': [{ uuid: '$uuid' }],
        },
      ],
    },
  },
} satisfies MapDefinitionSet;
