import type { MapDefinitionSet } from '../../../types/settings.js';

function automation(uuid: string, entityType: string) {
  return {
    configChanges: {
      automationSettingList: [{ uuid, value: '@value:ENABLED;DISABLED', entityType }],
    },
  };
}

// From 7.21 automation settings use fixed action uuids and ENABLED/DISABLED values.
export const AUTOMATION_PATCH_7_21 = {
  'automation.provisionPM': automation('provision', 'PhysicalMachine'),
  'automation.suspendPM': automation('suspend', 'PhysicalMachine'),
  'automation.provisionDS': automation('provision', 'Storage'),
  'automation.suspendDS': automation('suspend', 'Storage'),
  'automation.resize': automation('resize', 'VirtualMachine'),
} satisfies MapDefinitionSet;
