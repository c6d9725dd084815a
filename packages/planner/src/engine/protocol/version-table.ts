import { UnsupportedVersionError } from '../../lib/errors.js';
import { compareVersions, isAtLeast } from '../../lib/version.js';
import type { CollationRules, MapDefinitionSet, WireDto } from '../../types/settings.js';
import { CURRENT_DEFINITIONS } from './definitions/current-6.1.js';
import { LEGACY_COLLATION, LEGACY_DEFINITIONS, finaliseLegacy } from './definitions/legacy-5.9.js';
import { AUTOMATION_PATCH_7_21 } from './definitions/patch-7.21.js';

export interface ProtocolPatch {
  minVersion: string;
  definitions: MapDefinitionSet;
}

export interface ProtocolGeneration {
  name: string;
  minVersion: string;
  definitions: MapDefinitionSet;
  /** Present when the generation expects same-tag entries folded together. */
  collation?: CollationRules;
  patches?: ProtocolPatch[];
  finalise?: (dto: WireDto) => WireDto;
}

export interface ResolvedDefinitions {
  generation: string;
  version: string;
  definitions: MapDefinitionSet;
  collation: CollationRules | null;
  finalise: (dto: WireDto) => WireDto;
}

export const VERSION_TABLE: readonly ProtocolGeneration[] = [
  {
    name: 'legacy',
    minVersion: '5.9.0',
    definitions: LEGACY_DEFINITIONS,
    collation: LEGACY_COLLATION,
    finalise: finaliseLegacy,
  },
  {
    name: 'current',
    minVersion: '6.1.0',
    definitions: CURRENT_DEFINITIONS,
    patches: [{ minVersion: '7.21.0', definitions: AUTOMATION_PATCH_7_21 }],
  },
];

const identity = (dto: WireDto): WireDto => dto;

/**
 * Select the generation with the highest minimum version not above
 * `version` and layer its applicable patches, oldest first.
 */
export function resolveDefinitions(
  version: string,
  table: readonly ProtocolGeneration[] = VERSION_TABLE,
): ResolvedDefinitions {
  let selected: ProtocolGeneration | undefined;
  for (const generation of table) {
    if (!isAtLeast(version, generation.minVersion)) continue;
    if (!selected || compareVersions(generation.minVersion, selected.minVersion) > 0) {
      selected = generation;
    }
  }

  if (!selected) {
    throw new UnsupportedVersionError(version);
  }

  const patches = (selected.patches ?? [])
    .filter((patch) => isAtLeast(version, patch.minVersion))
    .sort((a, b) => compareVersions(a.minVersion, b.minVersion));

  let definitions: MapDefinitionSet = { ...selected.definitions };
  for (const patch of patches) {
    definitions = { ...definitions, ...patch.definitions };
  }

  return {
    generation: selected.name,
    version,
    definitions,
    collation: selected.collation ?? null,
    finalise: selected.finalise ?? identity,
  };
}
