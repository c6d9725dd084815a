import type { Logger } from 'pino';
import { silentLogger } from '../../lib/logger.js';
import { isAtLeast, isWithin } from '../../lib/version.js';
import { isFieldRecord } from '../../types/settings.js';
import type { FieldValue, SettingEntry, WireDto } from '../../types/settings.js';
import type { RemoteResource, RemoteService } from '../../types/remote.js';
import { collate } from '../mapping/collator.js';
import { compile } from '../mapping/mapping-engine.js';
import { resolveDefinitions, type ResolvedDefinitions } from './version-table.js';

type ScenarioRequest = (remote: RemoteService, dto: WireDto, name: string) => Promise<RemoteResource>;

// Up to and including 5.9.0 the scenario name is part of the path.
const nameAddressedRequest: ScenarioRequest = (remote, dto, name) => {
  const { displayName: _displayName, ...body } = dto;
  return remote.createScenario(body, { addressedName: name });
};

const genericRequest: ScenarioRequest = (remote, dto) => remote.createScenario(dto);

/**
 * Version-specific behaviour of a plan, chosen once from the reported
 * protocol version.
 */
export class ProtocolStrategy {
  readonly version: string;
  readonly definitions: ResolvedDefinitions;
  /** Scope items need displayName and className filled in before submission. */
  readonly augmentsScope: boolean;
  private readonly scenarioRequest: ScenarioRequest;
  private readonly logger: Logger;

  constructor(version: string, logger: Logger = silentLogger) {
    this.version = version;
    this.definitions = resolveDefinitions(version);
    this.augmentsScope = isWithin(version, '7.21.0', '7.21.5');
    this.scenarioRequest = isAtLeast(version, '5.9.1') ? genericRequest : nameAddressedRequest;
    this.logger = logger;
  }

  get generation(): string {
    return this.definitions.generation;
  }

  compile(entries: readonly SettingEntry[]): WireDto {
    const { definitions, collation, finalise } = this.definitions;
    const prepared = collation ? collate(entries, collation) : entries;
    return finalise(compile(definitions, prepared, { version: this.version }));
  }

  async createScenario(remote: RemoteService, dto: WireDto, name: string): Promise<RemoteResource> {
    const body = this.augmentsScope ? await this.augmentScope(remote, dto) : dto;
    return this.scenarioRequest(remote, body, name);
  }

  private async augmentScope(remote: RemoteService, dto: WireDto): Promise<WireDto> {
    const scope = dto.scope;
    if (!Array.isArray(scope)) return dto;

    const augmented: FieldValue[] = [];
    for (const item of scope) {
      if (!isFieldRecord(item) || typeof item.uuid !== 'string') {
        augmented.push(item);
        continue;
      }
      const entity = await remote.describeEntity(item.uuid);
      augmented.push({ ...item, displayName: entity.displayName, className: entity.className });
    }

    this.logger.debug({ count: augmented.length }, 'scope augmented with entity details');
    return { ...dto, scope: augmented };
  }
}

export function resolveProtocol(version: string, logger?: Logger): ProtocolStrategy {
  return new ProtocolStrategy(version, logger);
}
