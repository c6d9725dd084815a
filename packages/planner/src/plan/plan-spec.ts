import type { Logger } from 'pino';
import { SettingRegistry } from '../engine/settings/setting-registry.js';
import { resolveProtocol } from '../engine/protocol/protocol-strategy.js';
import { epochToTimestamp, generateScenarioName } from '../lib/dates.js';
import { CompilationError, ValidationError } from '../lib/errors.js';
import { canonicalJson } from '../lib/json.js';
import { silentLogger } from '../lib/logger.js';
import {
  AutomationSetting,
  CLOUD_LICENSE_SETTING,
  CLOUD_TARGET_OS_SETTING,
  EntityAction,
  PlanType,
} from '../types/enums.js';
import type { CloudOS, ConstraintCommodity } from '../types/enums.js';
import type { FieldRecord, SettingEntry, SettingFields, SettingTag, WireDto } from '../types/settings.js';
import { parseRunOptions, type RunOptions, type RunOptionsInput } from './run-options.js';

const DISTINCT_CLOUD_OS: readonly CloudOS[] = ['LINUX', 'RHEL', 'SLES', 'WINDOWS'];

const ENTITY_TAGS: Record<EntityAction, SettingTag> = {
  add: 'entity.add',
  migrate: 'entity.migrate',
  remove: 'entity.remove',
  replace: 'entity.replace',
};

const AUTOMATION_TAGS = {
  provisionPM: 'automation.provisionPM',
  suspendPM: 'automation.suspendPM',
  provisionDS: 'automation.provisionDS',
  suspendDS: 'automation.suspendDS',
} as const satisfies Record<string, SettingTag>;

export interface PlanSpecOptions {
  name?: string;
  type?: PlanType;
  scope?: string | string[];
  /** Protocol version to compile for. Resolved from the service when unset. */
  version?: string;
  runOptions?: RunOptionsInput;
  logger?: Logger;
  /** Construction time, used for the default scenario name. */
  createdAt?: Date;
}

export interface ChangeEntityOptions {
  projection?: number | number[];
  /** Copies to add. */
  count?: number;
  /** Replacement template, or migration destination. */
  newTarget?: string;
}

export interface ProjectionOption {
  projection?: number;
}

export interface CloudOsMapping {
  source: CloudOS;
  target: CloudOS;
  unlicensed?: boolean;
}

export interface CloudOsProfileOptions {
  matchSource?: boolean;
  unlicensed?: boolean;
  source?: CloudOS;
  target?: CloudOS;
  customMap?: CloudOsMapping[];
}

function toList(targets: string | string[]): string[] {
  return typeof targets === 'string' ? [targets] : [...targets];
}

function toDays(projection: number | number[]): number[] {
  const days = typeof projection === 'number' ? [projection] : [...projection];
  if (days.length === 0) {
    throw new ValidationError('At least one projection day is required');
  }
  for (const day of days) {
    if (!Number.isInteger(day) || day < 0) {
      throw new ValidationError(`Projection day must be a non-negative integer, got ${day}`, { day });
    }
  }
  return days;
}

/**
 * Version-agnostic description of a what-if scenario. Named operations
 * record abstract settings which are compiled to the wire shape of a
 * protocol version on demand.
 */
export class PlanSpec {
  name: string;
  type: PlanType;
  version: string | null;

  private readonly registry: SettingRegistry;
  private readonly logger: Logger;
  private readonly projection = new Set<number>([0]);
  private scope: string[] = [];
  private options: RunOptions;

  constructor(options: PlanSpecOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.registry = new SettingRegistry({ logger: this.logger });
    this.name = options.name ?? generateScenarioName(options.createdAt ?? new Date());
    this.type = options.type ?? PlanType.CUSTOM;
    this.version = options.version ?? null;
    this.options = parseRunOptions(options.runOptions);

    if (options.scope !== undefined) {
      this.setScope(options.scope);
    }
  }

  get runOptions(): RunOptions {
    return { ...this.options };
  }

  /** Sorted, de-duplicated, always including day 0. */
  get projectionDays(): number[] {
    return [...this.projection].sort((a, b) => a - b);
  }

  get scopeTargets(): string[] {
    return [...this.scope];
  }

  setRunOptions(input: RunOptionsInput): void {
    this.options = parseRunOptions({ ...this.options, ...input });
  }

  setScope(targets: string | string[], { append = false }: { append?: boolean } = {}): void {
    const ids = toList(targets);
    this.scope = append ? [...this.scope, ...ids] : ids;
  }

  changeEntity(action: EntityAction, targets: string | string[], options: ChangeEntityOptions = {}): void {
    const days = toDays(options.projection ?? [0]);

    if ((action === EntityAction.REPLACE || action === EntityAction.MIGRATE) && !options.newTarget) {
      throw new ValidationError(`Entity action '${action}' requires a new target`, { action });
    }

    for (const day of days) this.projection.add(day);

    for (const target of toList(targets)) {
      const change: SettingFields = { target };

      switch (action) {
        case EntityAction.ADD:
          change.count = options.count ?? 1;
          break;
        case EntityAction.REPLACE:
          change.template = options.newTarget ?? null;
          break;
        case EntityAction.MIGRATE:
          change.source = target;
          change.destination = options.newTarget ?? null;
          break;
        case EntityAction.REMOVE:
          break;
      }

      change.projection = action === EntityAction.ADD ? days : days[0];
      this.registry.add(ENTITY_TAGS[action], change);
    }
  }

  addEntity(targets: string | string[], options: { count?: number; projection?: number | number[] } = {}): void {
    this.changeEntity(EntityAction.ADD, targets, options);
  }

  removeEntity(targets: string | string[], options: { projection?: number | number[] } = {}): void {
    this.changeEntity(EntityAction.REMOVE, targets, options);
  }

  replaceEntity(targets: string | string[], template: string, options: { projection?: number | number[] } = {}): void {
    this.changeEntity(EntityAction.REPLACE, targets, { ...options, newTarget: template });
  }

  migrateEntity(targets: string | string[], destination: string, options: ProjectionOption = {}): void {
    this.changeEntity(EntityAction.MIGRATE, targets, { ...options, newTarget: destination });
  }

  /**
   * Toggles take a boolean. Desired state settings (utilTarget, targetBand)
   * take a number.
   */
  changeAutomationSetting(setting: AutomationSetting, value: boolean | number): void {
    if (setting === AutomationSetting.UTIL_TARGET || setting === AutomationSetting.TARGET_BAND) {
      if (typeof value !== 'number') {
        throw new ValidationError(`Automation setting '${setting}' requires a number`, { setting });
      }
      const label = setting === AutomationSetting.UTIL_TARGET ? 'center' : 'diameter';
      this.registry.update('desiredState', { [label]: value });
      return;
    }

    if (typeof value !== 'boolean') {
      throw new ValidationError(`Automation setting '${setting}' requires a boolean`, { setting });
    }

    if (setting === AutomationSetting.RESIZE) {
      const type = value ? 'ENABLED' : 'DISABLED';
      this.registry.update('automation.resize', {
        uuid: setting,
        value,
        type,
        desc: `Resize ${type.toLowerCase()}`,
      });
      return;
    }

    this.registry.update(AUTOMATION_TAGS[setting], { uuid: setting, value });
  }

  setDesiredState(center: number, diameter: number): void {
    this.registry.update('desiredState', { center, diameter });
  }

  /** `commodityType` is only sent to protocol versions before 6.1. */
  changeMaxUtilization(
    targets: string | string[],
    value: number,
    { commodityType = '', projection = 0 }: { commodityType?: string; projection?: number } = {},
  ): void {
    for (const uuid of toList(targets)) {
      this.registry.update(
        'maxUtilization',
        { uuid, util: value, projection, type: commodityType },
        { uuid },
      );
    }
  }

  changeUtilization(targets: string | string[], value: number, { projection = 0 }: ProjectionOption = {}): void {
    for (const uuid of toList(targets)) {
      this.registry.update('currentUtilization', { uuid, util: value, projection }, { uuid });
    }
  }

  /** `epoch` in seconds or milliseconds. */
  setHistoricalBaseline(epoch: number): void {
    this.registry.update('histBaseline', { value: epoch, date: epochToTimestamp(epoch) });
  }

  setPeakBaseline(targets: string | string[], epoch: number): void {
    const date = epochToTimestamp(epoch);
    for (const uuid of toList(targets)) {
      this.registry.update('peakBaseline', { uuid, value: epoch, date }, { uuid });
    }
  }

  addHistorical(value = true): void {
    this.registry.update('addHistorical', { value });
  }

  includeReserved(value = true): void {
    this.registry.update('includeReserved', { value });
  }

  /**
   * Remove a commodity constraint from the given targets, or every
   * constraint in the market when called without targets and commodity.
   */
  removeConstraints(
    targets?: string | string[],
    commodity?: ConstraintCommodity,
    { projection = 0 }: ProjectionOption = {},
  ): void {
    const ids = targets === undefined ? [] : toList(targets);

    if (ids.length > 0 && commodity) {
      for (const uuid of ids) {
        this.registry.update('constraint', { uuid, name: commodity, value: false, projection }, { uuid });
      }
      return;
    }

    if (ids.length === 0 && !commodity) {
      this.options = { ...this.options, ignoreConstraints: true };
      return;
    }

    this.logger.warn(
      { targets: ids, commodity },
      'removeConstraints needs both targets and a commodity, or neither; ignored',
    );
  }

  /** OS migration profile for cloud migration plans. */
  cloudOsProfile(options: CloudOsProfileOptions): void {
    const setOs = (setting: string, value: string | boolean): void => {
      this.registry.update('osMigration', { uuid: setting, value }, { uuid: setting });
    };

    if (options.customMap) {
      this.cloudOsProfile({ matchSource: false });
      for (const mapping of options.customMap) {
        setOs(CLOUD_TARGET_OS_SETTING[mapping.source], mapping.target);
        if (mapping.unlicensed !== undefined) {
          setOs(CLOUD_LICENSE_SETTING[mapping.source], mapping.unlicensed);
        }
      }
      return;
    }

    if (options.source && options.target) {
      setOs(CLOUD_TARGET_OS_SETTING[options.source], options.target);
      if (options.unlicensed !== undefined) {
        setOs(CLOUD_LICENSE_SETTING[options.source], options.unlicensed);
      }
      return;
    }

    if (options.matchSource !== undefined) {
      setOs('matchToSource', options.matchSource);
    }
    if (options.unlicensed !== undefined) {
      for (const os of DISTINCT_CLOUD_OS) {
        setOs(CLOUD_LICENSE_SETTING[os], options.unlicensed);
      }
    }
  }

  /** Move workload from the source clusters to the destination clusters. */
  relieveMigrationPressure(
    sources: string | string[],
    destinations: string | string[],
    { projection = 0 }: ProjectionOption = {},
  ): void {
    const from = toList(sources);
    const to = toList(destinations);

    this.setScope(from, { append: true });
    this.setScope(to, { append: true });
    this.registry.add('relievePressure', {
      sources: from.map((uuid) => ({ uuid })),
      destinations: to.map((uuid) => ({ uuid })),
      projection,
    });
  }

  /** Recorded settings, preceded by name, projection, scope and type. */
  getSettings(): SettingEntry[] {
    const scope: FieldRecord[] = this.scope.map((value) => ({ value }));
    return [
      { tag: 'name', fields: { value: this.name } },
      { tag: 'projection', fields: { list: this.projectionDays } },
      { tag: 'scope', fields: { scope } },
      { tag: 'type', fields: { value: this.type } },
      ...this.registry.entries(),
    ];
  }

  /** Market creation parameters. */
  getParams(): { ignoreConstraints: true } | undefined {
    return this.options.ignoreConstraints ? { ignoreConstraints: true } : undefined;
  }

  findSettings(tag: SettingTag): SettingEntry[] {
    return this.registry.find(tag);
  }

  compile(version?: string): WireDto {
    const target = version ?? this.version;
    if (!target) {
      throw new CompilationError('no-version', 'Unable to compile settings without a protocol version');
    }
    return resolveProtocol(target, this.logger).compile(this.getSettings());
  }

  toJson(version?: string, indent?: number): string {
    return canonicalJson(this.compile(version), indent);
  }
}
