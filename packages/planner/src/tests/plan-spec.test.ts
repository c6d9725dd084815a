import { describe, it, expect, beforeEach } from 'vitest';
import { PlanSpec } from '../plan/plan-spec.js';
import { DEFAULT_RUN_OPTIONS } from '../plan/run-options.js';
import { CompilationError, ValidationError } from '../lib/errors.js';
import { AutomationSetting, ConstraintCommodity, EntityAction, PlanType } from '../types/enums.js';
import { testUuid } from './setup.js';

const VM_A = testUuid('a');
const VM_B = testUuid('b');
const VM_C = testUuid('c');
const TEMPLATE = testUuid('7e');

describe('PlanSpec', () => {
  let spec: PlanSpec;

  beforeEach(() => {
    spec = new PlanSpec({ name: 'capacity-check' });
  });

  describe('construction', () => {
    it('applies defaults', () => {
      const created = new PlanSpec({ createdAt: new Date(2024, 0, 15, 9, 30, 5) });

      expect(created.name).toBe('CUSTOM_20240115_093005');
      expect(created.type).toBe(PlanType.CUSTOM);
      expect(created.version).toBeNull();
      expect(created.projectionDays).toEqual([0]);
      expect(created.scopeTargets).toEqual([]);
      expect(created.runOptions).toEqual(DEFAULT_RUN_OPTIONS);
    });

    it('accepts a single scope target', () => {
      const created = new PlanSpec({ scope: VM_A });
      expect(created.scopeTargets).toEqual([VM_A]);
    });

    it('rejects invalid run options', () => {
      expect(() => new PlanSpec({ runOptions: { maxRetry: 0 } })).toThrow(ValidationError);
    });
  });

  describe('run options', () => {
    it('merges updates over the current options', () => {
      spec.setRunOptions({ timeoutMinutes: 30 });
      spec.setRunOptions({ maxRetry: 5 });

      expect(spec.runOptions).toEqual({ ...DEFAULT_RUN_OPTIONS, timeoutMinutes: 30, maxRetry: 5 });
    });

    it('keeps the previous options when an update is invalid', () => {
      expect(() => spec.setRunOptions({ pollIntervalSeconds: -1 })).toThrow(ValidationError);
      expect(spec.runOptions).toEqual(DEFAULT_RUN_OPTIONS);
    });
  });

  describe('scope', () => {
    it('replaces by default and appends on request', () => {
      spec.setScope([VM_A, VM_B]);
      spec.setScope(VM_C);
      expect(spec.scopeTargets).toEqual([VM_C]);

      spec.setScope([VM_A], { append: true });
      expect(spec.scopeTargets).toEqual([VM_C, VM_A]);
    });
  });

  describe('entity changes', () => {
    it('records one add per target with count and every projection day', () => {
      spec.addEntity([VM_A, VM_B], { count: 3, projection: [14, 7] });

      expect(spec.findSettings('entity.add')).toEqual([
        { tag: 'entity.add', fields: { target: VM_A, count: 3, projection: [14, 7] } },
        { tag: 'entity.add', fields: { target: VM_B, count: 3, projection: [14, 7] } },
      ]);
      expect(spec.projectionDays).toEqual([0, 7, 14]);
    });

    it('defaults additions to one copy on day 0', () => {
      spec.addEntity(VM_A);
      expect(spec.findSettings('entity.add')[0].fields).toEqual({ target: VM_A, count: 1, projection: [0] });
    });

    it('records removals against the first projection day', () => {
      spec.removeEntity(VM_A, { projection: [30, 60] });

      expect(spec.findSettings('entity.remove')[0].fields).toEqual({ target: VM_A, projection: 30 });
      expect(spec.projectionDays).toEqual([0, 30, 60]);
    });

    it('records replacement templates', () => {
      spec.replaceEntity(VM_A, TEMPLATE);
      expect(spec.findSettings('entity.replace')[0].fields).toEqual({
        target: VM_A,
        template: TEMPLATE,
        projection: 0,
      });
    });

    it('records migrations with source and destination', () => {
      spec.migrateEntity(VM_A, VM_B, { projection: 3 });
      expect(spec.findSettings('entity.migrate')[0].fields).toEqual({
        target: VM_A,
        source: VM_A,
        destination: VM_B,
        projection: 3,
      });
    });

    it('requires a new target for replace and migrate', () => {
      expect(() => spec.changeEntity(EntityAction.REPLACE, VM_A)).toThrow(ValidationError);
      expect(() => spec.changeEntity(EntityAction.MIGRATE, VM_A)).toThrow(
        "Entity action 'migrate' requires a new target",
      );
      expect(spec.findSettings('entity.replace')).toEqual([]);
    });

    it('rejects negative projection days', () => {
      expect(() => spec.addEntity(VM_A, { projection: -1 })).toThrow(
        'Projection day must be a non-negative integer, got -1',
      );
      expect(spec.projectionDays).toEqual([0]);
    });

    it('rejects an empty projection list', () => {
      expect(() => spec.removeEntity(VM_A, { projection: [] })).toThrow('At least one projection day is required');
    });
  });

  describe('automation settings', () => {
    it('toggles resize in a single entry', () => {
      spec.changeAutomationSetting(AutomationSetting.RESIZE, true);
      spec.changeAutomationSetting(AutomationSetting.RESIZE, false);

      expect(spec.findSettings('automation.resize')).toEqual([
        {
          tag: 'automation.resize',
          fields: { uuid: 'resize', value: false, type: 'DISABLED', desc: 'Resize disabled' },
        },
      ]);
    });

    it('records provision and suspend toggles under their own tags', () => {
      spec.changeAutomationSetting(AutomationSetting.SUSPEND_PM, true);
      spec.changeAutomationSetting(AutomationSetting.PROVISION_DS, false);

      expect(spec.findSettings('automation.suspendPM')[0].fields).toEqual({ uuid: 'suspendPM', value: true });
      expect(spec.findSettings('automation.provisionDS')[0].fields).toEqual({ uuid: 'provisionDS', value: false });
    });

    it('folds utilTarget and targetBand into one desired state', () => {
      spec.changeAutomationSetting(AutomationSetting.UTIL_TARGET, 70);
      spec.changeAutomationSetting(AutomationSetting.TARGET_BAND, 10);

      expect(spec.findSettings('desiredState')).toEqual([
        { tag: 'desiredState', fields: { center: 70, diameter: 10 } },
      ]);
    });

    it('checks the value type for each setting', () => {
      expect(() => spec.changeAutomationSetting(AutomationSetting.UTIL_TARGET, true)).toThrow(
        "Automation setting 'utilTarget' requires a number",
      );
      expect(() => spec.changeAutomationSetting(AutomationSetting.RESIZE, 1)).toThrow(
        "Automation setting 'resize' requires a boolean",
      );
    });

    it('overwrites desired state with setDesiredState', () => {
      spec.changeAutomationSetting(AutomationSetting.UTIL_TARGET, 70);
      spec.setDesiredState(60, 20);

      expect(spec.findSettings('desiredState')[0].fields).toEqual({ center: 60, diameter: 20 });
    });
  });

  describe('utilization and baselines', () => {
    it('keeps one max utilization entry per target', () => {
      spec.changeMaxUtilization([VM_A, VM_B], 80, { commodityType: 'CPU' });
      spec.changeMaxUtilization(VM_A, 60, { projection: 7 });

      expect(spec.findSettings('maxUtilization')).toEqual([
        { tag: 'maxUtilization', fields: { uuid: VM_A, util: 60, projection: 7, type: '' } },
        { tag: 'maxUtilization', fields: { uuid: VM_B, util: 80, projection: 0, type: 'CPU' } },
      ]);
    });

    it('keeps one current utilization entry per target', () => {
      spec.changeUtilization(VM_A, 40);
      spec.changeUtilization(VM_A, 55);

      expect(spec.findSettings('currentUtilization')).toEqual([
        { tag: 'currentUtilization', fields: { uuid: VM_A, util: 55, projection: 0 } },
      ]);
    });

    it('formats baselines from epoch seconds or milliseconds', () => {
      spec.setHistoricalBaseline(1_700_000_000);
      spec.setPeakBaseline(VM_A, 1_700_000_000_000);

      expect(spec.findSettings('histBaseline')[0].fields).toEqual({
        value: 1_700_000_000,
        date: '2023-11-14T22:13:20Z',
      });
      expect(spec.findSettings('peakBaseline')[0].fields).toEqual({
        uuid: VM_A,
        value: 1_700_000_000_000,
        date: '2023-11-14T22:13:20Z',
      });
    });

    it('records peak baselines per target', () => {
      spec.setPeakBaseline([VM_A, VM_B], 1_700_000_000);
      spec.setPeakBaseline(VM_B, 1_700_086_400);

      const dates = spec.findSettings('peakBaseline').map((entry) => [entry.fields.uuid, entry.fields.date]);
      expect(dates).toEqual([
        [VM_A, '2023-11-14T22:13:20Z'],
        [VM_B, '2023-11-15T22:13:20Z'],
      ]);
    });

    it('records historical and reserved toggles', () => {
      spec.addHistorical();
      spec.includeReserved(false);

      expect(spec.findSettings('addHistorical')[0].fields).toEqual({ value: true });
      expect(spec.findSettings('includeReserved')[0].fields).toEqual({ value: false });
    });
  });

  describe('removeConstraints', () => {
    it('removes one commodity constraint per target', () => {
      spec.removeConstraints([VM_A, VM_B], ConstraintCommodity.CLUSTER, { projection: 2 });

      expect(spec.findSettings('constraint')).toEqual([
        { tag: 'constraint', fields: { uuid: VM_A, name: 'ClusterCommodity', value: false, projection: 2 } },
        { tag: 'constraint', fields: { uuid: VM_B, name: 'ClusterCommodity', value: false, projection: 2 } },
      ]);
      expect(spec.getParams()).toBeUndefined();
    });

    it('ignores every constraint when called without arguments', () => {
      spec.removeConstraints();

      expect(spec.findSettings('constraint')).toEqual([]);
      expect(spec.getParams()).toEqual({ ignoreConstraints: true });
      expect(spec.runOptions.ignoreConstraints).toBe(true);
    });

    it('records nothing when only one of targets and commodity is given', () => {
      spec.removeConstraints(VM_A);
      spec.removeConstraints(undefined, ConstraintCommodity.NETWORK);

      expect(spec.findSettings('constraint')).toEqual([]);
      expect(spec.getParams()).toBeUndefined();
    });
  });

  describe('cloudOsProfile', () => {
    it('maps a single source OS', () => {
      spec.cloudOsProfile({ source: 'RHEL', target: 'LINUX', unlicensed: true });

      expect(spec.findSettings('osMigration').map((entry) => entry.fields)).toEqual([
        { uuid: 'rhelTargetOs', value: 'LINUX' },
        { uuid: 'rhelByol', value: true },
      ]);
    });

    it('disables source matching before applying a custom map', () => {
      spec.cloudOsProfile({ customMap: [{ source: 'WINDOWS', target: 'LINUX', unlicensed: false }] });

      expect(spec.findSettings('osMigration').map((entry) => entry.fields)).toEqual([
        { uuid: 'matchToSource', value: false },
        { uuid: 'windowsTargetOs', value: 'LINUX' },
        { uuid: 'windowsByol', value: false },
      ]);
    });

    it('applies licensing to every distinct OS', () => {
      spec.cloudOsProfile({ matchSource: true, unlicensed: true });

      expect(spec.findSettings('osMigration').map((entry) => entry.fields)).toEqual([
        { uuid: 'matchToSource', value: true },
        { uuid: 'linuxByol', value: true },
        { uuid: 'rhelByol', value: true },
        { uuid: 'slesByol', value: true },
        { uuid: 'windowsByol', value: true },
      ]);
    });

    it('updates a setting in place when profiled twice', () => {
      spec.cloudOsProfile({ matchSource: true });
      spec.cloudOsProfile({ matchSource: false });

      expect(spec.findSettings('osMigration').map((entry) => entry.fields)).toEqual([
        { uuid: 'matchToSource', value: false },
      ]);
    });
  });

  describe('relieveMigrationPressure', () => {
    it('extends the scope and compiles source and destination lists', () => {
      spec.setScope(VM_A);
      spec.relieveMigrationPressure(VM_A, [VM_B, VM_C]);

      expect(spec.scopeTargets).toEqual([VM_A, VM_A, VM_B, VM_C]);
      expect(spec.compile('7.22.0').topologyChanges).toEqual({
        relievePressureList: [
          { projectionDay: 0, sources: [{ uuid: VM_A }], destinations: [{ uuid: VM_B }, { uuid: VM_C }] },
        ],
      });
    });
  });

  describe('getSettings', () => {
    it('emits name, projection, scope and type ahead of recorded settings', () => {
      spec.setScope([VM_A, VM_B]);
      spec.includeReserved();
      spec.addEntity(VM_C, { projection: 7 });

      expect(spec.getSettings()).toEqual([
        { tag: 'name', fields: { value: 'capacity-check' } },
        { tag: 'projection', fields: { list: [0, 7] } },
        { tag: 'scope', fields: { scope: [{ value: VM_A }, { value: VM_B }] } },
        { tag: 'type', fields: { value: 'CUSTOM' } },
        { tag: 'includeReserved', fields: { value: true } },
        { tag: 'entity.add', fields: { target: VM_C, count: 1, projection: [7] } },
      ]);
    });

    it('returns copies', () => {
      spec.addHistorical();
      const settings = spec.getSettings();
      settings[4].fields.value = false;

      expect(spec.findSettings('addHistorical')[0].fields).toEqual({ value: true });
    });
  });

  describe('compile', () => {
    it('requires a protocol version', () => {
      let caught: unknown;
      try {
        spec.compile();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CompilationError);
      expect(caught).toMatchObject({ reason: 'no-version' });
    });

    it('uses the version the spec was built for', () => {
      const versioned = new PlanSpec({ name: 'p', version: '5.9.0' });
      expect(versioned.compile()).toEqual({
        displayName: 'p',
        type: 'CUSTOM',
        changes: [
          { type: 'PROJECTION_PERIODS', projectionDays: [0] },
          { type: 'SCOPE', scope: [] },
        ],
      });
    });

    it('translates automation toggles from 7.21', () => {
      spec.changeAutomationSetting(AutomationSetting.SUSPEND_PM, true);

      expect(spec.compile('7.21.0').configChanges).toEqual({
        automationSettingList: [{ uuid: 'suspend', value: 'ENABLED', entityType: 'PhysicalMachine' }],
      });
      expect(spec.compile('7.20.0').configChanges).toEqual({
        automationSettingList: [{ uuid: 'suspendPM', value: true, entityType: 'PhysicalMachine' }],
      });
    });

    it('fails when desired state is incomplete', () => {
      spec.changeAutomationSetting(AutomationSetting.UTIL_TARGET, 70);
      expect(() => spec.compile('6.1.0')).toThrow("Setting 'desiredState' has no value for 'diameter'");
    });

    it('serialises deterministically with sorted keys', () => {
      const built = new PlanSpec({ name: 'p', version: '6.1.0' });
      built.addHistorical();

      const expected =
        '{"displayName":"p","projectionDays":[0],"scope":[],"timebasedTopologyChanges":{"addHistoryVMs":true},"type":"CUSTOM"}';
      expect(built.toJson()).toBe(expected);
      expect(built.toJson()).toBe(built.toJson());
    });

    it('indents on request', () => {
      const built = new PlanSpec({ name: 'p', version: '6.1.0' });
      expect(built.toJson(undefined, 2)).toBe(
        ['{', '  "displayName": "p",', '  "projectionDays": [', '    0', '  ],', '  "scope": [],', '  "type": "CUSTOM"', '}'].join('\n'),
      );
    });
  });
});
