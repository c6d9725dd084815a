export const MarketState = {
  /** Plan scope is being copied. */
  COPYING: 'COPYING',
  /** Market exists but has not been started. */
  CREATED: 'CREATED',
  DELETING: 'DELETING',
  READY_TO_START: 'READY_TO_START',
  RUNNING: 'RUNNING',
  STOPPED: 'STOPPED',
  SUCCEEDED: 'SUCCEEDED',
  /** Stopped manually by a user. */
  USER_STOPPED: 'USER_STOPPED',
} as const;

export type MarketState = (typeof MarketState)[keyof typeof MarketState];

const MARKET_STATES: readonly string[] = Object.values(MarketState);

export function isMarketState(value: string): value is MarketState {
  return MARKET_STATES.includes(value);
}

export const TERMINAL_MARKET_STATES: readonly MarketState[] = [
  MarketState.SUCCEEDED,
  MarketState.STOPPED,
  MarketState.USER_STOPPED,
];

export const PlanType = {
  ADD_WORKLOAD: 'ADD_WORKLOAD',
  ALLEVIATE_PRESSURE: 'ALLEVIATE_PRESSURE',
  CLOUD_MIGRATION: 'CLOUD_MIGRATION',
  CUSTOM: 'CUSTOM',
  DECOMMISSION_HOST: 'DECOMMISSION_HOST',
  OPTIMIZE_ONPREM: 'OPTIMIZE_ONPREM',
  PROJECTION: 'PROJECTION',
  RECONFIGURE_HARDWARE: 'RECONFIGURE_HARDWARE',
  WORKLOAD_MIGRATION: 'WORKLOAD_MIGRATION',
} as const;

export type PlanType = (typeof PlanType)[keyof typeof PlanType];

export const AutomationSetting = {
  PROVISION_DS: 'provisionDS',
  PROVISION_PM: 'provisionPM',
  RESIZE: 'resize',
  SUSPEND_DS: 'suspendDS',
  SUSPEND_PM: 'suspendPM',
  /** Desired state center (efficiency). */
  UTIL_TARGET: 'utilTarget',
  /** Desired state diameter (narrowness). */
  TARGET_BAND: 'targetBand',
} as const;

export type AutomationSetting = (typeof AutomationSetting)[keyof typeof AutomationSetting];

export const EntityAction = {
  ADD: 'add',
  MIGRATE: 'migrate',
  REMOVE: 'remove',
  REPLACE: 'replace',
} as const;

export type EntityAction = (typeof EntityAction)[keyof typeof EntityAction];

export const CloudOS = {
  LINUX: 'LINUX',
  RHEL: 'RHEL',
  SLES: 'SLES',
  SUSE: 'SLES',
  WINDOWS: 'WINDOWS',
} as const;

export type CloudOS = (typeof CloudOS)[keyof typeof CloudOS];

/** OS migration setting holding the target OS for each source OS. */
export const CLOUD_TARGET_OS_SETTING: Record<CloudOS, string> = {
  LINUX: 'linuxTargetOs',
  RHEL: 'rhelTargetOs',
  SLES: 'slesTargetOs',
  WINDOWS: 'windowsTargetOs',
};

/** OS migration setting toggling bring-your-own-license for each source OS. */
export const CLOUD_LICENSE_SETTING: Record<CloudOS, string> = {
  LINUX: 'linuxByol',
  RHEL: 'rhelByol',
  SLES: 'slesByol',
  WINDOWS: 'windowsByol',
};

export const ConstraintCommodity = {
  CLUSTER: 'ClusterCommodity',
  NETWORK: 'NetworkCommodity',
  STORAGE_CLUSTER: 'StorageClusterCommodity',
  DATACENTER: 'DataCenterCommodity',
} as const;

export type ConstraintCommodity = (typeof ConstraintCommodity)[keyof typeof ConstraintCommodity];
