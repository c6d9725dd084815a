export { SettingRegistry, type SettingRegistryOptions } from './settings/setting-registry.js';
export { matchesFilter, resolvePath } from './settings/filter.js';
export { compile, type CompileOptions } from './mapping/mapping-engine.js';
export { collate } from './mapping/collator.js';
export { translateValue } from './mapping/value-map.js';
export {
  VERSION_TABLE,
  resolveDefinitions,
  type ProtocolGeneration,
  type ProtocolPatch,
  type ResolvedDefinitions,
} from './protocol/version-table.js';
export { ProtocolStrategy, resolveProtocol } from './protocol/protocol-strategy.js';
