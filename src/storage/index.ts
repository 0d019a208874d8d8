export type {
  ConfigurationStore,
  ConfigurationPatch,
  ConfigurationFilter,
  NewConfiguration,
} from './configuration-store.js';
export { InMemoryConfigurationStore } from './in-memory-store.js';
export {
  toPublicConfiguration,
  PROVIDER_DISPLAY_NAMES,
} from './serialization.js';
export type { PublicConfiguration } from './serialization.js';
