export {
  ProviderRegistry,
  createDefaultRegistry,
  type AdapterClass,
  type RegistryStats,
} from './provider-registry.js';
