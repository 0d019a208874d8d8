export {
  createEmailOAuthService,
  enforceProductionStorage,
  type CreateServiceOptions,
  type EmailOAuthRuntime,
} from './from-environment.js';
export {
  loadServiceSettings,
  ServiceSettingsSchema,
  type ServiceSettings,
} from './settings.js';
