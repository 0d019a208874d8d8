export { EmailOAuthService } from './email-oauth-service.js';
export type {
  AuthUrlResult,
  CallbackResult,
  RefreshResult,
  RevokeResult,
  SendEmailResult,
  StoreConfigurationRequest,
} from './email-oauth-service.js';
