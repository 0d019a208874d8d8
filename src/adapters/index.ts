/**
 * Email OAuth provider adapters exports
 */

export * from './google/index.js';
export * from './microsoft/index.js';

// Re-export base adapter for convenience
export {
  BaseEmailOAuthAdapter,
  ADAPTER_METHODS,
  type AdapterDependencies,
  type EmailOAuthAdapter,
  type SendRequest,
} from '../base-adapter.js';
