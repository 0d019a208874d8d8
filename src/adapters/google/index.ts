/**
 * Google adapter exports
 */

export { GoogleEmailAdapter } from './google-adapter.js';
export { buildGmailPayload, buildMimeMessage } from './message.js';
export * from './constants.js';
