/**
 * Microsoft adapter exports
 */

export { MicrosoftEmailAdapter } from './microsoft-adapter.js';
export { buildGraphPayload } from './message.js';
export type { GraphRecipient, GraphSendMailPayload } from './message.js';
export * from './constants.js';
