import type { LogMeta, LogTransport } from '../logging/types.js';

// Emulates console transport
export class MockTransport implements LogTransport {
  public logs: LogMeta[];
  public errors: LogMeta[];

  constructor() {
    this.logs = [];
    this.errors = [];
  }

  log(message: LogMeta) {
    this.logs.push(message);
  }

  error(message: LogMeta) {
    this.errors.push(message);
  }
}
