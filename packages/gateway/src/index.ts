// Types
export type {
  CoordinatorHandle,
  Submission,
  SubmitFrame,
  ServerFrame,
  WsSession,
  HealthStatus,
} from './types.js';

// Submission parsing
export { parseSubmission } from './submission.js';
export type { ParseResult } from './submission.js';

// HTTP control server
export { ControlServer } from './control-server.js';

// WebSocket submit + outcome endpoint
export { OutcomeWebSocketServer } from './outcome-socket.js';
export type { OutcomeSocketOptions } from './outcome-socket.js';
