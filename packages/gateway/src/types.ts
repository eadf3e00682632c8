import type { OutcomeStatus, Priority, RejectReason } from '@modelgate/core';
import type { Coordinator } from '@modelgate/orchestrator';

/** The part of the coordinator the control surface talks to. */
export type CoordinatorHandle = Pick<
  Coordinator,
  'submit' | 'cancel' | 'status' | 'pending' | 'subscribe'
>;

/** A validated submission from HTTP or WebSocket. */
export interface Submission {
  agent: string;
  task: string;
  priority?: Priority;
  requester?: string;
}

/** Client → server WebSocket frame. */
export interface SubmitFrame {
  type: 'submit';
  agent: string;
  task: string;
  priority?: string;
  /** Echoed back in the ack so clients can match replies. */
  ref?: string;
}

/** Server → client WebSocket frames. */
export type ServerFrame =
  | { type: 'ack'; ref?: string; accepted: true; requestId: string; position: number }
  | { type: 'ack'; ref?: string; accepted: false; reason: RejectReason | 'Invalid'; message: string }
  | {
      type: 'outcome';
      requestId: string;
      agent: string;
      status: OutcomeStatus;
      waitMs: number;
      result?: unknown;
      error?: { name: string; message: string };
    };

/** A connected WebSocket client. */
export interface WsSession {
  id: string;
  requesterId: string;
  connectedAt: string;
}

export interface HealthStatus {
  status: 'ok';
  uptime: number;
}
