import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import type { Disposable, Logger, RequestOutcome } from '@modelgate/core';
import { generateId, isRecord, noopLogger, now } from '@modelgate/core';
import { parseSubmission } from './submission.js';
import type { CoordinatorHandle, ServerFrame, WsSession } from './types.js';

export interface OutcomeSocketOptions {
  /** HTTP server to accept upgrades on (usually the control server's). */
  httpServer: HttpServer;
  /** URL path to accept WebSocket upgrades on. Default: "/ws" */
  path?: string;
  logger?: Logger;
}

/**
 * WebSocket endpoint for submitting requests and receiving their outcomes.
 *
 * Clients connect to `/ws?requester=<id>`; requests they submit are tagged
 * with that requester id, and every outcome for a request carrying the id is
 * pushed to all of that requester's open sockets.
 */
export class OutcomeWebSocketServer {
  private wss: WebSocketServer | null = null;
  private subscription: Disposable | null = null;
  private readonly sessions = new Map<string, { ws: WebSocket; session: WsSession }>();
  private logger: Logger = noopLogger;

  constructor(private readonly coordinator: CoordinatorHandle) {}

  start(options: OutcomeSocketOptions): void {
    const wss = new WebSocketServer({ noServer: true });
    this.wss = wss;
    this.logger = options.logger ?? noopLogger;
    const wsPath = options.path ?? '/ws';

    options.httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const url = new URL(req.url ?? '/', 'http://localhost');
      if (url.pathname !== wsPath) {
        socket.destroy();
        return;
      }
      const requesterId = url.searchParams.get('requester') || `anon-${generateId().slice(0, 8)}`;
      wss.handleUpgrade(req, socket, head, (ws) => {
        this.handleConnection(ws, requesterId);
      });
    });

    this.subscription = this.coordinator.subscribe((outcome) => {
      this.deliver(outcome);
    });
  }

  getSession(sessionId: string): WsSession | undefined {
    return this.sessions.get(sessionId)?.session;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  async close(): Promise<void> {
    this.subscription?.dispose();
    this.subscription = null;
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    for (const { ws } of this.sessions.values()) {
      ws.close(1001, 'Server shutting down');
    }
    this.sessions.clear();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private handleConnection(ws: WebSocket, requesterId: string): void {
    const sessionId = generateId();
    this.sessions.set(sessionId, {
      ws,
      session: { id: sessionId, requesterId, connectedAt: now() },
    });
    this.logger.debug(`WebSocket session ${sessionId} opened for ${requesterId}`);

    ws.on('message', (data) => {
      send(ws, this.handleFrame(data, requesterId));
    });

    ws.on('close', () => {
      this.sessions.delete(sessionId);
    });

    ws.on('error', (err) => {
      this.logger.warn(`WebSocket session ${sessionId} error: ${err.message}`);
      this.sessions.delete(sessionId);
    });
  }

  private handleFrame(data: RawData, requesterId: string): ServerFrame {
    let frame: unknown;
    try {
      frame = JSON.parse(data.toString());
    } catch {
      return invalid(undefined, 'Invalid message format');
    }
    const ref = isRecord(frame) && typeof frame['ref'] === 'string' ? frame['ref'] : undefined;
    if (!isRecord(frame) || frame['type'] !== 'submit') {
      return invalid(ref, 'Unsupported message type');
    }

    const parsed = parseSubmission({ ...frame, requester: requesterId });
    if (!parsed.ok) return invalid(ref, parsed.error);

    const { agent, task, priority } = parsed.submission;
    const ack = this.coordinator.submit(agent, task, priority, requesterId);
    return ref === undefined ? { type: 'ack', ...ack } : { type: 'ack', ref, ...ack };
  }

  private deliver(outcome: RequestOutcome): void {
    const { request } = outcome;
    if (request.requesterId === undefined) return;

    const frame: ServerFrame = {
      type: 'outcome',
      requestId: request.id,
      agent: request.agentId,
      status: outcome.status,
      waitMs: outcome.waitMs,
      ...(outcome.result !== undefined ? { result: outcome.result } : {}),
      ...(outcome.error ? { error: outcome.error } : {}),
    };
    for (const { ws, session } of this.sessions.values()) {
      if (session.requesterId === request.requesterId) send(ws, frame);
    }
  }
}

function invalid(ref: string | undefined, message: string): ServerFrame {
  return ref === undefined
    ? { type: 'ack', accepted: false, reason: 'Invalid', message }
    : { type: 'ack', ref, accepted: false, reason: 'Invalid', message };
}

function send(ws: WebSocket, frame: ServerFrame): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(frame));
  }
}
