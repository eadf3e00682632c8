import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from '@modelgate/core';
import { noopLogger, toError } from '@modelgate/core';
import { parseSubmission } from './submission.js';
import type { CoordinatorHandle, HealthStatus } from './types.js';

const MAX_BODY_BYTES = 64 * 1024;
const REQUEST_PATH = /^\/requests\/([^/]+)$/;

class BadRequestError extends Error {
  constructor(
    message: string,
    readonly status = 400,
  ) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * HTTP control surface:
 *
 *   GET    /health          liveness
 *   GET    /status          coordinator status snapshot
 *   GET    /queue           pending requests in dequeue order
 *   POST   /requests        submit → 202 ack | 422 rejected | 400 malformed
 *   DELETE /requests/:id    cancel a queued request → 204 | 404
 */
export class ControlServer {
  private server: Server | null = null;
  private startTime = Date.now();
  private readonly logger: Logger;

  constructor(
    private readonly coordinator: CoordinatorHandle,
    logger?: Logger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  async start(port: number, host?: string): Promise<Server> {
    this.startTime = Date.now();
    const server = createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        const error = toError(err);
        const status = error instanceof BadRequestError ? error.status : 500;
        if (status === 500) this.logger.error(`Control request failed: ${error.message}`);
        if (!res.headersSent) sendJson(res, status, { error: error.message });
        else res.end();
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.logger.info(`Control server listening on ${host ?? '0.0.0.0'}:${this.port}`);
    return server;
  }

  /** Bound port, or 0 when not listening. */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address !== 'string' ? address.port : 0;
  }

  /** Underlying HTTP server, for attaching the WebSocket endpoint. */
  get httpServer(): Server | null {
    return this.server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.closeIdleConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';
    const path = url.pathname;

    switch (path) {
      case '/health': {
        if (method !== 'GET') return methodNotAllowed(res);
        const body: HealthStatus = { status: 'ok', uptime: Date.now() - this.startTime };
        return sendJson(res, 200, body);
      }

      case '/status':
        if (method !== 'GET') return methodNotAllowed(res);
        return sendJson(res, 200, this.coordinator.status());

      case '/queue':
        if (method !== 'GET') return methodNotAllowed(res);
        return sendJson(res, 200, { pending: this.coordinator.pending() });

      case '/requests': {
        if (method !== 'POST') return methodNotAllowed(res);
        const parsed = parseSubmission(await readJson(req));
        if (!parsed.ok) throw new BadRequestError(parsed.error);

        const { agent, task, priority, requester } = parsed.submission;
        const ack = this.coordinator.submit(agent, task, priority, requester);
        return sendJson(res, ack.accepted ? 202 : 422, ack);
      }
    }

    const match = REQUEST_PATH.exec(path);
    if (match?.[1]) {
      if (method !== 'DELETE') return methodNotAllowed(res);
      const id = decodeURIComponent(match[1]);
      if (this.coordinator.cancel(id)) {
        res.writeHead(204);
        res.end();
        return;
      }
      return sendJson(res, 404, { error: `No queued request: ${id}` });
    }

    sendJson(res, 404, { error: 'Not found' });
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function methodNotAllowed(res: ServerResponse): void {
  sendJson(res, 405, { error: 'Method not allowed' });
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  let size = 0;
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    if (!Buffer.isBuffer(chunk)) continue;
    size += chunk.length;
    if (size > MAX_BODY_BYTES) throw new BadRequestError('Body too large', 413);
    chunks.push(chunk);
  }
  const text = Buffer.concat(chunks).toString('utf-8');
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new BadRequestError('Body must be valid JSON');
  }
}
