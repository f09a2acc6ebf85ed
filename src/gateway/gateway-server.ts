import { WebSocketServer, WebSocket, type RawData } from 'ws';
import {
  createServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse as HttpResponse,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type { CommandPipeline, CommandRequest, PipelineEvent } from '../command/command-pipeline.js';

export const SERVICE_NAME = 'tutor-command-center';

/** Largest accepted HTTP request body */
const MAX_BODY_BYTES = 1024 * 1024;

export interface GatewayConfig {
  port: number;
  host: string;
  /** How long stop() waits for in-flight commands before aborting them */
  shutdownTimeoutMs: number;
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  port: 8000,
  host: '127.0.0.1',
  shutdownTimeoutMs: 10_000,
};

/**
 * HTTP body of POST /tutor-command. `prompt` is accepted as an alias of
 * `command`.
 */
const CommandBodySchema = z
  .object({
    tutor_id: z.string().min(1).optional(),
    command: z.string().optional(),
    prompt: z.string().optional(),
  })
  .transform(body => ({ tutorId: body.tutor_id, command: (body.command ?? body.prompt ?? '').trim() }))
  .refine(body => body.command.length > 0, { message: 'Request body must include a non-empty "command"' });

const ClientMessageSchema = z.object({
  type: z.literal('command'),
  command: z.string().trim().min(1, 'Command must not be empty'),
  tutor_id: z.string().min(1).optional(),
});

/**
 * Messages streamed to WebSocket clients, one per pipeline event plus errors
 */
export type ServerMessage =
  | { type: 'connected'; clientId: string }
  | { type: PipelineEvent['type']; command_id: string; payload: unknown }
  | { type: 'error'; error: string };

interface ClientConnection {
  id: string;
  ws: WebSocket;
  connectedAt: number;
}

interface InFlightCommand {
  source: 'http' | 'ws';
  startedAt: number;
  abortController: AbortController;
}

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

/**
 * GatewayServer - HTTP and WebSocket entry point for tutor commands
 *
 * Both transports hand commands to the same CommandPipeline, which serializes
 * them. HTTP callers get the final response; WebSocket callers get every
 * pipeline event as it happens.
 */
export class GatewayServer {
  private readonly config: GatewayConfig;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();
  private inFlight: Map<string, InFlightCommand> = new Map();
  private isShuttingDown = false;

  constructor(
    config: Partial<GatewayConfig>,
    private readonly pipeline: CommandPipeline,
    private readonly logger: Logger
  ) {
    this.config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
  }

  getConfig(): GatewayConfig {
    return { ...this.config };
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get isRunning(): boolean {
    return this.httpServer !== null && this.httpServer.listening;
  }

  /**
   * Port actually bound, which differs from the configured one when that is 0
   */
  get port(): number {
    const address = this.httpServer?.address();
    return isAddressInfo(address) ? address.port : this.config.port;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Gateway server is already running');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.report(this.logger.error('Unhandled request failure', error, { operation: 'http_request' }));
        if (!res.headersSent) {
          this.sendJson(res, 500, { error: 'Internal server error' });
        }
      });
    });
    this.httpServer = server;

    this.wss = new WebSocketServer({ server, clientTracking: true });
    this.wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    this.wss.on('error', error => this.handleServerError(error));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.removeListener('error', reject);
        resolve();
      });
    });
    server.on('error', error => this.handleServerError(error));

    await this.logger.info('Gateway server started', {
      operation: 'gateway_start',
      port: this.port,
      host: this.config.host,
    });
  }

  private async handleRequest(req: IncomingMessage, res: HttpResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (path === '/' && req.method === 'GET') {
      this.sendJson(res, 200, { message: 'Tutor Command Center API is running' });
      return;
    }
    if (path === '/health' && req.method === 'GET') {
      this.sendJson(res, 200, { status: 'healthy', service: SERVICE_NAME });
      return;
    }
    if (path === '/tutor-command') {
      if (req.method !== 'POST') {
        res.setHeader('Allow', 'POST');
        this.sendJson(res, 405, { error: `Method ${req.method ?? ''} not allowed` });
        return;
      }
      await this.handleCommandRequest(req, res);
      return;
    }
    this.sendJson(res, 404, { error: 'Not found' });
  }

  private async handleCommandRequest(req: IncomingMessage, res: HttpResponse): Promise<void> {
    if (this.isShuttingDown) {
      this.sendJson(res, 503, { error: 'Server is shutting down. Please try again later.' });
      return;
    }

    let request: CommandRequest;
    try {
      request = parseCommandBody(await readBody(req));
    } catch (error) {
      if (error instanceof HttpError) {
        this.sendJson(res, error.status, { error: error.message });
        return;
      }
      throw error;
    }

    const requestId = randomUUID();
    const abortController = new AbortController();
    this.inFlight.set(requestId, { source: 'http', startedAt: Date.now(), abortController });
    res.on('close', () => {
      if (!res.writableEnded) {
        abortController.abort();
      }
    });

    try {
      const response = await this.pipeline.run({ ...request, signal: abortController.signal });
      this.sendJson(res, 200, response);
    } finally {
      this.inFlight.delete(requestId);
    }
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const clientId = randomUUID();
    this.clients.set(clientId, { id: clientId, ws, connectedAt: Date.now() });

    this.report(
      this.logger.info('Client connected', {
        operation: 'client_connect',
        clientId,
        remoteAddress: req.socket.remoteAddress,
      })
    );

    ws.on('message', data => {
      this.handleMessage(clientId, data).catch((error: unknown) => {
        this.report(this.logger.error('Error processing command', error, { operation: 'ws_command', clientId }));
        this.send(ws, { type: 'error', error: 'Failed to process command' });
      });
    });
    ws.on('close', () => this.handleDisconnect(clientId));
    ws.on('error', error => {
      this.report(this.logger.error('Client error', error, { operation: 'client_error', clientId }));
    });

    this.send(ws, { type: 'connected', clientId });
  }

  private async handleMessage(clientId: string, data: RawData): Promise<void> {
    const connection = this.clients.get(clientId);
    if (!connection) return;

    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      this.send(connection.ws, { type: 'error', error: 'Invalid JSON message' });
      return;
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const type = isRecord(raw) ? raw['type'] : undefined;
      this.send(connection.ws, {
        type: 'error',
        error: type === 'command' ? firstIssue(parsed.error) : `Unknown message type: ${String(type)}`,
      });
      return;
    }

    if (this.isShuttingDown) {
      this.send(connection.ws, { type: 'error', error: 'Server is shutting down. Please try again later.' });
      return;
    }

    const requestId = randomUUID();
    const abortController = new AbortController();
    this.inFlight.set(requestId, { source: 'ws', startedAt: Date.now(), abortController });

    try {
      const request: CommandRequest = {
        command: parsed.data.command,
        signal: abortController.signal,
        ...(parsed.data.tutor_id !== undefined ? { tutorId: parsed.data.tutor_id } : {}),
      };
      for await (const event of this.pipeline.stream(request)) {
        this.send(connection.ws, toServerMessage(event));
      }
    } finally {
      this.inFlight.delete(requestId);
    }
  }

  private handleDisconnect(clientId: string): void {
    if (this.clients.delete(clientId)) {
      this.report(this.logger.info('Client disconnected', { operation: 'client_disconnect', clientId }));
    }
  }

  private handleServerError(error: Error): void {
    this.report(this.logger.error('Gateway server error', error, { operation: 'gateway_error' }));

    if (isFatalError(error)) {
      this.stop().catch((stopError: unknown) => {
        this.report(this.logger.error('Gateway shutdown failed', stopError, { operation: 'gateway_shutdown' }));
      });
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private sendJson(res: HttpResponse, status: number, body: unknown): void {
    const payload = JSON.stringify(body);
    res.writeHead(status, {
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
  }

  /**
   * Log writes from event handlers have nobody to propagate to
   */
  private report(write: Promise<void>): void {
    write.catch((error: unknown) => {
      console.error('Failed to write gateway log:', error);
    });
  }

  /**
   * Stops accepting commands, waits for in-flight ones up to
   * `shutdownTimeoutMs`, aborts what remains and closes every connection
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server || !this.isRunning) {
      return;
    }

    this.isShuttingDown = true;
    await this.logger.info('Gateway server shutting down', {
      operation: 'gateway_shutdown',
      inFlightCommands: this.inFlight.size,
      connectedClients: this.clients.size,
    });

    const startTime = Date.now();
    while (this.inFlight.size > 0 && Date.now() - startTime < this.config.shutdownTimeoutMs) {
      await new Promise(resolve => setTimeout(resolve, 50));
    }

    if (this.inFlight.size > 0) {
      await this.logger.warn('Aborting commands still in flight', {
        operation: 'gateway_shutdown',
        inFlightCommands: this.inFlight.size,
      });
      for (const command of this.inFlight.values()) {
        command.abortController.abort();
      }
    }

    for (const connection of this.clients.values()) {
      connection.ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();
    this.wss?.close();

    await new Promise<void>(resolve => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this.httpServer = null;
    this.wss = null;
    this.isShuttingDown = false;

    await this.logger.info('Gateway server stopped', { operation: 'gateway_stopped' });
  }
}

function toServerMessage(event: PipelineEvent): ServerMessage {
  switch (event.type) {
    case 'interpreted':
      return {
        type: 'interpreted',
        command_id: event.commandId,
        payload: { calls: event.calls, attempts: event.attempts, reply: event.reply },
      };
    case 'tool_call':
      return { type: 'tool_call', command_id: event.commandId, payload: event.call };
    case 'tool_result':
      return { type: 'tool_result', command_id: event.commandId, payload: event.outcome };
    case 'done':
      return { type: 'done', command_id: event.commandId, payload: event.response };
  }
}

/**
 * Validates a POST /tutor-command body
 * @throws HttpError (400) when the body is not an acceptable command request
 */
export function parseCommandBody(body: string): CommandRequest {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new HttpError(400, 'Request body must be JSON');
  }

  const parsed = CommandBodySchema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(400, firstIssue(parsed.error));
  }
  return parsed.data.tutorId !== undefined
    ? { command: parsed.data.command, tutorId: parsed.data.tutorId }
    : { command: parsed.data.command };
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, 'Request body is too large');
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAddressInfo(address: string | AddressInfo | null | undefined): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

function isFatalError(error: Error): boolean {
  return 'code' in error && typeof error.code === 'string' && ['EADDRINUSE', 'EACCES', 'EPERM'].includes(error.code);
}
