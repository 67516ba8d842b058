import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import { CLOSE_CODE, LIMITS, SERVER, TIME } from '../core/constants';
import { type Logger, SilentLogger, toError } from '../core/types/Logger';
import { selectStrategy } from '../formats';
import type { BroadcastModel } from '../protocol/ResponseModel';
import type { PackageRouter } from '../router/PackageRouter';
import type { Authenticator, User } from './auth';
import { ConnectionManager } from './ConnectionManager';
import { FrameParser } from './FrameParser';
import { PackageConnection } from './PackageConnection';

export interface PackageServerConfig {
  port?: number;
  host?: string;
  /** WebSocket endpoint path */
  path?: string;
  maxFrameBytes?: number;
  /** Match the `format` query parameter case-insensitively */
  caseInsensitiveFormat?: boolean;
  shutdownTimeoutMs?: number;
}

export interface PackageServerDeps<TContext> {
  router: PackageRouter<TContext>;
  authenticator: Authenticator;
  /** Handed to every handler invocation */
  context: TContext;
  logger?: Logger;
}

export type UpgradeDecision =
  | { accepted: true; user: User; formatName: string }
  | { accepted: false; status: number; reason: string };

export interface HealthStatus {
  status: 'ok';
  connections: number;
}

const DEFAULT_CONFIG: Required<PackageServerConfig> = {
  port: SERVER.DEFAULT_PORT,
  host: SERVER.DEFAULT_HOST,
  path: SERVER.DEFAULT_PATH,
  maxFrameBytes: LIMITS.MAX_FRAME_BYTES,
  caseInsensitiveFormat: false,
  shutdownTimeoutMs: TIME.DEFAULT_SHUTDOWN_TIMEOUT_MS,
};

const STATUS_TEXT: Record<number, string> = {
  401: 'Unauthorized',
  404: 'Not Found',
  500: 'Internal Server Error',
};

const parseUrl = (req: IncomingMessage): URL => new URL(req.url ?? '/', 'http://localhost');

/**
 * WebSocket host for the package router
 *
 * - HTTP server: `GET /health`, everything else 404
 * - WebSocket server in `noServer` mode: upgrades on `path` are authenticated
 *   first and rejected with 401 when no user is resolved
 * - `?format=protobuf` picks the binary format for the lifetime of the connection
 *
 * @example
 * ```typescript
 * const server = new PackageServer(
 *   { port: 8000, path: '/web' },
 *   { router, authenticator, context: { authors }, logger }
 * );
 *
 * await server.start();
 * await server.broadcast(createBroadcast(PkgID.GET_AUTHORS, { refreshed: true }));
 * await server.stop();
 * ```
 */
export class PackageServer<TContext = void> {
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly config: Required<PackageServerConfig>;
  private readonly router: PackageRouter<TContext>;
  private readonly authenticator: Authenticator;
  private readonly context: TContext;
  private readonly logger: Logger;
  private readonly parser: FrameParser;
  readonly connections: ConnectionManager<PackageConnection<TContext>>;

  constructor(config: PackageServerConfig, deps: PackageServerDeps<TContext>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.router = deps.router;
    this.authenticator = deps.authenticator;
    this.context = deps.context;
    this.logger = deps.logger ?? new SilentLogger();
    this.parser = new FrameParser({ maxSize: this.config.maxFrameBytes });
    this.connections = new ConnectionManager(this.logger);
  }

  get isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Bound address; null while stopped
   */
  address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Start listening on the configured host and port
   *
   * @throws Error if the server fails to start (e.g., port already in use)
   */
  async start(): Promise<void> {
    if (this.httpServer) {
      return;
    }

    const httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
    const wss = new WebSocketServer({ noServer: true, maxPayload: this.config.maxFrameBytes });

    httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wss, req, socket, head).catch((error: unknown) => {
        this.logger.error('[PackageServer] Upgrade failed', toError(error));
        socket.destroy();
      });
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    httpServer.on('error', (error) => this.logger.error('[PackageServer] HTTP server error', error));
    this.httpServer = httpServer;
    this.wss = wss;

    const bound = this.address();
    this.logger.info(
      `[PackageServer] Listening on ws://${this.config.host}:${bound?.port ?? this.config.port}${this.config.path}`,
      { handlers: this.router.getHandlerCount() }
    );
  }

  /**
   * Close every connection with 1001, then the HTTP server. Clients that do
   * not finish the close handshake in time are terminated.
   */
  async stop(): Promise<void> {
    const { httpServer, wss } = this;
    if (!httpServer || !wss) {
      return;
    }
    this.httpServer = null;
    this.wss = null;

    this.connections.closeAll(CLOSE_CODE.GOING_AWAY, 'Server shutting down');

    const forceClose = setTimeout(() => {
      for (const client of wss.clients) {
        client.terminate();
      }
    }, this.config.shutdownTimeoutMs);

    await new Promise<void>((resolve, reject) => {
      wss.close();
      httpServer.close((error) => {
        clearTimeout(forceClose);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.logger.info('[PackageServer] Server stopped');
  }

  /**
   * Push a message to every open connection
   */
  broadcast(message: BroadcastModel): Promise<number> {
    return this.connections.broadcast(message);
  }

  healthStatus(): HealthStatus {
    return { status: 'ok', connections: this.connections.size };
  }

  /**
   * Decide whether an upgrade request may open a connection
   */
  async authorizeUpgrade(req: IncomingMessage): Promise<UpgradeDecision> {
    const url = parseUrl(req);
    const decision = await this.decideUpgrade(req, url);
    if (!decision.accepted) {
      // pathname only: the query may carry the token
      this.logger.warn(`[PackageServer] Upgrade rejected: ${decision.reason}`, {
        status: decision.status,
        path: url.pathname,
      });
    }
    return decision;
  }

  private async decideUpgrade(req: IncomingMessage, url: URL): Promise<UpgradeDecision> {
    if (url.pathname !== this.config.path) {
      return { accepted: false, status: 404, reason: `No WebSocket endpoint at ${url.pathname}` };
    }

    let user: User | null;
    try {
      user = await this.authenticator(req);
    } catch (error) {
      this.logger.error('[PackageServer] Authenticator failed', toError(error));
      return { accepted: false, status: 500, reason: 'Authentication unavailable' };
    }

    if (!user) {
      return { accepted: false, status: 401, reason: 'Authentication required' };
    }

    return { accepted: true, user, formatName: url.searchParams.get('format') ?? '' };
  }

  /**
   * Wire an upgraded socket to a new connection
   */
  acceptConnection(ws: WebSocket, user: User, formatName: string): PackageConnection<TContext> {
    const strategy = selectStrategy(formatName, {
      caseInsensitive: this.config.caseInsensitiveFormat,
    });
    const connection = new PackageConnection<TContext>({
      socket: ws,
      strategy,
      router: this.router,
      user,
      context: this.context,
      parser: this.parser,
      logger: this.logger,
    });

    this.connections.connect(connection);
    this.logger.info('[PackageServer] Client connected', {
      connectionId: connection.id,
      username: user.username,
      format: strategy.formatName,
    });

    ws.on('message', (data, isBinary) => {
      connection.handleFrame(data, isBinary).catch((error: unknown) => {
        this.logger.error('[PackageServer] Frame handling failed', toError(error), {
          connectionId: connection.id,
        });
      });
    });

    ws.on('close', (code) => {
      connection.markClosed();
      this.connections.disconnect(connection);
      this.logger.info('[PackageServer] Client disconnected', {
        connectionId: connection.id,
        code,
      });
    });

    ws.on('error', (error) => {
      this.logger.error('[PackageServer] Socket error', error, { connectionId: connection.id });
    });

    return connection;
  }

  private async handleUpgrade(
    wss: WebSocketServer,
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer
  ): Promise<void> {
    const decision = await this.authorizeUpgrade(req);
    if (!decision.accepted) {
      socket.end(`HTTP/1.1 ${decision.status} ${STATUS_TEXT[decision.status] ?? 'Error'}\r\n\r\n`);
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      this.acceptConnection(ws, decision.user, decision.formatName);
    });
  }

  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    res.setHeader('Content-Type', 'application/json');

    const url = parseUrl(req);
    if (req.method === 'GET' && url.pathname === SERVER.HEALTH_PATH) {
      res.writeHead(200);
      res.end(JSON.stringify(this.healthStatus()));
      return;
    }

    res.writeHead(404);
    res.end(JSON.stringify({ error: 'Not found' }));
  }
}
