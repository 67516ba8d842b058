import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import { CLOSE_CODE } from '../core/constants';
import { FormatMismatchError, isFrameError } from '../core/errors';
import { type Logger, SilentLogger, toError, withContext } from '../core/types/Logger';
import type { MessageFormatStrategy, RawFrame, SerializedFrame } from '../formats';
import { type BroadcastModel, ResponseModel } from '../protocol/ResponseModel';
import type { PackageRouter } from '../router/PackageRouter';
import type { User } from './auth';
import { FrameParser } from './FrameParser';

const MAX_CLOSE_REASON = 123;

/**
 * The part of a `ws` WebSocket a connection uses. Strings go out as text
 * frames, buffers as binary frames.
 */
export interface PackageSocket {
  readonly readyState: number;
  send(data: string | Buffer, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

/**
 * Payload of a `ws` message event
 */
export type IncomingFrame = string | Buffer | ArrayBuffer | Buffer[];

export interface PackageConnectionOptions<TContext> {
  socket: PackageSocket;
  strategy: MessageFormatStrategy;
  router: PackageRouter<TContext>;
  user: User;
  context: TContext;
  parser?: FrameParser;
  logger?: Logger;
  id?: string;
}

const toBuffer = (data: Exclude<IncomingFrame, string>): Buffer => {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
};

/**
 * Cut `text` to at most `maxBytes` of UTF-8 without splitting a character
 */
export const truncateUtf8 = (text: string, maxBytes: number): string => {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) {
    return text;
  }
  let end = maxBytes;
  // 0b10xxxxxx marks a continuation byte
  while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf8');
};

const closeCodeFor = (error: unknown): number => {
  if (error instanceof FormatMismatchError) {
    return CLOSE_CODE.UNSUPPORTED_DATA;
  }
  return isFrameError(error) ? CLOSE_CODE.INVALID_PAYLOAD : CLOSE_CODE.INTERNAL_ERROR;
};

/**
 * One client connection: decodes frames with the connection's strategy,
 * dispatches them through the router and writes the responses back.
 *
 * Frames are handled strictly one after another in receipt order. The first
 * unusable frame closes the socket and every frame still queued is dropped.
 */
export class PackageConnection<TContext = void> {
  readonly id: string;
  readonly user: User;
  readonly strategy: MessageFormatStrategy;

  private readonly socket: PackageSocket;
  private readonly router: PackageRouter<TContext>;
  private readonly context: TContext;
  private readonly parser: FrameParser;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: PackageConnectionOptions<TContext>) {
    this.id = options.id ?? randomUUID();
    this.user = options.user;
    this.strategy = options.strategy;
    this.socket = options.socket;
    this.router = options.router;
    this.context = options.context;
    this.parser = options.parser ?? new FrameParser();
    this.logger = withContext(options.logger ?? new SilentLogger(), { connectionId: this.id });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue an inbound frame. The returned promise settles once this frame has
   * been answered or dropped; it never rejects.
   */
  handleFrame(data: IncomingFrame, isBinary: boolean): Promise<void> {
    this.queue = this.queue.then(() => this.process(data, isBinary));
    return this.queue;
  }

  /**
   * Push a server-initiated message in this connection's format
   */
  async sendBroadcast(message: BroadcastModel): Promise<void> {
    await this.send(this.strategy.serialize(ResponseModel.fromBroadcast(message)));
  }

  /**
   * Close the socket; later frames are ignored. The reason is cut to the
   * 123 bytes a close frame can carry.
   */
  close(code: number = CLOSE_CODE.NORMAL, reason = ''): void {
    if (this.closed) {
      return;
    }
    try {
      this.socket.close(code, truncateUtf8(reason, MAX_CLOSE_REASON));
    } catch (error) {
      this.logger.error('Failed to close socket', toError(error), { code });
      return;
    }
    this.closed = true;
  }

  /**
   * Record that the peer went away
   */
  markClosed(): void {
    this.closed = true;
  }

  private async process(data: IncomingFrame, isBinary: boolean): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      const request = this.strategy.deserialize(this.toRawFrame(data, isBinary));
      const response = await this.router.handleRequest(this.user, request, this.context);
      await this.send(this.strategy.serialize(response));
    } catch (error) {
      const code = closeCodeFor(error);
      const err = toError(error);
      if (code === CLOSE_CODE.INTERNAL_ERROR) {
        this.logger.error('Failed to process frame', err);
      } else {
        this.logger.warn(`Rejected frame: ${err.message}`, { format: this.strategy.formatName });
      }
      this.close(code, err.message);
    }
  }

  private toRawFrame(data: IncomingFrame, isBinary: boolean): RawFrame {
    if (typeof data === 'string') {
      return this.parser.parse(data);
    }
    const bytes = toBuffer(data);
    return isBinary ? bytes : this.parser.parse(bytes);
  }

  private send(frame: SerializedFrame): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      this.logger.debug('Dropping outbound frame on closed socket');
      return Promise.resolve();
    }

    const payload = Buffer.isBuffer(frame) ? frame : JSON.stringify(frame);
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
