import { vi } from 'vitest';
import type { PackageSocket } from '../../src/server/PackageConnection';

const OPEN = 1;
const CLOSED = 3;
const MAX_CLOSE_REASON_BYTES = 123;

/**
 * In-memory stand-in for a `ws` socket; records sent frames and close calls.
 * Like `ws`, close throws on a reason longer than 123 bytes.
 */
export class FakeSocket implements PackageSocket {
  readyState = OPEN;
  readonly sent: Array<string | Buffer> = [];
  closeCode: number | undefined;
  closeReason: string | undefined;
  sendError: Error | null = null;

  readonly send = vi.fn((data: string | Buffer, cb?: (err?: Error) => void): void => {
    if (this.sendError) {
      cb?.(this.sendError);
      return;
    }
    this.sent.push(data);
    cb?.();
  });

  readonly close = vi.fn((code?: number, reason?: string): void => {
    if (reason !== undefined && Buffer.byteLength(reason) > MAX_CLOSE_REASON_BYTES) {
      throw new RangeError('The message must not be greater than 123 bytes');
    }
    this.readyState = CLOSED;
    this.closeCode = code;
    this.closeReason = reason;
  });

  /** Text frames, parsed */
  jsonFrames(): unknown[] {
    return this.sent.flatMap((frame) => (typeof frame === 'string' ? [JSON.parse(frame)] : []));
  }

  binaryFrames(): Buffer[] {
    return this.sent.flatMap((frame) => (Buffer.isBuffer(frame) ? [frame] : []));
  }
}
