import { LIMITS } from '../core/constants';
import { MessageParsingError, MessageValidationError } from '../core/errors';

export interface FrameParserOptions {
  /** Maximum frame size in bytes */
  maxSize?: number;
}

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * FrameParser turns a text frame into a JSON object
 *
 * Validates the frame size before parsing and rejects JSON values that are not
 * objects, so format strategies only ever see a mapping.
 *
 * @example
 * ```typescript
 * const parser = new FrameParser({ maxSize: 1048576 });
 *
 * const frame = parser.parse('{"pkg_id":1,"req_id":"...","data":{}}');
 * const request = strategy.deserialize(frame);
 * ```
 */
export class FrameParser {
  private readonly maxSize: number;

  constructor(options: FrameParserOptions = {}) {
    this.maxSize = options.maxSize ?? LIMITS.MAX_FRAME_BYTES;
  }

  /**
   * @throws {MessageValidationError} when the frame is too large or not a JSON object
   * @throws {MessageParsingError} when the frame is not valid JSON
   */
  parse(content: string | Buffer): Record<string, unknown> {
    const size = typeof content === 'string' ? Buffer.byteLength(content) : content.length;
    if (size > this.maxSize) {
      throw new MessageValidationError('Frame exceeds maximum size', {
        maxSize: this.maxSize,
        actualSize: size,
      });
    }

    const text = content.toString();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (jsonError) {
      throw new MessageParsingError('Failed to parse JSON', {
        error: jsonError instanceof Error ? jsonError.message : String(jsonError),
        content: text.substring(0, 100),
      });
    }

    if (!isJsonObject(data)) {
      throw new MessageValidationError('Frame must be a JSON object', {
        received: Array.isArray(data) ? 'array' : data === null ? 'null' : typeof data,
      });
    }

    return data;
  }
}
