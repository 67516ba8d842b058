import type { FormatName } from '../core/constants';
import type { RequestModel } from '../protocol/RequestModel';
import type { ResponseModel } from '../protocol/ResponseModel';

/**
 * Inbound frame as handed over by the transport: a parsed JSON object for text
 * frames, raw bytes for binary frames
 */
export type RawFrame = Readonly<Record<string, unknown>> | Uint8Array;

/**
 * JSON wire shape of a response frame
 */
export interface ResponseFrame {
  pkg_id: number;
  req_id: string;
  status_code: number;
  meta: Record<string, unknown> | null;
  data: Record<string, unknown> | unknown[];
}

export type SerializedFrame = ResponseFrame | Buffer;

/**
 * Converts between wire frames and the canonical request/response envelopes.
 *
 * Implementations are stateless and may be shared between connections.
 *
 * @throws {FormatMismatchError} from `deserialize` when the frame kind does not match the format
 * @throws {DecodeError} from `deserialize` when binary data is malformed
 * @throws {DataConversionError} from `deserialize` when the decoded frame is not a valid request
 */
export interface MessageFormatStrategy<TOut extends SerializedFrame = SerializedFrame> {
  /** Lowercase identifier, for logs only */
  readonly formatName: FormatName;
  deserialize(raw: RawFrame): RequestModel;
  serialize(response: ResponseModel): TOut;
}

export const isBinaryFrame = (raw: RawFrame): raw is Uint8Array => raw instanceof Uint8Array;
