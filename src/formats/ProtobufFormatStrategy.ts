import { Reader, type Type } from 'protobufjs';
import { z } from 'zod';
import { FORMAT } from '../core/constants';
import { DataConversionError, DecodeError, FormatMismatchError } from '../core/errors';
import { toError } from '../core/types/Logger';
import { createRequest, RequestFieldsSchema, type RequestModel } from '../protocol/RequestModel';
import {
  isMetadataModel,
  type MetadataModel,
  type ResponseData,
  type ResponseMeta,
  type ResponseModel,
} from '../protocol/ResponseModel';
import { formatIssues } from './JsonFormatStrategy';
import { isBinaryFrame, type MessageFormatStrategy, type RawFrame } from './MessageFormatStrategy';
import { RequestProto, ResponseProto } from './protoSchema';

const DecodedRequestSchema = z.object({
  pkgId: z.number(),
  reqId: z.string(),
  method: z.string(),
  dataJson: z.string(),
});

const DecodedResponseSchema = z.object({
  pkgId: z.number(),
  reqId: z.string(),
  statusCode: z.number(),
  dataJson: z.string(),
  meta: z
    .object({
      page: z.number(),
      perPage: z.number(),
      total: z.number(),
      pages: z.number(),
    })
    .nullish(),
});

const decodeMessage = <T>(type: Type, schema: z.ZodType<T>, bytes: Uint8Array): T => {
  let decoded: unknown;
  try {
    // base Reader, so truncated fields throw for Buffers too
    decoded = type.toObject(type.decode(new Reader(bytes)), { defaults: true });
  } catch (error) {
    throw new DecodeError(`Malformed ${type.name} frame`, { reason: toError(error).message });
  }

  const result = schema.safeParse(decoded);
  if (!result.success) {
    throw new DataConversionError(`Unexpected ${type.name} fields`, {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
};

const parseJson = (text: string, field: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DataConversionError(`Invalid JSON in ${field}`, { reason: toError(error).message });
  }
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

const isInt32 = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;

const readInt = (meta: Readonly<Record<string, unknown>>, key: string, fallback: number): number => {
  const value = meta[key];
  return isInt32(value) ? value : fallback;
};

/**
 * Pagination metadata for the wire. Plain mappings fall back to page 1,
 * 20 per page, no items; values that are not int32 integers take the same
 * defaults.
 */
export const toProtoMeta = (meta: ResponseMeta): MetadataModel => {
  const fields: Readonly<Record<string, unknown>> = { ...meta };
  const perPageKey = isMetadataModel(meta) ? 'perPage' : 'per_page';
  return {
    page: readInt(fields, 'page', 1),
    perPage: readInt(fields, perPageKey, 20),
    total: readInt(fields, 'total', 0),
    pages: readInt(fields, 'pages', 0),
  };
};

/**
 * Encode a request envelope as a protobuf `Request` (client side)
 */
export const encodeProtoRequest = (request: RequestModel): Uint8Array =>
  RequestProto.encode(
    RequestProto.create({
      pkgId: request.pkgId,
      reqId: request.reqId,
      method: request.method ?? '',
      dataJson: JSON.stringify(request.data),
    })
  ).finish();

/**
 * Decode a protobuf `Request` into a request envelope
 *
 * @throws {DecodeError} when the bytes are not a valid message
 * @throws {DataConversionError} when the fields or the inner JSON are invalid
 */
export const decodeProtoRequest = (bytes: Uint8Array): RequestModel => {
  const decoded = decodeMessage(RequestProto, DecodedRequestSchema, bytes);
  const data = decoded.dataJson ? parseJson(decoded.dataJson, 'data_json') : {};
  if (!isPlainObject(data)) {
    throw new DataConversionError('data_json must encode an object');
  }

  const fields = RequestFieldsSchema.safeParse({
    pkgId: decoded.pkgId,
    reqId: decoded.reqId,
    // proto3 cannot tell "" from unset
    method: decoded.method || undefined,
    data,
  });
  if (!fields.success) {
    throw new DataConversionError('Invalid request frame', { issues: formatIssues(fields.error) });
  }
  return createRequest(fields.data);
};

export const encodeProtoResponse = (response: ResponseModel): Uint8Array => {
  const payload: Record<string, unknown> = {
    pkgId: response.pkgId,
    reqId: response.reqId,
    statusCode: response.statusCode,
    dataJson: JSON.stringify(response.data),
  };
  if (response.meta !== undefined) {
    payload.meta = toProtoMeta(response.meta);
  }
  return ResponseProto.encode(ResponseProto.create(payload)).finish();
};

export const decodeProtoResponse = (bytes: Uint8Array): ResponseModel => {
  const decoded = decodeMessage(ResponseProto, DecodedResponseSchema, bytes);
  const data = decoded.dataJson ? parseJson(decoded.dataJson, 'data_json') : {};
  if (!isPlainObject(data) && !Array.isArray(data)) {
    throw new DataConversionError('data_json must encode an object or an array');
  }

  const payload: ResponseData = data;
  const base = {
    pkgId: decoded.pkgId,
    reqId: decoded.reqId,
    statusCode: decoded.statusCode,
    data: payload,
  };
  return decoded.meta ? { ...base, meta: { ...decoded.meta } } : base;
};

/**
 * Protobuf message format
 *
 * Binary frames carry the envelope fields natively and the data payload as a
 * JSON string.
 */
export class ProtobufFormatStrategy implements MessageFormatStrategy<Buffer> {
  readonly formatName = FORMAT.PROTOBUF;

  deserialize(raw: RawFrame): RequestModel {
    if (!isBinaryFrame(raw)) {
      throw new FormatMismatchError('Protobuf strategy received a mapping - format mismatch', {
        format: this.formatName,
      });
    }
    return decodeProtoRequest(raw);
  }

  serialize(response: ResponseModel): Buffer {
    return Buffer.from(encodeProtoResponse(response));
  }

  encodeRequest(request: RequestModel): Buffer {
    return Buffer.from(encodeProtoRequest(request));
  }

  decodeResponse(raw: Uint8Array): ResponseModel {
    return decodeProtoResponse(raw);
  }
}
