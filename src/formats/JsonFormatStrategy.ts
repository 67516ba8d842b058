import { z } from 'zod';
import { FORMAT } from '../core/constants';
import { DataConversionError, FormatMismatchError } from '../core/errors';
import {
  createRequest,
  RequestFrameSchema,
  type RequestFrame,
  type RequestModel,
} from '../protocol/RequestModel';
import {
  isMetadataModel,
  type ResponseMeta,
  type ResponseModel,
} from '../protocol/ResponseModel';
import {
  isBinaryFrame,
  type MessageFormatStrategy,
  type RawFrame,
  type ResponseFrame,
} from './MessageFormatStrategy';

const ResponseFrameSchema = z.object({
  pkg_id: z.number().int(),
  req_id: z.string(),
  status_code: z.number().int(),
  meta: z.record(z.unknown()).nullish(),
  data: z.union([z.record(z.unknown()), z.array(z.unknown())]).nullish(),
});

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

const toWireMeta = (meta: ResponseMeta | undefined): Record<string, unknown> | null => {
  if (meta === undefined) return null;
  if (isMetadataModel(meta)) {
    return { page: meta.page, per_page: meta.perPage, total: meta.total, pages: meta.pages };
  }
  return { ...meta };
};

const fromWireMeta = (meta: Record<string, unknown>): ResponseMeta => {
  const { page, per_page: perPage, total, pages } = meta;
  if (
    typeof page === 'number' &&
    typeof perPage === 'number' &&
    typeof total === 'number' &&
    typeof pages === 'number'
  ) {
    return { page, perPage, total, pages };
  }
  return meta;
};

/**
 * JSON message format (default)
 *
 * Works on already-parsed objects: the transport parses text frames and sends
 * the returned frame as JSON text.
 */
export class JsonFormatStrategy implements MessageFormatStrategy<ResponseFrame> {
  readonly formatName = FORMAT.JSON;

  deserialize(raw: RawFrame): RequestModel {
    if (isBinaryFrame(raw)) {
      throw new FormatMismatchError('JSON strategy received bytes - format mismatch', {
        format: this.formatName,
      });
    }

    const result = RequestFrameSchema.safeParse(raw);
    if (!result.success) {
      throw new DataConversionError('Invalid request frame', {
        issues: formatIssues(result.error),
      });
    }

    const frame = result.data;
    return createRequest({
      pkgId: frame.pkg_id,
      reqId: frame.req_id,
      method: frame.method,
      data: frame.data,
    });
  }

  serialize(response: ResponseModel): ResponseFrame {
    return {
      pkg_id: response.pkgId,
      req_id: response.reqId,
      status_code: response.statusCode,
      meta: toWireMeta(response.meta),
      data: response.data,
    };
  }

  /**
   * Client side: build the wire frame for a request
   */
  encodeRequest(request: RequestModel): RequestFrame {
    const frame: RequestFrame = {
      pkg_id: request.pkgId,
      req_id: request.reqId,
      data: { ...request.data },
    };
    if (request.method !== undefined) {
      frame.method = request.method;
    }
    return frame;
  }

  /**
   * Client side: read a response frame
   */
  decodeResponse(raw: unknown): ResponseModel {
    const result = ResponseFrameSchema.safeParse(raw);
    if (!result.success) {
      throw new DataConversionError('Invalid response frame', {
        issues: formatIssues(result.error),
      });
    }

    const frame = result.data;
    const base = {
      pkgId: frame.pkg_id,
      reqId: frame.req_id,
      statusCode: frame.status_code,
      data: frame.data ?? {},
    };
    return frame.meta ? { ...base, meta: fromWireMeta(frame.meta) } : base;
  }
}
