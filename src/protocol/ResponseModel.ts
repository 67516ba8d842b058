import { NIL_UUID, RSPCode } from './constants';

/**
 * Pagination metadata attached to list responses
 */
export interface MetadataModel {
  page: number;
  perPage: number;
  total: number;
  pages: number;
}

export type ResponseMeta = MetadataModel | Readonly<Record<string, unknown>>;

export type ResponseData = Record<string, unknown> | unknown[];

/**
 * Canonical outbound envelope
 */
export interface ResponseModel {
  readonly pkgId: number;
  readonly reqId: string;
  readonly statusCode: RSPCode;
  readonly meta?: ResponseMeta;
  readonly data: ResponseData;
}

export interface ResponseOptions {
  data?: ResponseData;
  /** Set as `data.msg`; list data has no place for it and is sent without one */
  msg?: string;
  meta?: ResponseMeta;
}

export interface ErrorResponseOptions extends ResponseOptions {
  statusCode?: RSPCode;
}

/**
 * Server-initiated push, not tied to any request
 */
export interface BroadcastModel {
  readonly pkgId: number;
  readonly reqId: string;
  readonly data: ResponseData;
}

export const isMetadataModel = (meta: ResponseMeta): meta is MetadataModel =>
  typeof meta.page === 'number' &&
  typeof meta.perPage === 'number' &&
  typeof meta.total === 'number' &&
  typeof meta.pages === 'number';

const withMessage = (data: ResponseData | undefined, msg: string | undefined): ResponseData => {
  const base = data ?? {};
  if (!msg || Array.isArray(base)) {
    return base;
  }
  return { ...base, msg };
};

const build = (
  pkgId: number,
  reqId: string,
  statusCode: RSPCode,
  { data, msg, meta }: ResponseOptions
): ResponseModel => {
  const payload = withMessage(data, msg);
  return meta === undefined
    ? { pkgId, reqId, statusCode, data: payload }
    : { pkgId, reqId, statusCode, meta, data: payload };
};

export const ResponseModel = {
  /**
   * Success response; `msg`, when given, lands in `data.msg`
   */
  ok(pkgId: number, reqId: string, options: ResponseOptions = {}): ResponseModel {
    return build(pkgId, reqId, RSPCode.OK, options);
  },

  /**
   * Error response with a human-readable `data.msg`
   */
  err(pkgId: number, reqId: string, options: ErrorResponseOptions = {}): ResponseModel {
    return build(pkgId, reqId, options.statusCode ?? RSPCode.ERROR, options);
  },

  fromBroadcast(message: BroadcastModel): ResponseModel {
    return { pkgId: message.pkgId, reqId: message.reqId, statusCode: RSPCode.OK, data: message.data };
  },
};

export const createBroadcast = (pkgId: number, data: ResponseData): BroadcastModel => ({
  pkgId,
  reqId: NIL_UUID,
  data,
});
