import { z } from 'zod';

/**
 * Canonical inbound envelope, independent of the wire format.
 *
 * `pkgId` and `reqId` are fixed at parse time; `reqId` is echoed back on the
 * response so the client can correlate concurrent requests.
 */
export interface RequestModel {
  readonly pkgId: number;
  readonly reqId: string;
  readonly method?: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface RequestFields {
  pkgId: number;
  reqId: string;
  method?: string | null;
  data?: Record<string, unknown> | null;
}

/**
 * Field-level rules shared by every wire format
 */
export const RequestFieldsSchema = z.object({
  pkgId: z.number().int().nonnegative(),
  reqId: z.string().uuid(),
  method: z.string().nullish(),
  data: z.record(z.unknown()).nullish(),
});

/**
 * JSON wire shape of a request frame
 */
export const RequestFrameSchema = z.object({
  pkg_id: z.number().int().nonnegative(),
  req_id: z.string().uuid(),
  method: z.string().nullish(),
  data: z.record(z.unknown()).nullish(),
});

export type RequestFrame = z.infer<typeof RequestFrameSchema>;

/**
 * Build a frozen request envelope. Absent or null `data` becomes `{}`.
 */
export const createRequest = ({ pkgId, reqId, method, data }: RequestFields): RequestModel => {
  const request: RequestModel =
    method === undefined || method === null
      ? { pkgId, reqId, data: data ?? {} }
      : { pkgId, reqId, method, data: data ?? {} };
  return Object.freeze(request);
};
