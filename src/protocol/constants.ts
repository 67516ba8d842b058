/**
 * Response status codes carried by every response frame.
 *
 * The wire format always uses the bare integer; {@link describeCode} gives the
 * `RSPCode.OK<0>` form used in logs.
 */
export enum RSPCode {
  OK = 0,
  ERROR = 1,
  INVALID_DATA = 2,
  PERMISSION_DENIED = 3,
}

/**
 * Package identifiers, one per logical operation
 */
export enum PkgID {
  GET_AUTHORS = 1,
  GET_PAGINATED_AUTHORS = 2,
  CREATE_AUTHOR = 3,
  // Never registered: exercises the "no handler" path
  UNREGISTERED_HANDLER = 999,
}

export const describeCode = (code: number): string =>
  `RSPCode.${RSPCode[code] ?? 'UNKNOWN'}<${code}>`;

export const describePkg = (pkgId: number): string =>
  `PkgID.${PkgID[pkgId] ?? 'UNKNOWN'}<${pkgId}>`;

/**
 * Request id used for server-initiated broadcasts
 */
export const NIL_UUID = '00000000-0000-0000-0000-000000000000';
