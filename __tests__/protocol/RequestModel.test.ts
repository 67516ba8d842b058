import { describe, it, expect } from 'vitest';
import { describeCode, describePkg, PkgID, RSPCode } from '../../src/protocol/constants';
import { createRequest, RequestFieldsSchema } from '../../src/protocol/RequestModel';
import { REQ_ID } from '../helpers/fixtures';

describe('RequestModel', () => {
  describe('createRequest', () => {
    it('should default missing data to an empty object', () => {
      const request = createRequest({ pkgId: PkgID.GET_AUTHORS, reqId: REQ_ID });

      expect(request).toEqual({ pkgId: 1, reqId: REQ_ID, data: {} });
      expect('method' in request).toBe(false);
    });

    it('should treat null data and method as absent', () => {
      const request = createRequest({ pkgId: 2, reqId: REQ_ID, method: null, data: null });

      expect(request).toEqual({ pkgId: 2, reqId: REQ_ID, data: {} });
    });

    it('should keep method and data', () => {
      const request = createRequest({
        pkgId: 3,
        reqId: REQ_ID,
        method: 'create',
        data: { name: 'Ada' },
      });

      expect(request.method).toBe('create');
      expect(request.data).toEqual({ name: 'Ada' });
    });

    it('should freeze the envelope', () => {
      const request = createRequest({ pkgId: 1, reqId: REQ_ID });
      expect(Object.isFrozen(request)).toBe(true);
    });
  });

  describe('RequestFieldsSchema', () => {
    it('should reject a non-uuid request id', () => {
      expect(RequestFieldsSchema.safeParse({ pkgId: 1, reqId: 'abc' }).success).toBe(false);
    });

    it('should reject negative or fractional package ids', () => {
      expect(RequestFieldsSchema.safeParse({ pkgId: -1, reqId: REQ_ID }).success).toBe(false);
      expect(RequestFieldsSchema.safeParse({ pkgId: 1.5, reqId: REQ_ID }).success).toBe(false);
    });

    it('should accept unknown package ids', () => {
      expect(RequestFieldsSchema.safeParse({ pkgId: 4242, reqId: REQ_ID }).success).toBe(true);
    });
  });

  describe('describe helpers', () => {
    it('should render codes and package ids for logs', () => {
      expect(describeCode(RSPCode.OK)).toBe('RSPCode.OK<0>');
      expect(describeCode(RSPCode.PERMISSION_DENIED)).toBe('RSPCode.PERMISSION_DENIED<3>');
      expect(describeCode(77)).toBe('RSPCode.UNKNOWN<77>');
      expect(describePkg(PkgID.GET_AUTHORS)).toBe('PkgID.GET_AUTHORS<1>');
      expect(describePkg(5)).toBe('PkgID.UNKNOWN<5>');
    });
  });
});
