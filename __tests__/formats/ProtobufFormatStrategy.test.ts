import { describe, it, expect } from 'vitest';
import { DataConversionError, DecodeError, FormatMismatchError } from '../../src/core/errors';
import {
  ProtobufFormatStrategy,
  decodeProtoResponse,
  encodeProtoRequest,
  toProtoMeta,
} from '../../src/formats/ProtobufFormatStrategy';
import { RequestProto, ResponseProto } from '../../src/formats/protoSchema';
import { RSPCode } from '../../src/protocol/constants';
import { createRequest } from '../../src/protocol/RequestModel';
import { ResponseModel } from '../../src/protocol/ResponseModel';
import { REQ_ID } from '../helpers/fixtures';

const encodeRaw = (fields: Record<string, unknown>): Uint8Array =>
  RequestProto.encode(RequestProto.create(fields)).finish();

describe('ProtobufFormatStrategy', () => {
  const strategy = new ProtobufFormatStrategy();

  describe('deserialize', () => {
    it('should decode a request encoded by the client helper', () => {
      const bytes = encodeProtoRequest(
        createRequest({ pkgId: 3, reqId: REQ_ID, method: 'create', data: { name: 'Ada' } })
      );

      expect(strategy.deserialize(bytes)).toEqual({
        pkgId: 3,
        reqId: REQ_ID,
        method: 'create',
        data: { name: 'Ada' },
      });
    });

    it('should treat an empty method as absent', () => {
      const request = strategy.deserialize(encodeProtoRequest(createRequest({ pkgId: 1, reqId: REQ_ID })));

      expect(request.method).toBeUndefined();
      expect(request.data).toEqual({});
    });

    it('should default an empty data_json to an empty object', () => {
      const request = strategy.deserialize(encodeRaw({ pkgId: 1, reqId: REQ_ID }));
      expect(request.data).toEqual({});
    });

    it('should reject a mapping as a format mismatch', () => {
      expect(() => strategy.deserialize({ pkg_id: 1, req_id: REQ_ID })).toThrow(
        FormatMismatchError
      );
    });

    it('should reject truncated bytes', () => {
      expect(() => strategy.deserialize(Buffer.from([0x12, 0x0a, 0x61]))).toThrow(DecodeError);
    });

    it('should reject a buffer cut off inside a string field', () => {
      const bytes = Buffer.from(encodeRaw({ pkgId: 1, reqId: REQ_ID, method: 'delete-all' }));
      const truncated = bytes.subarray(0, bytes.length - 7);

      expect(() => strategy.deserialize(truncated)).toThrow(DecodeError);
      expect(() => strategy.deserialize(truncated)).toThrow('Malformed Request frame');
    });

    it('should reject invalid JSON in data_json', () => {
      const bytes = encodeRaw({ pkgId: 1, reqId: REQ_ID, dataJson: '{oops' });
      expect(() => strategy.deserialize(bytes)).toThrow('Invalid JSON in data_json');
    });

    it('should reject data_json that is not an object', () => {
      const bytes = encodeRaw({ pkgId: 1, reqId: REQ_ID, dataJson: '[1,2]' });
      expect(() => strategy.deserialize(bytes)).toThrow('data_json must encode an object');
    });

    it('should reject an empty message', () => {
      expect(() => strategy.deserialize(new Uint8Array(0))).toThrow(DataConversionError);
    });
  });

  describe('serialize', () => {
    it('should produce a Response message', () => {
      const bytes = strategy.serialize(
        ResponseModel.err(1, REQ_ID, {
          msg: 'No permission for pkg_id 1',
          statusCode: RSPCode.PERMISSION_DENIED,
        })
      );

      expect(Buffer.isBuffer(bytes)).toBe(true);
      const message = ResponseProto.toObject(ResponseProto.decode(bytes));
      expect(message.pkgId).toBe(1);
      expect(message.reqId).toBe(REQ_ID);
      expect(message.statusCode).toBe(3);
      expect(message.dataJson).toBe('{"msg":"No permission for pkg_id 1"}');
      expect(message.meta).toBeUndefined();
    });

    it('should encode list data and metadata', () => {
      const bytes = strategy.serialize(
        ResponseModel.ok(2, REQ_ID, {
          data: [],
          meta: { page: 1, perPage: 20, total: 0, pages: 0 },
        })
      );

      expect(decodeProtoResponse(bytes)).toEqual({
        pkgId: 2,
        reqId: REQ_ID,
        statusCode: RSPCode.OK,
        data: [],
        meta: { page: 1, perPage: 20, total: 0, pages: 0 },
      });
    });

    it('should decode a response without metadata', () => {
      const response = strategy.decodeResponse(strategy.serialize(ResponseModel.ok(1, REQ_ID)));

      expect(response).toEqual({ pkgId: 1, reqId: REQ_ID, statusCode: RSPCode.OK, data: {} });
    });
  });

  describe('toProtoMeta', () => {
    it('should fill defaults for free-form metadata', () => {
      expect(toProtoMeta({ total: 5 })).toEqual({ page: 1, perPage: 20, total: 5, pages: 0 });
    });

    it('should read snake_case keys', () => {
      expect(toProtoMeta({ page: 3, per_page: 5, total: 12, pages: 3 })).toEqual({
        page: 3,
        perPage: 5,
        total: 12,
        pages: 3,
      });
    });

    it('should replace values that do not fit an int32 with defaults', () => {
      expect(toProtoMeta({ page: 2.5, per_page: 3_000_000_000, total: -4, pages: '2' })).toEqual({
        page: 1,
        perPage: 20,
        total: -4,
        pages: 0,
      });
    });

    it('should check typed pagination metadata the same way', () => {
      expect(toProtoMeta({ page: 2, perPage: 10, total: 15.5, pages: 2 })).toEqual({
        page: 2,
        perPage: 10,
        total: 0,
        pages: 2,
      });
    });
  });
});
