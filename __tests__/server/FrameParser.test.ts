import { describe, it, expect } from 'vitest';
import { MessageParsingError, MessageValidationError } from '../../src/core/errors';
import { FrameParser } from '../../src/server/FrameParser';

describe('FrameParser', () => {
  const parser = new FrameParser({ maxSize: 64 });

  it('should parse a JSON object from text', () => {
    expect(parser.parse('{"pkg_id":1,"data":{}}')).toEqual({ pkg_id: 1, data: {} });
  });

  it('should parse a JSON object from a buffer', () => {
    expect(parser.parse(Buffer.from('{"key":"value"}'))).toEqual({ key: 'value' });
  });

  it('should reject frames over the size limit', () => {
    const frame = JSON.stringify({ padding: 'x'.repeat(64) });

    expect(() => parser.parse(frame)).toThrow(MessageValidationError);
    try {
      parser.parse(frame);
    } catch (error) {
      expect(error).toMatchObject({
        message: 'Frame exceeds maximum size',
        details: { maxSize: 64, actualSize: frame.length },
      });
    }
  });

  it('should count bytes rather than characters', () => {
    const frame = JSON.stringify({ s: 'é'.repeat(30) });

    expect(frame.length).toBeLessThanOrEqual(64);
    expect(() => parser.parse(frame)).toThrow(MessageValidationError);
  });

  it('should reject invalid JSON', () => {
    expect(() => parser.parse('{not json')).toThrow(MessageParsingError);
  });

  it.each([['[1,2]', 'array'], ['null', 'null'], ['42', 'number'], ['"text"', 'string']])(
    'should reject %s as a non-object frame',
    (frame, received) => {
      try {
        parser.parse(frame);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MessageValidationError);
        expect(error).toMatchObject({ details: { received } });
      }
    }
  );

  it('should default to a 1 MiB limit', () => {
    const big = JSON.stringify({ padding: 'x'.repeat(1_048_576) });
    expect(() => new FrameParser().parse(big)).toThrow('Frame exceeds maximum size');
  });
});
