import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { loadConfig, loadTokens } from '../../src/config/Config';
import { ValidationError } from '../../src/core/errors';

describe('Config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      expect(loadConfig({})).toEqual({
        PORT: 8000,
        HOST: '0.0.0.0',
        WS_PATH: '/web',
        LOG_LEVEL: 'info',
        MAX_FRAME_BYTES: 1_048_576,
        HANDLER_TIMEOUT_MS: 0,
        FORMAT_CASE_INSENSITIVE: false,
      });
    });

    it('should coerce numeric and boolean values', () => {
      const config = loadConfig({
        PORT: '9100',
        HANDLER_TIMEOUT_MS: '2500',
        FORMAT_CASE_INSENSITIVE: '1',
        LOG_LEVEL: 'debug',
        AUTH_TOKENS_FILE: '/etc/tokens.json',
      });

      expect(config.PORT).toBe(9100);
      expect(config.HANDLER_TIMEOUT_MS).toBe(2500);
      expect(config.FORMAT_CASE_INSENSITIVE).toBe(true);
      expect(config.LOG_LEVEL).toBe('debug');
      expect(config.AUTH_TOKENS_FILE).toBe('/etc/tokens.json');
    });

    it('should throw invalid config error for bad values', () => {
      expect(() => loadConfig({ PORT: 'not-a-port' })).toThrowError(
        expect.objectContaining({ code: 'VALIDATION_ERROR:INVALID_CONFIG' })
      );

      try {
        loadConfig({ LOG_LEVEL: 'verbose', WS_PATH: 'web' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.code).toBe('VALIDATION_ERROR:INVALID_CONFIG');
          expect(error.details?.issues).toHaveLength(2);
        }
      }
    });

    it('should reject unknown boolean spellings', () => {
      expect(() => loadConfig({ FORMAT_CASE_INSENSITIVE: 'yes' })).toThrowError(
        expect.objectContaining({ code: 'VALIDATION_ERROR:INVALID_CONFIG' })
      );
    });
  });

  describe('loadTokens', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'tokens-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read a token to claims map', async () => {
      const path = join(dir, 'tokens.json');
      await writeFile(path, JSON.stringify({ 'test-token': { sub: 'u1', azp: 'web' } }));

      await expect(loadTokens(path)).resolves.toEqual({ 'test-token': { sub: 'u1', azp: 'web' } });
    });

    it('should reject a file that is not a map of objects', async () => {
      const path = join(dir, 'bad.json');
      await writeFile(path, JSON.stringify({ 'test-token': 'claims' }));

      await expect(loadTokens(path)).rejects.toThrow('Invalid tokens file');
    });

    it('should reject a missing file', async () => {
      await expect(loadTokens(join(dir, 'missing.json'))).rejects.toThrow('Cannot read tokens file');
    });
  });
});
