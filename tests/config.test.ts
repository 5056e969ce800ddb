/**
 * Config Parser Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  ConfigParser,
  ConfigError,
  createConfigParser,
  loadCheckConfig,
  DEFAULT_CONFIG,
  MAX_TIMEOUT_SECONDS,
} from '../src/lib/config/index.js';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';

const TEST_CONFIG_DIR = './test-config-parser';

describe('ConfigParser', () => {
  const parser = createConfigParser();

  describe('parse', () => {
    it('should parse YAML config', () => {
      const yaml = `
url: http://example.test/health
timeout: 5
redirect_ok: true
response_code: 301
`;

      expect(parser.parse(yaml, 'check.yml')).toEqual({
        url: 'http://example.test/health',
        timeout: 5,
        redirect_ok: true,
        response_code: 301,
      });
    });

    it('should parse JSON config', () => {
      const json = JSON.stringify({ url: 'http://example.test/', negquery: 'error' });

      expect(parser.parse(json, 'check.json')).toEqual({
        url: 'http://example.test/',
        negquery: 'error',
      });
    });

    it('should treat an empty YAML document as no settings', () => {
      expect(parser.parse('', 'check.yml')).toEqual({});
    });

    it('should reject unknown keys', () => {
      expect(() => parser.parse('retries: 3', 'check.yml')).toThrow(ConfigError);
      expect(() => parser.parse('retries: 3', 'check.yml')).toThrow(/^check\.yml: \(root\): Unrecognized key/);
    });

    it('should reject values of the wrong type', () => {
      expect(() => parser.parse('timeout: soon', 'check.yml')).toThrow(/^check\.yml: timeout: /);
    });

    it('should reject negative timeouts', () => {
      expect(() => parser.parse('timeout: -1', 'check.yml')).toThrow(ConfigError);
    });

    it('should accept a timeout of 0', () => {
      expect(parser.parse('timeout: 0', 'check.yml')).toEqual({ timeout: 0 });
    });

    it('should reject timeouts a timer cannot hold', () => {
      expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
      expect(parser.parse('timeout: 2147483', 'check.yml')).toEqual({ timeout: 2147483 });
      expect(() => parser.parse('timeout: 2147484', 'check.yml')).toThrow(/^check\.yml: timeout: /);
    });

    it('should reject malformed JSON', () => {
      expect(() => parser.parse('{"url":', 'check.json')).toThrow(ConfigError);
    });
  });

  describe('resolve', () => {
    it('should apply defaults', () => {
      expect(parser.resolve()).toEqual({
        url: '',
        timeoutSeconds: DEFAULT_CONFIG.timeout,
        redirectAccepted: DEFAULT_CONFIG.redirect_ok,
      });
    });

    it('should map file keys to config fields', () => {
      const config = parser.resolve({
        url: 'http://example.test/',
        timeout: 3,
        redirect_ok: true,
        response_code: 204,
        query: 'ready',
      });

      expect(config).toEqual({
        url: 'http://example.test/',
        timeoutSeconds: 3,
        redirectAccepted: true,
        expectedStatusCode: 204,
        requiredPattern: 'ready',
      });
    });

    it('should let overrides win over file values', () => {
      const config = parser.resolve(
        { url: 'http://file.test/', timeout: 5, negquery: 'error' },
        { url: 'http://flag.test/', timeout: 7 }
      );

      expect(config.url).toBe('http://flag.test/');
      expect(config.timeoutSeconds).toBe(7);
      expect(config.forbiddenPattern).toBe('error');
    });

    it('should disable the deadline with a timeout flag of 0', () => {
      expect(parser.resolve({ timeout: 5 }, { timeout: 0 }).timeoutSeconds).toBe(0);
    });

    it('should reject an oversized timeout flag', () => {
      expect(() => parser.resolve({}, { timeout: 3000000 })).toThrow(/^config: timeoutSeconds: /);
    });

    it('should freeze the result', () => {
      expect(Object.isFrozen(parser.resolve({ url: 'http://example.test/' }))).toBe(true);
    });

    it('should reject out-of-range status codes', () => {
      expect(() => parser.resolve({}, { response_code: 1000 })).toThrow(/^config: expectedStatusCode: /);
    });
  });

  describe('loadCheckConfig', () => {
    beforeAll(async () => {
      await mkdir(TEST_CONFIG_DIR, { recursive: true });
      await writeFile(
        join(TEST_CONFIG_DIR, 'check.yml'),
        'url: http://example.test/\ntimeout: 4\nquery: healthy\n'
      );
    });

    afterAll(async () => {
      await rm(TEST_CONFIG_DIR, { recursive: true, force: true });
    });

    it('should load from file and apply flag overrides', async () => {
      const config = await loadCheckConfig({ timeout: 9 }, join(TEST_CONFIG_DIR, 'check.yml'));

      expect(config).toEqual({
        url: 'http://example.test/',
        timeoutSeconds: 9,
        redirectAccepted: false,
        requiredPattern: 'healthy',
      });
    });

    it('should work without a file', async () => {
      const config = await loadCheckConfig({ url: 'http://example.test/' });
      expect(config.url).toBe('http://example.test/');
      expect(config.timeoutSeconds).toBe(15);
    });

    it('should fail with ConfigError when the file is missing', async () => {
      await expect(
        loadCheckConfig({}, join(TEST_CONFIG_DIR, 'missing.yml'))
      ).rejects.toThrow(/^cannot read config file /);
    });
  });

  it('should be constructible directly', () => {
    expect(new ConfigParser()).toBeInstanceOf(ConfigParser);
  });
});
