import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod';

import { CLI_DEFAULTS, cliOptionsSchema, loadEnvConfig } from './cli-config';

describe('loadEnvConfig', () => {
  test('applies defaults for unset variables', () => {
    expect(loadEnvConfig({})).toEqual({
      TOCIO_LOG_LEVEL: CLI_DEFAULTS.LOG_LEVEL,
      TOCIO_OUTPUT_SUFFIX: CLI_DEFAULTS.OUTPUT_SUFFIX,
    });
  });

  test('treats empty variables as unset', () => {
    expect(
      loadEnvConfig({ TOCIO_LOG_LEVEL: '', TOCIO_OUTPUT_SUFFIX: '' }),
    ).toEqual({ TOCIO_LOG_LEVEL: 'warn', TOCIO_OUTPUT_SUFFIX: '_out' });
  });

  test('reads configured values', () => {
    expect(
      loadEnvConfig({ TOCIO_LOG_LEVEL: 'silent', TOCIO_OUTPUT_SUFFIX: '.toc' }),
    ).toEqual({ TOCIO_LOG_LEVEL: 'silent', TOCIO_OUTPUT_SUFFIX: '.toc' });
  });

  test('rejects an unknown log level', () => {
    expect(() => loadEnvConfig({ TOCIO_LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});

describe('cliOptionsSchema', () => {
  test('fills in flag defaults', () => {
    expect(cliOptionsSchema.parse({ input: 'in.pdf' })).toEqual({
      input: 'in.pdf',
      humanReadable: false,
      encoding: 'auto',
      replaceUnsupported: false,
      debug: false,
    });
  });

  test('explains an unsupported encoding', () => {
    const result = cliOptionsSchema.safeParse({
      input: 'in.pdf',
      encoding: 'latin1',
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.message)).toEqual([
      'Encoding must be one of: auto, pdfdoc, utf16be',
    ]);
  });

  test('rejects an empty output path', () => {
    expect(
      cliOptionsSchema.safeParse({ input: 'in.pdf', out: '' }).success,
    ).toBe(false);
  });
});
