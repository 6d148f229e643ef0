import test from 'node:test';
import assert from 'node:assert/strict';

import { LogLevel, parseLogLevel, redactLogData, redactString } from '../utils/logger.js';
import type { LogMetadata } from '../utils/logger.js';

test('redacts obvious secrets in messages and metadata', () => {
  const apiKey = 'sk-test-secret-placeholder';
  const bearer = 'Bearer test-secret-token-placeholder';
  const jwt = 'eyJtest-secret-header.test-secret-payload.signature';

  const meta: LogMetadata = {
    apiKey,
    headers: { Authorization: bearer, accept: 'json' },
    nested: [{ refreshToken: jwt }],
    note: `forwarding ${bearer}`
  };

  const { message, meta: redactedMeta } = redactLogData(`sending ${apiKey}`, meta);

  assert.equal(message, 'sending [REDACTED]');
  assert.deepStrictEqual(redactedMeta, {
    apiKey: '[REDACTED]',
    headers: { Authorization: '[REDACTED]', accept: 'json' },
    nested: [{ refreshToken: '[REDACTED]' }],
    note: 'forwarding [REDACTED]'
  });
});

test('leaves safe metadata untouched', () => {
  const meta: LogMetadata = { file: 'api/server.go', count: 2, clean: false };
  const originalMessage = 'Parsing api/server.go';

  const { message, meta: redactedMeta } = redactLogData(originalMessage, meta);

  assert.equal(message, originalMessage);
  assert.deepStrictEqual(redactedMeta, meta);
});

test('redacts known key variables in messages', () => {
  assert.equal(redactString('OPENAI_API_KEY=test-secret-value safe'), 'OPENAI_API_KEY=[REDACTED] safe');
  assert.equal(
    redactString('CODEATLAS_EMBEDDING_API_KEY = test-secret; next'),
    'CODEATLAS_EMBEDDING_API_KEY=[REDACTED]; next'
  );
});

test('parses log levels case-insensitively with a fallback', () => {
  assert.equal(parseLogLevel('DEBUG', LogLevel.INFO), LogLevel.DEBUG);
  assert.equal(parseLogLevel('silent', LogLevel.INFO), LogLevel.SILENT);
  assert.equal(parseLogLevel('verbose', LogLevel.WARN), LogLevel.WARN);
  assert.equal(parseLogLevel(undefined, LogLevel.ERROR), LogLevel.ERROR);
});
