import test from 'node:test';
import assert from 'node:assert/strict';

import { redactLogData } from '../utils/logger.js';
import type { LogMetadata } from '../utils/logger.js';
import { withEnv } from './helpers/env.js';

test('redacts obvious secrets in messages and metadata', () => {
  const meta: LogMetadata = {
    password: 'test-secret',
    headers: { Authorization: 'placeholder-value' },
    nested: [{ refreshToken: 'placeholder-value' }]
  };

  const { message, meta: redactedMeta } = redactLogData('login password=test-secret-value', meta);

  assert.equal(message, 'login [REDACTED]');
  assert.deepStrictEqual(redactedMeta, {
    password: '[REDACTED]',
    headers: { Authorization: '[REDACTED]' },
    nested: [{ refreshToken: '[REDACTED]' }]
  });
});

test('redacts bearer tokens inside free text', () => {
  const { message } = redactLogData('sending Bearer abcdefghijklmnopqrstuvwxyz1234567890 now');
  assert.equal(message, 'sending [REDACTED] now');
});

test('redacts default mail credential variables', () => {
  const { message, meta } = redactLogData('QQMAIL_PASSWORD=abc123 loaded', { QQMAIL_PASSWORD: 'abc123' });
  assert.equal(message, 'QQMAIL_PASSWORD=[REDACTED] loaded');
  assert.deepStrictEqual(meta, { QQMAIL_PASSWORD: '[REDACTED]' });
});

test('leaves safe metadata untouched', () => {
  const meta: LogMetadata = { file: 'report.pdf', recipient: 'ops@example.com', file_count: 2, recursive: false };
  const originalMessage = 'Processing report.pdf';

  const { message, meta: redactedMeta } = redactLogData(originalMessage, meta);

  assert.equal(message, originalMessage);
  assert.deepStrictEqual(redactedMeta, meta);
});

test('redacts configured env var names in message and metadata', () => {
  const previousEnv = process.env.COURIER_REDACT_ENV_VARS;
  process.env.COURIER_REDACT_ENV_VARS = 'CUSTOM_RELAY,ANOTHER_TOKEN';

  try {
    const meta: LogMetadata = { CUSTOM_RELAY: 'abc123', note: 'ok' };
    const { message, meta: redactedMeta } = redactLogData('CUSTOM_RELAY=abc123 safe', meta);

    assert.equal(message, 'CUSTOM_RELAY=[REDACTED] safe');
    assert.equal(redactedMeta?.CUSTOM_RELAY, '[REDACTED]');
    assert.equal(redactedMeta?.note, 'ok');
  } finally {
    if (previousEnv === undefined) {
      delete process.env.COURIER_REDACT_ENV_VARS;
    } else {
      process.env.COURIER_REDACT_ENV_VARS = previousEnv;
    }
  }
});

test('extra keys to mask are read at call time and matched in any case style', () => {
  const meta: LogMetadata = { deliveryRecipient: 'ops@example.com', attempts: [{ 'delivery-recipient': 'ops@example.com' }] };

  assert.deepStrictEqual(redactLogData('sent', meta).meta, meta);

  withEnv({ COURIER_REDACT_KEYS: 'DELIVERY_RECIPIENT' }, () => {
    assert.deepStrictEqual(redactLogData('sent', meta).meta, {
      deliveryRecipient: '[REDACTED]',
      attempts: [{ 'delivery-recipient': '[REDACTED]' }]
    });
  });
});
