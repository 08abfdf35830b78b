import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs/promises';
import path from 'path';
import { ActivityLog, readActivityLog } from '../utils/activity-log.js';
import { createTempDir } from './helpers/temp-dir.js';

const fixedNow = () => new Date('2024-03-01T08:30:00.000Z');

test('records are appended as one JSON object per line', async () => {
  const dir = await createTempDir();
  try {
    const logPath = path.join(dir.root, 'logs', 'watcher_log.jsonl');
    const activity = new ActivityLog(logPath, 'file_watcher', fixedNow);

    activity.record('file_change', 'detected', { file: '/w/a.txt', event_type: 'created', watched_dir: '/w' });
    activity.record('stop_watching', 'completed');

    const lines = (await fs.readFile(logPath, 'utf8')).split('\n');
    assert.equal(lines.length, 3);
    assert.equal(lines[2], '');
    assert.deepStrictEqual(JSON.parse(lines[0]), {
      timestamp: '2024-03-01T08:30:00.000Z',
      module: 'file_watcher',
      action: 'file_change',
      status: 'detected',
      details: { file: '/w/a.txt', event_type: 'created', watched_dir: '/w' }
    });

    assert.deepStrictEqual(
      readActivityLog(logPath).map(record => [record.action, record.status, record.details]),
      [
        ['file_change', 'detected', { file: '/w/a.txt', event_type: 'created', watched_dir: '/w' }],
        ['stop_watching', 'completed', {}]
      ]
    );
  } finally {
    await dir.cleanup();
  }
});

test('sensitive detail values are redacted before they are written', async () => {
  const dir = await createTempDir();
  try {
    const logPath = path.join(dir.root, 'activity.jsonl');
    const activity = new ActivityLog(logPath, 'email_service', fixedNow);

    const entry = activity.record('send_notification', 'error', {
      error: 'login failed for password=test-secret-value',
      smtp_password: 'test-secret'
    });

    assert.deepStrictEqual(entry.details, {
      error: 'login failed for [REDACTED]',
      smtp_password: '[REDACTED]'
    });
    assert.deepStrictEqual(readActivityLog(logPath)[0].details, entry.details);
    assert.equal(readActivityLog(logPath)[0].module, 'email_service');
  } finally {
    await dir.cleanup();
  }
});

test('without a file path records are returned but not written', () => {
  const activity = new ActivityLog(null, 'file_watcher', fixedNow);
  const entry = activity.record('start_watching', 'started', { directories: ['/w'] });

  assert.equal(activity.getPath(), null);
  assert.deepStrictEqual(entry, {
    timestamp: '2024-03-01T08:30:00.000Z',
    module: 'file_watcher',
    action: 'start_watching',
    status: 'started',
    details: { directories: ['/w'] }
  });
});

test('reading a missing log yields no records', () => {
  assert.deepStrictEqual(readActivityLog('/nonexistent/courier/activity.jsonl'), []);
});
