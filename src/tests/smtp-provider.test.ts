import test from 'node:test';
import assert from 'node:assert/strict';
import nodemailer from 'nodemailer';
import { SmtpEmailProvider } from '../providers/smtp.js';
import { MockEmailProvider } from '../providers/mock.js';
import { createEmailProvider } from '../providers/index.js';
import { isValidEmail } from '../providers/base.js';
import { createTempDir } from './helpers/temp-dir.js';

interface CapturedMail {
  from: string;
  to: string;
  subject: string;
  copies: string[];
  attachments: Array<string | false | undefined>;
}

/**
 * nodemailer transport that builds the message in memory. Every compiled mail
 * is captured; `failWith` makes the compile step reject.
 */
function createStreamTransport(failWith?: string) {
  const transporter = nodemailer.createTransport({ streamTransport: true, buffer: true, newline: 'unix' });
  const captured: CapturedMail[] = [];
  let attempts = 0;

  transporter.use('compile', (mail, done) => {
    attempts++;
    if (failWith) {
      done(new Error(failWith));
      return;
    }
    captured.push({
      from: String(mail.data.from),
      to: String(mail.data.to),
      subject: String(mail.data.subject),
      copies: [mail.data.cc, mail.data.bcc].filter(value => value !== undefined).map(String),
      attachments: (mail.data.attachments ?? []).map(attachment => attachment.filename)
    });
    done();
  });

  return { transporter, captured, attempts: () => attempts };
}

test('preset names follow the configured provider', () => {
  assert.equal(new SmtpEmailProvider({ provider: 'qq' }).getName(), 'QQMAIL');
  assert.equal(new SmtpEmailProvider({ provider: 'gmail' }).getName(), 'GMAIL');
  assert.equal(new SmtpEmailProvider({ provider: 'outlook' }).getName(), 'OUTLOOK');
  assert.equal(new SmtpEmailProvider({ provider: 'smtp', host: 'mail.example.com' }).getName(), 'SMTP');
});

test('createEmailProvider maps names to providers', () => {
  assert.ok(createEmailProvider('mock') instanceof MockEmailProvider);
  const outlook = createEmailProvider('outlook', { username: 'watcher@example.com' });
  assert.ok(outlook instanceof SmtpEmailProvider);
  assert.equal(outlook.getName(), 'OUTLOOK');
});

test('email addresses are checked before sending', async () => {
  assert.equal(isValidEmail('ops@example.com'), true);
  assert.equal(isValidEmail(' ops@example.com '), true);
  assert.equal(isValidEmail('ops@example'), false);

  const stream = createStreamTransport();
  const provider = new SmtpEmailProvider({ provider: 'smtp', username: 'watcher@example.com', transporter: stream.transporter });
  const result = await provider.send({ to: 'not-an-email', subject: 's', text: 't' });

  assert.deepStrictEqual(result, {
    success: false,
    error: 'Invalid recipient email address: not-an-email',
    provider: 'SMTP',
    attempts: 0
  });
  assert.equal(stream.attempts(), 0);
});

test('a send without any sender address is refused', async () => {
  const stream = createStreamTransport();
  const provider = new SmtpEmailProvider({ provider: 'smtp', transporter: stream.transporter });
  const result = await provider.send({ to: 'ops@example.com', subject: 's', text: 't' });

  assert.deepStrictEqual(result, {
    success: false,
    error: 'No sender address configured',
    provider: 'SMTP',
    attempts: 0
  });
});

test('changed files go out to the recipient alone, attached by their basename', async () => {
  const dir = await createTempDir({ 'reports/q1.csv': 'a,b\n1,2\n' });
  try {
    const stream = createStreamTransport();
    const provider = new SmtpEmailProvider({
      provider: 'gmail',
      username: 'watcher@example.com',
      transporter: stream.transporter
    });

    const result = await provider.send({
      to: 'ops@example.com',
      subject: 'File Changes Detected in reports',
      text: 'body',
      attachments: [`${dir.root}/reports/q1.csv`]
    });

    assert.equal(result.success, true);
    assert.equal(result.provider, 'GMAIL');
    assert.deepStrictEqual(stream.captured, [
      {
        from: 'watcher@example.com',
        to: 'ops@example.com',
        subject: 'File Changes Detected in reports',
        copies: [],
        attachments: ['q1.csv']
      }
    ]);
    await provider.close();
  } finally {
    await dir.cleanup();
  }
});

test('the message sender overrides the default sender', async () => {
  const stream = createStreamTransport();
  const provider = new SmtpEmailProvider({
    provider: 'smtp',
    username: 'watcher@example.com',
    transporter: stream.transporter
  });

  await provider.send({ to: 'ops@example.com', from: 'courier@example.com', subject: 's', text: 't' });
  assert.equal(stream.captured[0].from, 'courier@example.com');
});

test('transport errors are retried and then reported', async () => {
  const stream = createStreamTransport('relay refused');
  const provider = new SmtpEmailProvider({
    provider: 'qq',
    username: 'watcher@example.com',
    retryAttempts: 2,
    transporter: stream.transporter
  });

  const result = await provider.send({ to: 'ops@example.com', subject: 's', text: 't' });

  assert.deepStrictEqual(result, {
    success: false,
    error: 'relay refused',
    provider: 'QQMAIL',
    attempts: 2
  });
  assert.equal(stream.attempts(), 2);
});
