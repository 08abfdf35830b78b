import path from 'path';
import nodemailer, { type Transporter } from 'nodemailer';
import { EmailProvider, type EmailMessage, type SendResult } from './base.js';
import type { EmailOptions, EmailProviderName } from '../config/types.js';
import { EMAIL_CONSTANTS } from '../config/constants.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

interface SmtpPreset {
  label: string;
  host: string;
  port: number;
  secure: boolean;
}

/**
 * Known mailbox providers. `secure` means implicit TLS (port 465);
 * the others upgrade with STARTTLS.
 */
export const SMTP_PRESETS: Record<Exclude<EmailProviderName, 'mock' | 'smtp'>, SmtpPreset> = {
  gmail: { label: 'GMAIL', host: 'smtp.gmail.com', port: 587, secure: false },
  qq: { label: 'QQMAIL', host: 'smtp.qq.com', port: 465, secure: true },
  outlook: { label: 'OUTLOOK', host: 'smtp.office365.com', port: 587, secure: false }
};

export interface SmtpProviderOptions extends Partial<EmailOptions> {
  /** Pre-built transporter (e.g. nodemailer's streamTransport in tests) */
  transporter?: Transporter;
}

/**
 * SMTP email provider backed by nodemailer.
 * Covers the gmail / qq / outlook presets and any custom host.
 */
export class SmtpEmailProvider extends EmailProvider {
  private readonly name: string;
  private readonly host: string;
  private readonly port: number;
  private readonly secure: boolean;
  private readonly username: string;
  private readonly password: string;
  private readonly defaultSender: string;
  private readonly retryAttempts: number;
  private readonly timeoutMs: number;
  private transporter: Transporter | null;

  constructor(options: SmtpProviderOptions = {}) {
    super();
    const providerName = options.provider ?? 'smtp';
    const preset = providerName === 'smtp' || providerName === 'mock' ? undefined : SMTP_PRESETS[providerName];

    this.name = preset?.label ?? 'SMTP';
    this.host = options.host || preset?.host || 'localhost';
    this.port = options.port ?? preset?.port ?? 587;
    this.secure = options.secure ?? preset?.secure ?? this.port === 465;
    this.username = options.username ?? '';
    this.password = options.password ?? '';
    this.defaultSender = options.defaultSender || this.username;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? EMAIL_CONSTANTS.DEFAULT_RETRY_ATTEMPTS);
    this.timeoutMs = options.timeoutMs ?? EMAIL_CONSTANTS.DEFAULT_TIMEOUT_SECONDS * 1000;
    this.transporter = options.transporter ?? null;
  }

  getName(): string {
    return this.name;
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: this.host,
        port: this.port,
        secure: this.secure,
        requireTLS: !this.secure,
        auth: this.username ? { user: this.username, pass: this.password } : undefined,
        connectionTimeout: this.timeoutMs,
        greetingTimeout: this.timeoutMs,
        socketTimeout: this.timeoutMs
      });
    }
    return this.transporter;
  }

  async verify(): Promise<boolean> {
    try {
      await this.getTransporter().verify();
      return true;
    } catch (error) {
      log.warn(`${this.name} SMTP verification failed`, { host: this.host, error: getErrorMessage(error) });
      return false;
    }
  }

  async send(message: EmailMessage): Promise<SendResult> {
    if (!this.validateEmail(message.to)) {
      return { success: false, error: `Invalid recipient email address: ${message.to}`, provider: this.name, attempts: 0 };
    }

    const from = message.from || this.defaultSender;
    if (!from) {
      return { success: false, error: 'No sender address configured', provider: this.name, attempts: 0 };
    }

    const mail = {
      from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      attachments: (message.attachments ?? []).map(filePath => ({
        filename: path.basename(filePath),
        path: filePath
      }))
    };

    log.debug('Sending email', {
      provider: this.name,
      to: message.to,
      subject: message.subject,
      attachments: mail.attachments.length
    });

    let lastError = '';
    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        const info: { messageId?: string } = await this.getTransporter().sendMail(mail);
        return {
          success: true,
          messageId: info.messageId ?? `${this.name.toLowerCase()}_${Date.now()}`,
          provider: this.name
        };
      } catch (error) {
        lastError = getErrorMessage(error);
        log.debug('SMTP send attempt failed', { provider: this.name, attempt, error: lastError });
      }
    }

    return { success: false, error: lastError, provider: this.name, attempts: this.retryAttempts };
  }

  async close(): Promise<void> {
    this.transporter?.close();
    this.transporter = null;
  }
}
