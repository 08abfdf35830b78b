import { EmailProvider, type EmailMessage, type SendResult } from './base.js';

/**
 * In-memory email provider for tests and dry runs.
 * Records every message; can be switched to fail on demand.
 */
export class MockEmailProvider extends EmailProvider {
  readonly sent: EmailMessage[] = [];
  private failureMessage: string | null = null;
  private throwOnSend = false;
  private counter = 0;

  constructor(private readonly delayMs = 0) {
    super();
  }

  getName(): string {
    return 'mock';
  }

  /** Make subsequent sends resolve with a failure result (null restores success) */
  failWith(message: string | null): void {
    this.failureMessage = message;
  }

  /** Make subsequent sends reject, as a misbehaving transport would */
  throwOnNextSends(enabled: boolean): void {
    this.throwOnSend = enabled;
  }

  async send(message: EmailMessage): Promise<SendResult> {
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }

    if (this.throwOnSend) {
      throw new Error('mock transport exploded');
    }

    this.sent.push({ ...message, attachments: [...(message.attachments ?? [])] });

    if (this.failureMessage !== null) {
      return { success: false, error: this.failureMessage, provider: this.getName(), attempts: 1 };
    }

    this.counter += 1;
    return { success: true, messageId: `mock_${this.counter}`, provider: this.getName() };
  }
}
