export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  /** Sender address; providers fall back to their default sender */
  from?: string;
  /** Absolute paths of files to attach */
  attachments?: string[];
}

export type SendResult =
  | { success: true; messageId: string; provider: string }
  | { success: false; error: string; provider: string; attempts?: number };

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(address: string): boolean {
  return EMAIL_PATTERN.test(address.trim());
}

/**
 * An outbound email channel. The watcher only depends on `send`; transports,
 * credentials and retries are the provider's business.
 */
export abstract class EmailProvider {
  /**
   * Send one message. Implementations resolve with a failure result instead of
   * rejecting for transport or validation errors.
   */
  abstract send(message: EmailMessage): Promise<SendResult>;
  abstract getName(): string;

  /** Check credentials/connectivity where the transport supports it */
  async verify(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release by default
  }

  validateEmail(address: string): boolean {
    return isValidEmail(address);
  }
}
