import { EmailProvider } from './base.js';
import { SmtpEmailProvider } from './smtp.js';
import { MockEmailProvider } from './mock.js';
import type { EmailOptions, EmailProviderName } from '../config/types.js';

export * from './base.js';
export * from './smtp.js';
export * from './mock.js';

/**
 * Factory for email providers. SMTP presets for gmail, qq and outlook, a custom
 * SMTP host, and a mock provider for testing.
 *
 * @param providerName - Provider id ('gmail'|'qq'|'outlook'|'smtp'|'mock')
 * @param options - Transport configuration (host, credentials, retries, timeout)
 */
export function createEmailProvider(
  providerName: EmailProviderName,
  options: Partial<EmailOptions> = {}
): EmailProvider {
  switch (providerName) {
    case 'mock':
      return new MockEmailProvider();
    case 'gmail':
    case 'qq':
    case 'outlook':
    case 'smtp':
      return new SmtpEmailProvider({ ...options, provider: providerName });
  }
}
