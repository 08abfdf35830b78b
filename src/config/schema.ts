import { z } from 'zod';

export const EMAIL_PROVIDER_NAMES = ['gmail', 'qq', 'outlook', 'smtp', 'mock'] as const;

const positiveNumber = z.number().finite().positive();

export const SmtpSettingsSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().positive().optional(),
  secure: z.boolean().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  defaultSender: z.string().optional()
}).strict();

export const EmailSettingsSchema = z.object({
  provider: z.enum(EMAIL_PROVIDER_NAMES).optional(),
  smtp: SmtpSettingsSchema.optional(),
  retryAttempts: z.number().int().min(1).max(10).optional(),
  timeoutSeconds: positiveNumber.optional()
}).strict();

export const WatchSettingsSchema = z.object({
  debounceDelaySeconds: z.number().finite().min(0).optional(),
  cooldownSeconds: z.number().finite().min(0).optional(),
  maxFileSizeMb: positiveNumber.optional(),
  sendEmailOnChange: z.boolean().optional()
}).strict();

export const WatchedDirectorySchema = z.object({
  path: z.string().trim().min(1, 'path must not be empty'),
  recursive: z.boolean().optional(),
  enabled: z.boolean().optional(),
  notifyEmail: z.string().optional(),
  fromEmail: z.string().nullable().optional(),
  notifyOnChange: z.boolean().optional(),
  maxFileSizeMb: positiveNumber.optional(),
  createIfMissing: z.boolean().optional()
}).strict();

// Directory entries are validated one by one so that a bad entry only drops itself.
export const CourierConfigSchema = z.object({
  email: EmailSettingsSchema.optional(),
  watching: z.object({
    settings: WatchSettingsSchema.optional(),
    directories: z.array(z.unknown()).optional()
  }).strict().optional(),
  logging: z.object({
    activityLog: z.string().min(1).optional()
  }).strict().optional(),
  lockFile: z.string().min(1).optional()
}).strict();

export type EmailProviderName = typeof EMAIL_PROVIDER_NAMES[number];
export type SmtpSettings = z.infer<typeof SmtpSettingsSchema>;
export type EmailSettings = z.infer<typeof EmailSettingsSchema>;
export type WatchSettings = z.infer<typeof WatchSettingsSchema>;
export type WatchedDirectoryEntry = z.infer<typeof WatchedDirectorySchema>;
export type CourierConfig = z.infer<typeof CourierConfigSchema>;

export function isEmailProviderName(value: string): value is EmailProviderName {
  return EMAIL_PROVIDER_NAMES.some(name => name === value);
}
