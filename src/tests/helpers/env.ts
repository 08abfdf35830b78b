const CONFIG_ENV_NAMES = [
  'COURIER_HOME',
  'COURIER_EMAIL_PROVIDER',
  'EMAIL_PROVIDER',
  'COURIER_SMTP_HOST',
  'COURIER_SMTP_PORT',
  'COURIER_SMTP_USER',
  'COURIER_SMTP_PASSWORD',
  'COURIER_SMTP_SENDER',
  'COURIER_DEBOUNCE_SECONDS',
  'COURIER_COOLDOWN_SECONDS',
  'COURIER_ACTIVITY_LOG'
];

/**
 * Run `fn` with the config-related environment cleared and `vars` applied,
 * restoring the previous values afterwards.
 */
export function withEnv<T>(vars: Record<string, string | undefined>, fn: () => T): T {
  const names = new Set([...CONFIG_ENV_NAMES, ...Object.keys(vars)]);
  const saved = new Map<string, string | undefined>();

  for (const name of names) {
    saved.set(name, process.env[name]);
    const value = vars[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }

  try {
    return fn();
  } finally {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  }
}
