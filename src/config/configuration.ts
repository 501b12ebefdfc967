export interface AccountSeed {
  displayName: string;
  session: string;
  priority?: number;
}

function loadAccountsFromEnv(): AccountSeed[] {
  const accounts: AccountSeed[] = [];
  let index = 1;

  while (true) {
    const envValue = process.env[`TG_ACCOUNTS_${index}`];
    if (!envValue) break;

    try {
      const parsed: unknown = JSON.parse(envValue);
      if (isAccountSeed(parsed)) {
        accounts.push(parsed);
      }
    } catch {
      console.warn(`Failed to parse TG_ACCOUNTS_${index}, skipping...`);
    }

    index++;
  }

  return accounts;
}

function isAccountSeed(value: unknown): value is AccountSeed {
  if (typeof value !== 'object' || value === null) return false;
  if (!('displayName' in value) || !('session' in value)) return false;
  const priority = 'priority' in value ? value.priority : undefined;
  return (
    typeof value.displayName === 'string' &&
    typeof value.session === 'string' &&
    value.session.length > 0 &&
    (priority === undefined || typeof priority === 'number')
  );
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function backoffTableFromEnv(): number[] {
  const table = listFromEnv('RETRY_BACKOFF_TABLE')
    .map((item) => Number(item))
    .filter((seconds) => Number.isFinite(seconds) && seconds > 0);

  return table.length > 0
    ? table
    : [2, 5, 10, 30, 60, 120, 300, 600, 1800, 3600];
}

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),

  controlApiKey: process.env.CONTROL_API_KEY ?? '',

  // API credentials must come from the environment
  telegram: {
    apiId: intFromEnv('TELEGRAM_API_ID', 0),
    apiHash: process.env.TELEGRAM_API_HASH ?? '',
    connectionRetries: intFromEnv('TELEGRAM_CONNECTION_RETRIES', 3),
  },

  accounts: {
    list: loadAccountsFromEnv(),
    auditLogSize: intFromEnv('AUDIT_LOG_SIZE', 1000),
  },

  sessions: {
    maxActive: intFromEnv('MAX_ACTIVE_SESSIONS', 100),
    idleEvictSeconds: intFromEnv('IDLE_EVICT_SECONDS', 600),
    reaperIntervalSeconds: intFromEnv('SESSION_REAPER_INTERVAL_SECONDS', 60),
  },

  rateLimit: {
    perAccountPerMinute: intFromEnv('PER_ACCOUNT_CALLS_PER_MINUTE', 20),
    perAccountPerHour: intFromEnv('PER_ACCOUNT_CALLS_PER_HOUR', 300),
    globalPerMinute: intFromEnv('GLOBAL_CALLS_PER_MINUTE', 150),
    globalPerHour: intFromEnv('GLOBAL_CALLS_PER_HOUR', 5000),
  },

  retry: {
    maxAttempts: intFromEnv('RETRY_MAX_ATTEMPTS', 50),
    backoffTable: backoffTableFromEnv(),
    maxDelaySeconds: intFromEnv('RETRY_MAX_DELAY_SECONDS', 3600),
  },

  broadcast: {
    batchSize: intFromEnv('BROADCAST_BATCH_SIZE', 10),
    cooldownMinMs: intFromEnv('BROADCAST_COOLDOWN_MIN_MS', 2000),
    cooldownMaxMs: intFromEnv('BROADCAST_COOLDOWN_MAX_MS', 5000),
  },

  watcher: {
    pollIntervalSeconds: intFromEnv('WATCH_POLL_INTERVAL_SECONDS', 15),
    defaultBreadth: intFromEnv('WATCH_DEFAULT_BREADTH', 0),
    autostart: process.env.WATCH_AUTOSTART === 'true',
  },

  alerts: {
    botToken: process.env.ALERT_BOT_TOKEN ?? '',
    chatIds: listFromEnv('ALERT_CHAT_IDS'),
  },
});
