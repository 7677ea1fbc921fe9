/**
 * Rewards Service Configuration Defaults
 *
 * Single source of truth for default values. Environment variables override
 * them in loadConfig().
 */

export const REWARDS_CONFIG_DEFAULTS = {
  // Database Configuration
  database: {
    value: {
      mongoUri: 'mongodb://localhost:27017/rewards?directConnection=true',
      dbName: 'rewards',
      redisUrl: '',
      useTransactions: false,
    },
    description: 'MongoDB / Redis connection and transaction usage',
  },

  // Logging
  logging: {
    value: {
      level: 'info',
      format: 'json',
    },
    description: 'Log level (debug|info|warn|error) and format (json|text|pretty)',
  },

  // Email (nodemailer SMTP transport)
  smtp: {
    value: {
      host: '',
      port: 587,
      secure: false,
      user: '',
      password: '',
      from: 'rewards@example.com',
    },
    description: 'SMTP transport for award emails',
  },

  // Chat
  teams: {
    value: {
      webhookUrl: '',
    },
    description: 'Teams incoming webhook used for direct award messages',
  },

  // Notifications / Outbox
  notifications: {
    value: {
      timeoutMs: 10000,
      templatesDir: '',
    },
    description: 'Outbound call timeout and Handlebars templates directory (empty = bundled templates)',
  },

  outbox: {
    value: {
      batchSize: 50,
      maxAttempts: 5,
      intervalMs: 60000,
      baseDelayMs: 30000,
      maxDelayMs: 3600000,
    },
    description: 'Outbox dispatcher batch size, attempts and retry backoff',
  },

  // Scheduler
  scheduler: {
    value: {
      tickMs: 15000,
      enabled: true,
    },
    description: 'Scheduler tick interval; disable to run jobs externally',
  },

  // Marketplace
  marketplace: {
    value: {
      tiersCacheTtlSeconds: 300,
    },
    description: 'Tier table cache TTL',
  },
} as const;
