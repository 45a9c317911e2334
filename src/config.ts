import dotenv from 'dotenv'

dotenv.config()

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback
}

export const config = {
  server: {
    port: parseInt(optional('PORT', '5000')),
    nodeEnv: optional('NODE_ENV', 'development'),
  },

  db: {
    path: optional('SQLITE_PATH', './data/pos.db'),
  },

  log: {
    level: optional('LOG_LEVEL', 'info'),
    dir: optional('LOG_DIR', './logs'),
  },

  store: {
    name: optional('STORE_NAME', 'My Store'),
    currency: optional('STORE_CURRENCY', 'USD'),
    lowStockThreshold: parseInt(optional('LOW_STOCK_THRESHOLD', '10')),
  },

  terminals: {
    idleTimeoutMinutes: parseInt(optional('TERMINAL_IDLE_MINUTES', '30')),
  },

  rateLimit: {
    windowMs: parseInt(optional('RATE_LIMIT_WINDOW_MS', '60000')),
    maxRequests: parseInt(optional('RATE_LIMIT_MAX_REQUESTS', '200')),
  },
}

export type AppConfig = typeof config
