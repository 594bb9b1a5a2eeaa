const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true';
};

export default () => ({
  github: {
    appId: process.env.GITHUB_APP_ID,
    privateKeyPath: process.env.GITHUB_PRIVATE_KEY_PATH,
    privateKey: process.env.GITHUB_PRIVATE_KEY,
    webhookSecret: process.env.GITHUB_WEBHOOK_SECRET,
    clientId: process.env.GITHUB_CLIENT_ID,
    apiBaseUrl: process.env.GITHUB_API_BASE_URL || 'https://api.github.com',
    mockMode: parseFlag(process.env.GITHUB_MOCK_MODE, false),
    maxRetries: parseInteger(process.env.GITHUB_MAX_RETRIES, 3),
    rateLimitBuffer: parseInteger(process.env.GITHUB_RATE_LIMIT_BUFFER, 10),
    requestTimeoutMs: parseInteger(process.env.GITHUB_REQUEST_TIMEOUT_MS, 30000),
    autoWait: parseFlag(process.env.GITHUB_RATE_LIMIT_AUTO_WAIT, true),
    statusContext: process.env.GITHUB_STATUS_CONTEXT || 'commit-quality-analysis',
  },
  app: {
    environment: process.env.NODE_ENV || 'development',
    name: 'Commit Review GitHub Access',
    version: '0.1.0',
  },
  logging: {
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    directory: process.env.LOG_DIR || 'logs',
    toFile: parseFlag(process.env.LOG_TO_FILE, process.env.NODE_ENV !== 'test'),
  },
});
