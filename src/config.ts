import 'dotenv/config';

const DEFAULT_APP_URL = 'http://localhost:8080';

export const config = {
  appUrl: process.env.TABLES_APP_URL || DEFAULT_APP_URL,
  // comma list of __createdAt/__updatedAt/__version, or '*'
  systemProperties: process.env.TABLES_SYSTEM_PROPERTIES || '',
  log: {
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  },
};
