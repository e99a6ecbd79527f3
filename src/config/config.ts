import dotenv from 'dotenv';
import { AppConfig, IsolationLevel } from '../types/config.types';

// Load environment variables
dotenv.config();

const ISOLATION_LEVELS: readonly IsolationLevel[] = ['read committed', 'repeatable read', 'serializable'];

function parseIsolationLevel(value: string | undefined): IsolationLevel {
  const normalized = (value || 'read committed').trim().toLowerCase();
  const match = ISOLATION_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new Error(`Invalid TRANSACTION_ISOLATION: ${value}`);
  }
  return match;
}

/**
 * Application configuration loaded from environment variables
 * with sensible defaults
 */
export const config: AppConfig = {
  database: {
    connectionString: process.env.DATABASE_URL,
    host: process.env.DATABASE_HOST || process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || process.env.DB_PORT || '5432', 10),
    database: process.env.DATABASE_NAME || process.env.DB_NAME || 'library_db',
    user: process.env.DATABASE_USER || process.env.DB_USER || 'postgres',
    password: process.env.DATABASE_PASSWORD || process.env.DB_PASSWORD || '',
    ssl: process.env.DATABASE_SSL === 'true',
    max: 20, // Maximum pool size
    idleTimeoutMillis: 30000, // Close idle clients after 30s
    connectionTimeoutMillis: 5000, // Timeout connection attempts after 5s
  },

  ledger: {
    defaultLoanDays: parseInt(process.env.DEFAULT_LOAN_DAYS || '14', 10),
    overduePageSize: parseInt(process.env.OVERDUE_PAGE_SIZE || '100', 10),
    transactionRetries: parseInt(process.env.TRANSACTION_RETRIES || '3', 10),
    isolationLevel: parseIsolationLevel(process.env.TRANSACTION_ISOLATION),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    // An empty LOG_FILE disables the file transports
    file: process.env.LOG_FILE ?? './logs/app.log',
    silent: process.env.LOG_SILENT === 'true',
  },

  auth: {
    bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),
  },
};

/**
 * Validate required configuration
 */
export function validateConfig(): void {
  if (process.env.DATABASE_URL) {
    return;
  }

  const required = [
    'DATABASE_HOST',
    'DATABASE_NAME',
    'DATABASE_USER',
    'DATABASE_PASSWORD',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    console.warn(
      `Warning: Missing environment variables: ${missing.join(', ')}`
    );
    console.warn('Using default values. Set these in .env file for production.');
  }
}

// Validate on import
validateConfig();
