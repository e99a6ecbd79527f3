/**
 * Typed application configuration
 */

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface LedgerConfig {
  defaultLoanDays: number;
  overduePageSize: number;
  transactionRetries: number;
  isolationLevel: IsolationLevel;
}

export interface AppConfig {
  database: DatabaseConfig;
  ledger: LedgerConfig;
  logging: {
    level: string;
    file: string;
    silent: boolean;
  };
  auth: {
    bcryptRounds: number;
  };
}
