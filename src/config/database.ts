import type { PoolOptions } from 'mysql2/promise';

/**
 * The database message sink is only used when DB_HOST is set
 */
export function isDatabaseEnabled(): boolean {
  return Boolean(process.env.DB_HOST);
}

export function getDatabaseConfig(): PoolOptions {
  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    user: process.env.DB_USER || 'root',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_DATABASE || process.env.DB_NAME || 'control',
    waitForConnections: true,
    connectionLimit: 10,
    queueLimit: 0,
    timezone: 'Z',
  };
}
