import mysql from 'mysql2/promise';
import type { Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { getDatabaseConfig } from '../config/database.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger('db');

/**
 * Values bound to `?` placeholders
 */
export type SqlValue = string | number | boolean | Date | null;

let pool: Pool | null = null;

/**
 * Get database connection pool (singleton)
 */
export function getPool(): Pool {
  if (!pool) {
    const config = getDatabaseConfig();
    pool = mysql.createPool(config);
    logger.info(`Connection pool created for ${config.host}:${config.port}/${config.database}`);
  }
  return pool;
}

/**
 * Run a SELECT and return its rows
 */
export async function query<T extends RowDataPacket[]>(sql: string, params: SqlValue[] = []): Promise<T> {
  const [rows] = await getPool().execute<T>(sql, params);
  return rows;
}

/**
 * Run an INSERT/UPDATE/DELETE and return the result header
 */
export async function execute(sql: string, params: SqlValue[] = []): Promise<ResultSetHeader> {
  const [result] = await getPool().execute<ResultSetHeader>(sql, params);
  return result;
}

/**
 * Close the connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Connection pool closed');
  }
}
