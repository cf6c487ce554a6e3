import { Pool } from 'pg';
import { loadConfig } from '../config/app-config';
import type { DatabaseSettings } from '../config/app-config';
import { createLogger } from '../utils/logger';

const log = createLogger('Database');

export class DatabaseConnection {
  private static pool: Pool | null = null;

  static getPool(settings: DatabaseSettings = loadConfig().database): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        host: settings.host,
        port: settings.port,
        database: settings.database,
        user: settings.user,
        password: settings.password,
        // one run holds a single client for its transaction
        max: 1,
        connectionTimeoutMillis: 5000,
      });

      // Idle client errors must not crash the process
      this.pool.on('error', (err) => {
        log.error('Pool error:', err);
      });

      this.pool.on('connect', () => {
        log.debug('new client connected');
      });
    }
    return this.pool;
  }

  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      log.debug('pool closed');
    }
  }
}

export function getDbPool(): Pool {
  return DatabaseConnection.getPool();
}

export async function closeDbPool(): Promise<void> {
  await DatabaseConnection.close();
}
