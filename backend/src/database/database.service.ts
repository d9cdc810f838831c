import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, PoolConfig } from 'pg';
import type { AppConfig, DatabaseConfig } from '../config/index.js';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  // The pool is created on first use so the app boots without a database
  constructor(private readonly configService: ConfigService<AppConfig>) {}

  private ensurePool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const database = this.configService.get<DatabaseConfig>('database');
    if (!database?.url) {
      throw new Error('DATABASE_URL is not configured');
    }

    const config: PoolConfig = {
      connectionString: database.url,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      max: 10,
    };

    if (database.ssl) {
      config.ssl = {
        rejectUnauthorized: false,
      };
    }

    this.pool = new Pool(config);
    this.pool.on('error', (err) => {
      this.logger.error('Unexpected database pool error', err.stack);
    });

    return this.pool;
  }

  getPool(): Pool {
    return this.ensurePool();
  }

  async getClient(): Promise<PoolClient> {
    const pool = this.ensurePool();
    try {
      return await pool.connect();
    } catch (error) {
      this.logger.warn(
        `Database connection failed, recreating pool: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      await this.resetPool();
      return this.ensurePool().connect();
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  private async resetPool(): Promise<void> {
    const stale = this.pool;
    this.pool = null;
    if (!stale) {
      return;
    }
    try {
      await stale.end();
    } catch (closeError) {
      this.logger.warn(
        `Closing stale pool failed: ${
          closeError instanceof Error ? closeError.message : String(closeError)
        }`,
      );
    }
  }
}
