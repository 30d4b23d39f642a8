import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createPool, Pool, PoolConnection } from 'mysql2/promise';
import { readFileSync } from 'node:fs';
import { JsonLogger } from '../logging/json-logger.service';

/**
 * DatabaseService owns the MySQL connection pool (DATA_STORE=mysql only).
 * Queries are written as tagged templates; every interpolation becomes a
 * prepared-statement parameter. Each query holds its connection only until
 * the result is read.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private pool?: Pool;

  constructor(private readonly config: ConfigService, private readonly logger: JsonLogger) {}

  async onModuleInit() {
    if (this.config.get<string>('DATA_STORE') !== 'mysql') {
      return;
    }

    const host = this.config.get<string>('DB_HOST');
    const user = this.config.get<string>('DB_USER');
    const database = this.config.get<string>('DB_NAME');

    if (!host || !user || !database) {
      this.logger.warn('Database configuration missing; pool not created');
      return;
    }

    const port = Number(this.config.get<number>('DB_PORT') ?? 3306);
    const password = this.config.get<string>('DB_PASSWORD');
    const sslConfig = this.buildSslConfig();

    this.pool = createPool({
      host,
      port,
      user,
      password,
      database,
      // DATETIME(3) columns come back as Date objects in UTC
      timezone: 'Z',
      ...(sslConfig ? { ssl: sslConfig } : {})
    });

    this.logger.log('Database pool initialized', { host, port, database, tls: Boolean(sslConfig) });
  }

  private buildSslConfig(): { rejectUnauthorized: boolean; ca?: string } | undefined {
    if (this.config.get<boolean>('DB_SSL') === false) {
      return undefined;
    }

    const rejectUnauthorized = this.config.get<boolean>('DB_SSL_REJECT_UNAUTHORIZED') !== false;
    if (!rejectUnauthorized) {
      this.logger.warn('DB TLS verification is disabled (DB_SSL_REJECT_UNAUTHORIZED=false)');
    }

    const caPath = this.config.get<string>('DB_SSL_CA_PATH');
    if (!caPath) {
      return { rejectUnauthorized };
    }

    try {
      return { rejectUnauthorized, ca: readFileSync(caPath, 'utf8') };
    } catch (error) {
      this.logger.warn('Failed to read DB SSL CA file; continuing without custom CA', {
        caPath,
        error: error instanceof Error ? error.message : String(error)
      });
      return { rejectUnauthorized };
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
    }
  }

  async getConnection(): Promise<PoolConnection> {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool.getConnection();
  }

  private static templateToSql(strings: TemplateStringsArray, valueCount: number): string {
    let sql = '';
    for (let i = 0; i < strings.length; i++) {
      sql += strings[i];
      if (i < valueCount) {
        sql += '?';
      }
    }
    return sql;
  }

  // Tagged-template SQL helper. Interpolations become prepared-statement parameters.
  // Usage: await db.sql`SELECT * FROM t WHERE id = ${id}`
  async sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    const sql = DatabaseService.templateToSql(strings, params.length);
    const connection = await this.getConnection();
    try {
      const [rows] = await connection.query(sql, params);
      return rows as T;
    } finally {
      connection.release();
    }
  }
}
