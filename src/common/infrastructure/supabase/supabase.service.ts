import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ConnectionOptions as TlsConnectionOptions } from 'node:tls';
import { Pool, QueryResultRow } from 'pg';
import { loadOtpConfig, readPositiveInt } from '../../config/otp.config';

/**
 * Thin wrapper over a pg pool pointed at the Supabase Postgres database.
 * The pool is only created when a connection string is configured.
 */
@Injectable()
export class SupabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(SupabaseService.name);
  private pool?: Pool;

  constructor(private readonly configService: ConfigService) {
    const { primaryStoreUrl, primaryStoreCredential } = loadOtpConfig(
      this.configService,
    );

    if (!primaryStoreUrl) {
      this.logger.warn(
        'No database connection configured (SUPABASE_DB_URL or POSTGRES_URL). Supabase storage disabled.',
      );
      return;
    }

    const poolSize = readPositiveInt(
      this.configService.get<string>('SUPABASE_DB_POOL_SIZE'),
      5,
    );

    try {
      this.pool = new Pool({
        connectionString: buildConnectionString(
          primaryStoreUrl,
          primaryStoreCredential,
        ),
        max: poolSize,
        idleTimeoutMillis: 10_000,
        connectionTimeoutMillis: 5_000,
        ssl: this.buildSslConfig(),
      });
      this.pool.on('error', (error) => {
        this.logger.error(`Idle database client error: ${error.message}`);
      });
    } catch (error) {
      this.logger.error(
        `Could not create database pool: ${(error as Error).message}`,
      );
      this.pool = undefined;
    }
  }

  isEnabled(): boolean {
    return Boolean(this.pool);
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    if (!this.pool) {
      throw new Error('Supabase pool is not initialized');
    }

    try {
      const result = await this.pool.query<T>(sql, params);
      return result.rows;
    } catch (error) {
      const safeError = error as Error;
      this.logger.error(
        `Query failed: ${safeError.message ?? 'unknown error'}`,
      );
      throw safeError;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool?.end();
  }

  private buildSslConfig(): TlsConnectionOptions {
    const inlineCert = this.configService.get<string>('SUPABASE_DB_CA_CERT');
    if (inlineCert) {
      return {
        ca: inlineCert.replace(/\\n/g, '\n'),
        rejectUnauthorized: true,
      };
    }

    const allowSelfSigned = this.configService.get<string>(
      'SUPABASE_DB_ALLOW_SELF_SIGNED',
      'true',
    );
    if (allowSelfSigned === 'true') {
      this.logger.warn(
        'SUPABASE_DB_ALLOW_SELF_SIGNED=true: untrusted certificates are accepted (development only).',
      );
      return { rejectUnauthorized: false };
    }

    return { rejectUnauthorized: true };
  }
}

/**
 * Puts the credential into the connection URL when the URL carries none, and
 * drops `sslmode` so pg keeps the TLS options built above.
 */
export function buildConnectionString(
  rawUrl: string,
  credential?: string,
): string {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return rawUrl;
  }

  if (credential && !url.password) {
    url.password = credential;
  }

  url.searchParams.delete('sslmode');
  return url.toString();
}
