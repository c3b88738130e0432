import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;
  private readonly dbConnectMaxRetries: number;
  private readonly dbConnectInitialDelayMs: number;
  private readonly dbConnectMaxDelayMs: number;
  private readonly slowQueryMs: number;

  constructor(config: ConfigService) {
    this.dbConnectMaxRetries = this.parseIntegerEnv(
      config.get<string>('DB_CONNECT_MAX_RETRIES'),
      8,
      { min: 0 },
    );
    this.dbConnectInitialDelayMs = this.parseIntegerEnv(
      config.get<string>('DB_CONNECT_INITIAL_DELAY_MS'),
      500,
      { min: 1 },
    );
    this.dbConnectMaxDelayMs = this.parseIntegerEnv(
      config.get<string>('DB_CONNECT_MAX_DELAY_MS'),
      10_000,
      { min: 1 },
    );
    this.slowQueryMs = this.parseIntegerEnv(
      config.get<string>('DB_SLOW_QUERY_MS'),
      200,
      { min: 0 },
    );

    this.pool = new Pool({
      connectionString: config.get<string>('DATABASE_URL'),
      max: this.parseIntegerEnv(config.get<string>('DB_POOL_MAX'), 10, {
        min: 1,
      }),
    });
    this.pool.on('error', (error) => {
      this.logger.error('Idle database client failed', error.stack);
    });
  }

  async onModuleInit() {
    const maxAttempts = this.dbConnectMaxRetries + 1;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const client = await this.pool.connect();
        client.release();
        if (attempt > 1) {
          this.logger.log(`Connected to database after ${attempt} attempt(s).`);
        }
        return;
      } catch (error) {
        if (attempt >= maxAttempts) {
          this.logger.error(
            `Database connection failed after ${maxAttempts} attempt(s).`,
            error instanceof Error ? error.stack : String(error),
          );
          throw error;
        }

        const delayMs = this.computeBackoffDelayMs(attempt);
        this.logger.warn(
          `Database connection attempt ${attempt}/${maxAttempts} failed. Retrying in ${delayMs}ms...`,
        );
        await this.sleep(delayMs);
      }
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  async query<T extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    const startedAt = Date.now();
    const result = await this.pool.query<T>(text, params);
    const duration = Date.now() - startedAt;
    if (duration >= this.slowQueryMs) {
      const statement = text.replace(/\s+/g, ' ').trim();
      this.logger.warn(
        `Slow query: ${duration}ms :: ${statement.length > 200 ? `${statement.slice(0, 200)}…` : statement}`,
      );
    }
    return result;
  }

  private computeBackoffDelayMs(attempt: number): number {
    const exponential = this.dbConnectInitialDelayMs * 2 ** (attempt - 1);
    return Math.min(exponential, this.dbConnectMaxDelayMs);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }

  private parseIntegerEnv(
    raw: string | undefined,
    fallback: number,
    opts: { min?: number; max?: number } = {},
  ): number {
    const value = Number.parseInt(raw ?? '', 10);
    if (!Number.isFinite(value)) return fallback;

    const min = opts.min ?? Number.MIN_SAFE_INTEGER;
    const max = opts.max ?? Number.MAX_SAFE_INTEGER;
    if (value < min || value > max) return fallback;
    return value;
  }
}
