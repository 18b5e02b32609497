import { mkdirSync } from 'fs';
import { dirname } from 'path';

import { Logger, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';

import { Currency, isSupportedCurrency } from '../../common';
import { AveragedRate, NewAveragedRate } from '../averaged-rate.interface';
import { StorageException } from '../exceptions';
import { RateStore } from './rate-store.interface';

const IN_MEMORY_PATH = ':memory:';

interface AverageRateRow {
  id: number;
  currency: string;
  buy_rate: number;
  sell_rate: number;
  timestamp: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS average_rates (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    currency TEXT NOT NULL,
    buy_rate REAL NOT NULL,
    sell_rate REAL NOT NULL,
    timestamp INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_average_rates_currency_timestamp
    ON average_rates (currency, timestamp);
`;

/** better-sqlite3 backed store. Timestamps are stored as epoch milliseconds. */
export class SqliteRateStore implements RateStore, OnModuleDestroy {
  private readonly logger = new Logger(SqliteRateStore.name);
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement<
    [string, number, number, number]
  >;
  private readonly recentStatement: Database.Statement<
    [string, number],
    AverageRateRow
  >;
  private readonly sinceStatement: Database.Statement<
    [string, number],
    AverageRateRow
  >;

  constructor(filePath: string) {
    if (filePath !== IN_MEMORY_PATH) {
      mkdirSync(dirname(filePath), { recursive: true });
    }

    this.db = new Database(filePath);
    if (filePath !== IN_MEMORY_PATH) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);

    this.insertStatement = this.db.prepare<[string, number, number, number]>(
      'INSERT INTO average_rates (currency, buy_rate, sell_rate, timestamp) VALUES (?, ?, ?, ?)',
    );
    this.recentStatement = this.db.prepare<[string, number], AverageRateRow>(
      'SELECT id, currency, buy_rate, sell_rate, timestamp FROM average_rates WHERE currency = ? ORDER BY timestamp DESC, id DESC LIMIT ?',
    );
    this.sinceStatement = this.db.prepare<[string, number], AverageRateRow>(
      'SELECT id, currency, buy_rate, sell_rate, timestamp FROM average_rates WHERE currency = ? AND timestamp >= ? ORDER BY timestamp ASC, id ASC',
    );

    this.logger.log({ filePath }, 'Rate store opened');
  }

  onModuleDestroy(): void {
    this.close();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  async append(rate: NewAveragedRate): Promise<AveragedRate> {
    const timestamp = rate.timestamp.getTime();
    const result = this.run('append a rate', () =>
      this.insertStatement.run(rate.currency, rate.buyRate, rate.sellRate, timestamp),
    );

    return {
      id: Number(result.lastInsertRowid),
      currency: rate.currency,
      buyRate: rate.buyRate,
      sellRate: rate.sellRate,
      timestamp: new Date(timestamp),
    };
  }

  async findRecent(currency: Currency, limit: number): Promise<AveragedRate[]> {
    const rows = this.run('read recent rates', () =>
      this.recentStatement.all(currency, limit),
    );
    return rows.map(toAveragedRate);
  }

  async findSince(currency: Currency, since: Date): Promise<AveragedRate[]> {
    const rows = this.run('read rates since a timestamp', () =>
      this.sinceStatement.all(currency, since.getTime()),
    );
    return rows.map(toAveragedRate);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageException(operation, error);
    }
  }
}

function toAveragedRate(row: AverageRateRow): AveragedRate {
  if (!isSupportedCurrency(row.currency)) {
    throw new StorageException(
      'map a stored row',
      new Error(`Unexpected currency ${row.currency} in row ${row.id}`),
    );
  }

  return {
    id: row.id,
    currency: row.currency,
    buyRate: row.buy_rate,
    sellRate: row.sell_rate,
    timestamp: new Date(row.timestamp),
  };
}
