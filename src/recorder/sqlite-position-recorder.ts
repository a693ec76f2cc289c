import { Logger, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { CloseStatus } from '../executor/arbitrage-order';
import { isExchangeId } from '../exchanges/exchange.interface';
import { CloseRecord, OpenRecord, PositionRecorder, TradeRecord } from './position-recorder';

interface TradeRow {
  id: number;
  exchange: string;
  symbol: string;
  order_time: number;
  open_price: number;
  quantity: number;
  leverage: number;
  direction: string;
  order_id: string;
  margin_amount: number | null;
  close_price: number | null;
  close_order_id: string | null;
  close_order_status: string;
  close_time: number | null;
  pnl_amount: number | null;
}

interface OpenParams {
  exchange: string;
  symbol: string;
  orderTime: number;
  openPrice: number;
  quantity: number;
  leverage: number;
  direction: string;
  orderId: string;
  marginAmount: number | null;
}

interface CloseParams {
  id: number;
  closePrice: number | null;
  closeOrderId: string | null;
  closeStatus: string;
  closeTime: number;
  pnlAmount: number | null;
}

const CLOSE_STATUSES: readonly (CloseStatus | 'OPEN')[] = ['OPEN', 'NONE', 'PENDING', 'FILLED', 'CANCELLED', 'STOP_TRIGGERED'];

const toCloseStatus = (value: string): CloseStatus | 'OPEN' => CLOSE_STATUSES.find((status) => status === value) ?? 'OPEN';

/**
 * `trading_records` table on SQLite. The (exchange, symbol, order_time) key
 * makes repeated opens idempotent.
 */
export class SqlitePositionRecorder extends PositionRecorder implements OnModuleDestroy {
  private readonly logger = new Logger(SqlitePositionRecorder.name);
  private readonly db: Database.Database;

  constructor(databasePath: string) {
    super();
    if (databasePath !== ':memory:') {
      const dir = path.dirname(databasePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trading_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        exchange TEXT NOT NULL,
        symbol TEXT NOT NULL,
        order_time INTEGER NOT NULL,
        open_price REAL NOT NULL,
        quantity REAL NOT NULL,
        leverage INTEGER NOT NULL,
        direction TEXT NOT NULL CHECK (direction IN ('long','short')),
        order_id TEXT NOT NULL,
        margin_amount REAL,
        close_price REAL,
        close_order_id TEXT,
        close_order_status TEXT NOT NULL DEFAULT 'OPEN',
        close_time INTEGER,
        pnl_amount REAL,
        created_at INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
        UNIQUE (exchange, symbol, order_time)
      );

      CREATE INDEX IF NOT EXISTS idx_trading_records_symbol ON trading_records(exchange, symbol);
    `);
    this.addColumnIfMissing('pnl_amount', 'REAL');
  }

  /** Brings a database created before a column existed up to date. */
  private addColumnIfMissing(column: string, type: string): void {
    const columns = this.db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('trading_records')")
      .all();
    if (!columns.some((c) => c.name === column)) {
      this.db.exec(`ALTER TABLE trading_records ADD COLUMN ${column} ${type}`);
    }
  }

  async recordOpen(record: OpenRecord): Promise<number> {
    const insert = this.db.prepare<OpenParams>(`
      INSERT INTO trading_records
        (exchange, symbol, order_time, open_price, quantity, leverage, direction, order_id, margin_amount)
      VALUES
        (@exchange, @symbol, @orderTime, @openPrice, @quantity, @leverage, @direction, @orderId, @marginAmount)
      ON CONFLICT (exchange, symbol, order_time) DO NOTHING
    `);
    const result = insert.run({
      exchange: record.exchange,
      symbol: record.symbol,
      orderTime: record.openTime,
      openPrice: record.openPrice,
      quantity: record.quantity,
      leverage: record.leverage,
      direction: record.direction,
      orderId: record.orderId,
      marginAmount: record.marginAmount ?? null,
    });

    const row = this.db
      .prepare<[string, string, number], { id: number }>(
        'SELECT id FROM trading_records WHERE exchange = ? AND symbol = ? AND order_time = ?',
      )
      .get(record.exchange, record.symbol, record.openTime);
    if (!row) {
      throw new Error(`trading_records row missing for ${record.exchange}:${record.symbol}@${record.openTime}`);
    }
    if (result.changes === 0) {
      this.logger.warn(`Duplicate open ignored for ${record.exchange}:${record.symbol}@${record.openTime}, id ${row.id}`);
    }
    return row.id;
  }

  async recordClose(recordId: number, record: CloseRecord): Promise<void> {
    const result = this.db
      .prepare<CloseParams>(`
        UPDATE trading_records
        SET close_price = @closePrice,
            close_order_id = @closeOrderId,
            close_order_status = @closeStatus,
            close_time = @closeTime,
            pnl_amount = @pnlAmount
        WHERE id = @id
      `)
      .run({
        id: recordId,
        closePrice: record.closePrice,
        closeOrderId: record.closeOrderId,
        closeStatus: record.closeStatus,
        closeTime: record.closeTime,
        pnlAmount: record.pnlAmount,
      });
    if (result.changes === 0) {
      throw new Error(`No trading record with id ${recordId}`);
    }
  }

  async findById(recordId: number): Promise<TradeRecord | undefined> {
    const row = this.db.prepare<[number], TradeRow>('SELECT * FROM trading_records WHERE id = ?').get(recordId);
    return row ? this.toRecord(row) : undefined;
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM trading_records').get();
    return row?.total ?? 0;
  }

  onModuleDestroy(): void {
    this.db.close();
  }

  private toRecord(row: TradeRow): TradeRecord {
    if (!isExchangeId(row.exchange)) {
      throw new Error(`Unknown exchange '${row.exchange}' in trading_records row ${row.id}`);
    }
    return {
      id: row.id,
      exchange: row.exchange,
      symbol: row.symbol,
      openTime: row.order_time,
      openPrice: row.open_price,
      quantity: row.quantity,
      leverage: row.leverage,
      direction: row.direction === 'long' ? 'long' : 'short',
      orderId: row.order_id,
      marginAmount: row.margin_amount ?? undefined,
      closePrice: row.close_price,
      closeOrderId: row.close_order_id,
      closeStatus: toCloseStatus(row.close_order_status),
      closeTime: row.close_time,
      pnlAmount: row.pnl_amount,
    };
  }
}
