import fs from 'fs';
import path from 'path';
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from 'sql.js';
import { z } from 'zod';
import { AnalysisResult, AppendOutcome, HistoricalRecord } from '../types';
import { Logger } from '../utils/logger';

export const IN_MEMORY = ':memory:';

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS trade_results (
    timestamp INTEGER NOT NULL,
    league TEXT NOT NULL,
    strategy_name TEXT NOT NULL,
    profit_per_flip REAL,
    profit_per_hour_est REAL,
    profit_with_corruption_ev REAL,
    risk_profile TEXT,
    liquidity_score REAL,
    long_term INTEGER,
    PRIMARY KEY (timestamp, strategy_name, league)
  )
`;

const INSERT_RESULT = `
  INSERT INTO trade_results (
    timestamp, league, strategy_name, profit_per_flip, profit_per_hour_est,
    profit_with_corruption_ev, risk_profile, liquidity_score, long_term
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

const rowSchema = z.object({
  timestamp: z.number(),
  league: z.string(),
  strategy_name: z.string(),
  profit_per_flip: z.number().nullable(),
  profit_per_hour_est: z.number().nullable(),
  profit_with_corruption_ev: z.number().nullable(),
  risk_profile: z.string().nullable(),
  liquidity_score: z.number().nullable(),
  long_term: z.number().nullable(),
});

const countSchema = z.object({ total: z.number() });

const toRecord = (row: z.infer<typeof rowSchema>): HistoricalRecord => ({
  timestamp: new Date(row.timestamp * 1000),
  league: row.league,
  strategyName: row.strategy_name,
  profitPerFlip: row.profit_per_flip ?? 0,
  profitPerHourEst: row.profit_per_hour_est ?? 0,
  profitWithCorruptionEv: row.profit_with_corruption_ev,
  riskProfile: row.risk_profile ?? 'None',
  liquidityScore: row.liquidity_score,
  longTerm: row.long_term === 1,
});

const isConstraintViolation = (error: unknown) =>
  error instanceof Error && error.message.includes('constraint failed');

let engine: Promise<SqlJsStatic> | undefined;
const loadEngine = () => (engine ??= initSqlJs());

/**
 * Insert-only log of ranked results, one row per (timestamp, strategy, league).
 * The database lives in memory and is written back to `filename` after each append.
 */
export class HistoryStore {
  private constructor(
    private db: Database,
    private filename: string,
    private logger: Logger,
  ) {}

  static async open(filename: string, logger: Logger): Promise<HistoryStore> {
    const SQL = await loadEngine();
    let data: Buffer | undefined;
    if (filename !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
      try {
        data = fs.readFileSync(filename);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
      }
    }
    const store = new HistoryStore(new SQL.Database(data), filename, logger);
    store.db.run(CREATE_TABLE);
    logger.debug('History store ready', { filename });
    return store;
  }

  /** Stamps the batch with one epoch-second timestamp; duplicate keys are skipped. */
  async append(results: readonly AnalysisResult[], league: string, now = Date.now()): Promise<AppendOutcome> {
    if (results.length === 0) {
      this.logger.info('No results to log to database');
      return { inserted: 0, duplicates: 0 };
    }

    const timestamp = Math.floor(now / 1000);
    let inserted = 0;
    let duplicates = 0;
    for (const result of results) {
      try {
        this.db.run(INSERT_RESULT, [
          timestamp,
          league,
          result.strategyName,
          result.profitPerFlip,
          result.profitPerHourEst,
          result.profitWithCorruptionEv ?? null,
          result.riskProfile,
          result.liquidityScore ?? null,
          result.longTerm ? 1 : 0,
        ]);
        inserted += 1;
      } catch (error) {
        if (!isConstraintViolation(error)) throw error;
        duplicates += 1;
        this.logger.debug('Duplicate entry, skipping', { strategy: result.strategyName, timestamp });
      }
    }

    if (inserted > 0) await this.persist();
    if (duplicates > 0) {
      this.logger.warn('Skipped duplicate entries', { duplicates });
    }
    this.logger.info('Database insert completed', { inserted, league });
    return { inserted, duplicates };
  }

  async query(strategyName: string, league: string): Promise<HistoricalRecord[]> {
    const rows = this.all(
      'SELECT * FROM trade_results WHERE strategy_name = ? AND league = ? ORDER BY timestamp',
      [strategyName, league],
    );
    return z.array(rowSchema).parse(rows).map(toRecord);
  }

  async count(): Promise<number> {
    const [row] = this.all('SELECT COUNT(*) AS total FROM trade_results');
    return countSchema.parse(row).total;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private async persist() {
    if (this.filename === IN_MEMORY) return;
    await fs.promises.writeFile(this.filename, this.db.export());
  }

  private all(sql: string, params: SqlValue[] = []): Record<string, SqlValue>[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Record<string, SqlValue>[] = [];
      while (statement.step()) rows.push(statement.getAsObject());
      return rows;
    } finally {
      statement.free();
    }
  }
}
