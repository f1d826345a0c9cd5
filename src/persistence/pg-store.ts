/**
 * PgTradeStore: SignalStore and BarStore over PostgreSQL.
 *
 * Prices are DOUBLE PRECISION columns and become Decimals on read. Every row
 * is validated before it reaches the domain; a malformed row throws a
 * ValidationError.
 */

import type { Logger } from "../lib/logger/index.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	type BarRecord,
	type NewBar,
	type NewSignal,
	type PendingSignalQuery,
	type SignalRecord,
	SignalStatus,
	type TerminalStatus,
	type TradeStore,
} from "./types.js";

/** The slice of a `pg` Pool the store needs. */
export interface Queryable {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PgPool extends Queryable {
	end(): Promise<void>;
}

export interface PgTradeStoreConfig {
	readonly pool: PgPool;
	readonly logger: Logger;
}

export const SCHEMA_SQL = [
	`CREATE TABLE IF NOT EXISTS trade_signals (
		id SERIAL PRIMARY KEY,
		timestamp TEXT NOT NULL,
		action TEXT NOT NULL,
		symbol TEXT NOT NULL,
		side TEXT NOT NULL,
		price DOUBLE PRECISION NOT NULL,
		leverage DOUBLE PRECISION NOT NULL DEFAULT 1,
		executed SMALLINT NOT NULL DEFAULT 0,
		created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
	)`,
	"CREATE INDEX IF NOT EXISTS trade_signals_pending_idx ON trade_signals (executed, id)",
	`CREATE TABLE IF NOT EXISTS hourly_candles (
		id SERIAL PRIMARY KEY,
		timestamp TIMESTAMPTZ NOT NULL UNIQUE,
		open DOUBLE PRECISION NOT NULL,
		high DOUBLE PRECISION NOT NULL,
		low DOUBLE PRECISION NOT NULL,
		close DOUBLE PRECISION NOT NULL,
		volume DOUBLE PRECISION NOT NULL
	)`,
] as const;

const SIGNAL_COLUMNS = "id, timestamp, action, symbol, side, price, leverage, executed, created_at";
const BAR_COLUMNS = "id, timestamp, open, high, low, close, volume";

const decimalColumn = z.union([z.number().finite(), z.string()]).transform((v, ctx) => {
	const value = Decimal.tryFrom(v);
	if (value === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a number" });
		return z.NEVER;
	}
	return value;
});

const statusColumn = z.union([
	z.literal(SignalStatus.Pending),
	z.literal(SignalStatus.Executed),
	z.literal(SignalStatus.Failed),
]);

const signalRowSchema = z.object({
	id: z.number().int(),
	timestamp: z.string(),
	action: z.string(),
	symbol: z.string(),
	side: z.string(),
	price: decimalColumn,
	leverage: z.number().finite().nullable(),
	executed: z.coerce.number().pipe(statusColumn),
	created_at: z.coerce.date(),
});

const barRowSchema = z.object({
	id: z.number().int(),
	timestamp: z.coerce.date(),
	open: decimalColumn,
	high: decimalColumn,
	low: decimalColumn,
	close: decimalColumn,
	volume: decimalColumn,
});

function parseSignal(row: unknown): Result<SignalRecord, ValidationError> {
	const parsed = validate(signalRowSchema, row, "trade_signals row");
	if (!parsed.ok) return err(parsed.error);
	const { executed, created_at, leverage, ...rest } = parsed.value;
	return ok({ ...rest, leverage: leverage ?? 1, status: executed, createdAt: created_at });
}

function toSignal(row: unknown): SignalRecord {
	const parsed = parseSignal(row);
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

function rowId(row: unknown): unknown {
	return typeof row === "object" && row !== null && "id" in row ? row.id : undefined;
}

function toBar(row: unknown): BarRecord {
	const parsed = validate(barRowSchema, row, "hourly_candles row");
	if (!parsed.ok) throw parsed.error;
	return { ...parsed.value, timestamp: parsed.value.timestamp.toISOString() };
}

export class PgTradeStore implements TradeStore {
	private readonly pool: PgPool;
	private readonly logger: Logger;

	constructor(config: PgTradeStoreConfig) {
		this.pool = config.pool;
		this.logger = config.logger.child({ component: "pg-store" });
	}

	/** Creates the tables when missing. */
	async ensureSchema(): Promise<void> {
		for (const statement of SCHEMA_SQL) {
			await this.pool.query(statement);
		}
		this.logger.info("schema ready");
	}

	async insertSignal(signal: NewSignal): Promise<SignalRecord> {
		const { rows } = await this.pool.query(
			`INSERT INTO trade_signals (timestamp, action, symbol, side, price, leverage)
			VALUES ($1, $2, $3, $4, $5, $6)
			RETURNING ${SIGNAL_COLUMNS}`,
			[signal.timestamp, signal.action, signal.symbol, signal.side, signal.price.toString(), signal.leverage ?? 1],
		);
		const record = toSignal(rows[0]);
		this.logger.info({ id: record.id, action: record.action, side: record.side }, "signal inserted");
		return record;
	}

	async fetchPendingSignals(query?: PendingSignalQuery): Promise<SignalRecord[]> {
		const since = query?.createdSince ?? null;
		const { rows } = await this.pool.query(
			`SELECT ${SIGNAL_COLUMNS} FROM trade_signals
			WHERE executed = $1 AND ($2::timestamptz IS NULL OR created_at >= $2)
			ORDER BY id ASC`,
			[SignalStatus.Pending, since],
		);
		const signals: SignalRecord[] = [];
		for (const row of rows) {
			const parsed = parseSignal(row);
			if (parsed.ok) {
				signals.push(parsed.value);
			} else {
				// the row stays pending; it is reported on every read until repaired
				this.logger.error({ err: parsed.error, id: rowId(row) }, "malformed pending signal skipped");
			}
		}
		return signals;
	}

	async getSignal(id: number): Promise<SignalRecord | null> {
		const { rows } = await this.pool.query(`SELECT ${SIGNAL_COLUMNS} FROM trade_signals WHERE id = $1`, [id]);
		return rows.length === 0 ? null : toSignal(rows[0]);
	}

	async markSignalStatus(id: number, status: TerminalStatus): Promise<boolean> {
		const { rows } = await this.pool.query(
			"UPDATE trade_signals SET executed = $2 WHERE id = $1 AND executed = 0 RETURNING id",
			[id, status],
		);
		return rows.length > 0;
	}

	async hasPendingOpenSignal(symbol: string): Promise<boolean> {
		const { rows } = await this.pool.query(
			"SELECT 1 FROM trade_signals WHERE action = 'open' AND symbol = $1 AND executed = 0 LIMIT 1",
			[symbol],
		);
		return rows.length > 0;
	}

	async consumePendingOpenSignals(symbol: string): Promise<number> {
		const { rowCount } = await this.pool.query(
			"UPDATE trade_signals SET executed = 1 WHERE action = 'open' AND symbol = $1 AND executed = 0",
			[symbol],
		);
		return rowCount ?? 0;
	}

	async latestOpenSignal(symbol: string): Promise<SignalRecord | null> {
		const { rows } = await this.pool.query(
			`SELECT ${SIGNAL_COLUMNS} FROM trade_signals
			WHERE action = 'open' AND symbol = $1
			ORDER BY id DESC LIMIT 1`,
			[symbol],
		);
		return rows.length === 0 ? null : toSignal(rows[0]);
	}

	async pruneSignalsBefore(cutoff: Date): Promise<number> {
		const { rowCount } = await this.pool.query("DELETE FROM trade_signals WHERE created_at < $1", [cutoff]);
		return rowCount ?? 0;
	}

	async insertBar(bar: NewBar): Promise<boolean> {
		const { rows } = await this.pool.query(
			`INSERT INTO hourly_candles (timestamp, open, high, low, close, volume)
			VALUES ($1, $2, $3, $4, $5, $6)
			ON CONFLICT (timestamp) DO NOTHING
			RETURNING id`,
			[
				bar.timestamp,
				bar.open.toString(),
				bar.high.toString(),
				bar.low.toString(),
				bar.close.toString(),
				bar.volume.toString(),
			],
		);
		return rows.length > 0;
	}

	async nextBarAfter(lastId: number | null): Promise<BarRecord | null> {
		const { rows } = await this.pool.query(
			`SELECT ${BAR_COLUMNS} FROM hourly_candles
			WHERE $1::integer IS NULL OR id > $1
			ORDER BY id ASC LIMIT 1`,
			[lastId],
		);
		return rows.length === 0 ? null : toBar(rows[0]);
	}

	async latestBar(): Promise<BarRecord | null> {
		const { rows } = await this.pool.query(`SELECT ${BAR_COLUMNS} FROM hourly_candles ORDER BY id DESC LIMIT 1`);
		return rows.length === 0 ? null : toBar(rows[0]);
	}

	async pruneBarsBefore(cutoff: Date): Promise<number> {
		const { rowCount } = await this.pool.query("DELETE FROM hourly_candles WHERE timestamp < $1", [cutoff]);
		return rowCount ?? 0;
	}

	async close(): Promise<void> {
		await this.pool.end();
	}
}
