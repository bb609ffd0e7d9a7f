import {
	type ColumnDescriptor,
	Err,
	Ok,
	type QueryError,
	type QueryResultRow,
	type Result,
	SearchEngineError,
} from "@seedline/core";
import type { QueryResult } from "@seedline/engine";
import type { BulkDocument, BulkIndexer, BulkItemFailure } from "@seedline/search";
import type { RowSource } from "../loader";

// ---------------------------------------------------------------------------
// Row source
// ---------------------------------------------------------------------------

export interface FakeRowSource extends RowSource {
	readonly queries: string[];
	/** Rows handed out so far. */
	read: number;
	/** Times the row stream was closed. */
	closed: number;
}

export function fakeRowSource(
	columns: ReadonlyArray<ColumnDescriptor>,
	values: ReadonlyArray<ReadonlyArray<unknown>>,
	error?: QueryError,
): FakeRowSource {
	const source: FakeRowSource = {
		queries: [],
		read: 0,
		closed: 0,
		async execute(sql: string): Promise<Result<QueryResult, QueryError>> {
			source.queries.push(sql);
			if (error) return Err(error);
			return Ok({ columns, rows: stream() });
		},
	};

	async function* stream(): AsyncGenerator<QueryResultRow> {
		try {
			for (const rowValues of values) {
				source.read++;
				yield columns.map((column, i) => ({ column: column.name, value: rowValues[i] }));
			}
		} finally {
			source.closed++;
		}
	}

	return source;
}

export const ID_COLUMNS: ColumnDescriptor[] = [{ name: "id", type: "bigint" }];

/** `count` single-column rows with ids 0..count-1. */
export function idRows(count: number): number[][] {
	return Array.from({ length: count }, (_, i) => [i]);
}

// ---------------------------------------------------------------------------
// Indexer
// ---------------------------------------------------------------------------

export type BulkResponder = (
	documents: ReadonlyArray<BulkDocument>,
) => Result<BulkItemFailure[], SearchEngineError>;

/** Records submissions and answers them from a script; unscripted submissions succeed. */
export class FakeIndexer implements BulkIndexer {
	readonly submissions: Array<{ index: string; documents: BulkDocument[] }> = [];
	readonly refreshed: string[] = [];
	active = 0;
	maxActive = 0;
	private readonly script: BulkResponder[] = [];

	respond(...responders: BulkResponder[]): this {
		this.script.push(...responders);
		return this;
	}

	positions(): number[][] {
		return this.submissions.map((s) => s.documents.map((d) => d.position));
	}

	async submit(
		index: string,
		documents: ReadonlyArray<BulkDocument>,
	): Promise<Result<BulkItemFailure[], SearchEngineError>> {
		this.submissions.push({ index, documents: [...documents] });
		this.active++;
		this.maxActive = Math.max(this.maxActive, this.active);
		await new Promise((resolve) => setImmediate(resolve));
		this.active--;
		const next = this.script.shift();
		return next ? next(documents) : Ok([]);
	}

	async refresh(index: string): Promise<Result<void, SearchEngineError>> {
		this.refreshed.push(index);
		return Ok(undefined);
	}
}

export const unavailable: BulkResponder = () =>
	Err(new SearchEngineError("Bulk request failed with status 503", { transient: true, status: 503 }));

export const badRequest: BulkResponder = () =>
	Err(new SearchEngineError("Bulk request failed with status 400", { transient: false, status: 400 }));

/** Refuse the documents at the given offsets within the submitted batch. */
export function refuse(status: number, type: string, ...offsets: number[]): BulkResponder {
	return (documents) =>
		Ok(
			offsets.flatMap((offset) => {
				const document = documents[offset];
				return document
					? [{ document, status, transient: status === 429 || status >= 500, type, reason: "refused" }]
					: [];
			}),
		);
}

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

/** A clock that only moves when the loader sleeps. */
export function fakeClock(): { now: () => number; sleepFn: (ms: number) => Promise<void>; sleeps: number[] } {
	let time = 0;
	const sleeps: number[] = [];
	return {
		now: () => time,
		sleeps,
		sleepFn: async (ms) => {
			sleeps.push(ms);
			time += ms;
		},
	};
}
