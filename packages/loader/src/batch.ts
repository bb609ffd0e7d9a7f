import type { BulkDocument } from "@seedline/search";

/** Up to `batchSize` documents submitted to one index in a single bulk request. */
export interface BulkIndexBatch {
	readonly index: string;
	/** Zero-based position of this batch within the load. */
	readonly batchIndex: number;
	/** Source row position of the first document. */
	readonly firstRowPosition: number;
	readonly documents: ReadonlyArray<BulkDocument>;
}

/**
 * Groups documents into {@link BulkIndexBatch}es of a fixed size, in the
 * order they are added.
 */
export class BatchAccumulator {
	private pending: BulkDocument[] = [];
	private emitted = 0;

	constructor(
		private readonly index: string,
		private readonly batchSize: number,
	) {}

	/** Number of batches handed out so far. */
	get batchCount(): number {
		return this.emitted;
	}

	/** Add a document; returns the batch it completed, if any. */
	add(document: BulkDocument): BulkIndexBatch | undefined {
		this.pending.push(document);
		return this.pending.length >= this.batchSize ? this.take() : undefined;
	}

	/** Hand out the partially filled batch, if there is one. */
	flush(): BulkIndexBatch | undefined {
		return this.pending.length > 0 ? this.take() : undefined;
	}

	private take(): BulkIndexBatch {
		const documents = this.pending;
		this.pending = [];
		return {
			index: this.index,
			batchIndex: this.emitted++,
			firstRowPosition: documents[0]?.position ?? 0,
			documents,
		};
	}
}
