/**
 * Small seeded PRNG (mulberry32). Two instances built from the same seed
 * produce the same sequence.
 */
export class SeededRandom {
	private state: number;

	constructor(seed: number) {
		this.state = seed >>> 0;
	}

	/** Next float in `[0, 1)`. */
	next(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let t = this.state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}

	/** Integer in `[min, max]`. */
	int(min: number, max: number): number {
		return min + Math.floor(this.next() * (max - min + 1));
	}

	/** Amount in `[min, max]` rounded to cents. */
	amount(min: number, max: number): number {
		return Math.round((min + this.next() * (max - min)) * 100) / 100;
	}

	/** Uniformly chosen element. */
	pick<T>(items: ReadonlyArray<T>): T {
		const item = items[this.int(0, items.length - 1)];
		if (item === undefined) {
			throw new RangeError("Cannot pick from an empty list");
		}
		return item;
	}
}

/** FNV-1a hash of a string, used to derive per-table seeds. */
export function seedFor(text: string): number {
	let h = 0x811c9dc5;
	for (let i = 0; i < text.length; i++) {
		h ^= text.charCodeAt(i);
		h = Math.imul(h, 0x01000193);
	}
	return h >>> 0;
}
