import { CacheStats } from '@/types';

export interface CacheEntry<T> {
	readonly value: T;
	readonly computedAt: number;
}

export interface CacheLookup<T> {
	value: T;
	hit: boolean;
}

/**
 * One-slot cache for a derived view with a fixed time-to-live.
 *
 * Concurrent misses share a single in-flight computation, so `compute` never
 * runs twice at once and the slot is only ever replaced as a whole. A rejected
 * computation stores nothing and is handed to every caller that waited on it.
 */
export class DerivedViewCache<T> {
	private entry: CacheEntry<T> | undefined;
	private inflight: Promise<T> | undefined;
	private hits = 0;
	private misses = 0;

	constructor(readonly ttlMs: number) {
		if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
			throw new RangeError(`ttlMs must be a positive number, got ${ttlMs}`);
		}
	}

	async getOrCompute(now: number, compute: () => Promise<T>, shouldStore: (value: T) => boolean = () => true): Promise<T> {
		return (await this.lookup(now, compute, shouldStore)).value;
	}

	/** Same as {@link getOrCompute}, also reporting whether the slot served the call. */
	async lookup(now: number, compute: () => Promise<T>, shouldStore: (value: T) => boolean = () => true): Promise<CacheLookup<T>> {
		if (this.entry !== undefined && now - this.entry.computedAt < this.ttlMs) {
			this.hits++;
			return { value: this.entry.value, hit: true };
		}

		this.misses++;
		if (this.inflight) {
			return { value: await this.inflight, hit: false };
		}

		const pending = (async (): Promise<T> => {
			const value = await compute();
			if (shouldStore(value)) {
				this.entry = { value, computedAt: now };
			}
			return value;
		})();

		this.inflight = pending;
		try {
			return { value: await pending, hit: false };
		} finally {
			if (this.inflight === pending) {
				this.inflight = undefined;
			}
		}
	}

	peek(): CacheEntry<T> | undefined {
		return this.entry;
	}

	clear(): void {
		this.entry = undefined;
	}

	stats(): CacheStats {
		return {
			hits: this.hits,
			misses: this.misses,
			computedAt: this.entry ? new Date(this.entry.computedAt).toISOString() : null,
			ttlMs: this.ttlMs,
		};
	}
}
