import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import type { SeenEntry } from "../types";

const log = createLogger("seen");

export interface SeenPersistence {
	loadSeen(): SeenEntry[];
	saveSeen(upserts: SeenEntry[], deletions: string[]): void;
}

/**
 * Time-windowed set of post ids that have already been processed.
 *
 * The in-memory map is authoritative. Changes are queued and written to the
 * optional persistence layer on flush(); a failed flush keeps the queue so the
 * next flush retries it.
 *
 * Every method is synchronous, so concurrent per-post tasks on the event loop
 * cannot interleave inside a record() or an evict() sweep.
 */
export class SeenPostStore {
	private readonly entries = new Map<string, number>();
	private readonly pendingUpserts = new Set<string>();
	private readonly pendingDeletes = new Set<string>();

	constructor(private readonly persistence?: SeenPersistence) {}

	get size(): number {
		return this.entries.size;
	}

	/** Replaces in-memory state with what the persistence layer holds. */
	load(): number {
		if (!this.persistence) return 0;
		this.entries.clear();
		for (const entry of this.persistence.loadSeen()) {
			this.entries.set(entry.id, entry.seenAt);
		}
		return this.entries.size;
	}

	has(id: string): boolean {
		return this.entries.has(id);
	}

	seenAt(id: string): number | undefined {
		return this.entries.get(id);
	}

	/** Inserts or refreshes `id`. Last timestamp wins. */
	record(id: string, timestamp: number): void {
		this.entries.set(id, timestamp);
		this.pendingDeletes.delete(id);
		this.pendingUpserts.add(id);
	}

	/** Drops `id` so the post becomes eligible for processing again. */
	forget(id: string): void {
		if (!this.entries.delete(id)) return;
		this.pendingUpserts.delete(id);
		this.pendingDeletes.add(id);
	}

	/**
	 * Removes every entry older than `retentionMs` at `now`.
	 * Entries exactly `retentionMs` old are kept. Returns the number removed.
	 */
	evict(now: number, retentionMs: number): number {
		let removed = 0;
		for (const [id, seenAt] of this.entries) {
			if (now - seenAt > retentionMs) {
				this.entries.delete(id);
				this.pendingUpserts.delete(id);
				this.pendingDeletes.add(id);
				removed++;
			}
		}
		return removed;
	}

	/**
	 * Writes queued changes. Upserts for ids in `holdBack` stay queued for a
	 * later flush. Returns false (and keeps the queue) on failure.
	 */
	flush(holdBack: ReadonlySet<string> = new Set()): boolean {
		if (!this.persistence) return true;

		const upserts: SeenEntry[] = [];
		for (const id of this.pendingUpserts) {
			const seenAt = this.entries.get(id);
			if (seenAt !== undefined && !holdBack.has(id)) upserts.push({ id, seenAt });
		}
		const deletions = [...this.pendingDeletes];
		if (upserts.length === 0 && deletions.length === 0) return true;

		try {
			this.persistence.saveSeen(upserts, deletions);
		} catch (error) {
			log.error(`flush failed (${upserts.length} upserts, ${deletions.length} deletions pending): ${errorMessage(error)}`);
			return false;
		}

		for (const { id } of upserts) this.pendingUpserts.delete(id);
		for (const id of deletions) this.pendingDeletes.delete(id);
		return true;
	}
}
