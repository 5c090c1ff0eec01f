import { createLogger } from "../logger";
import { errorMessage } from "../errors";

const log = createLogger("cursors");

export interface CursorPersistence {
	loadCursors(): Map<string, number>;
	saveCursors(cursors: Map<string, number>): void;
}

/**
 * "Last known post" per source, as the creation time (epoch seconds) of the
 * newest post fully handled. A source without a cursor starts at `startedAt`
 * so the first run never backfills history.
 */
export class CursorBook {
	private readonly cursors = new Map<string, number>();
	private readonly dirty = new Set<string>();

	constructor(
		private readonly startedAt: number,
		private readonly persistence?: CursorPersistence,
	) {}

	load(): void {
		if (!this.persistence) return;
		for (const [source, createdUtc] of this.persistence.loadCursors()) {
			this.cursors.set(source, createdUtc);
		}
	}

	get(source: string): number {
		return this.cursors.get(source) ?? this.startedAt;
	}

	set(source: string, createdUtc: number): void {
		if (this.cursors.get(source) === createdUtc) return;
		this.cursors.set(source, createdUtc);
		this.dirty.add(source);
	}

	flush(): boolean {
		if (!this.persistence || this.dirty.size === 0) return true;

		const changed = new Map<string, number>();
		for (const source of this.dirty) {
			changed.set(source, this.get(source));
		}

		try {
			this.persistence.saveCursors(changed);
		} catch (error) {
			log.error(`flush failed for ${changed.size} cursors: ${errorMessage(error)}`);
			return false;
		}
		this.dirty.clear();
		return true;
	}
}
