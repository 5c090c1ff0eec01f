import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import type { SeenEntry } from "./types";

interface SeenRow {
	id: string;
	seen_at: number;
}

interface CursorRow {
	source: string;
	created_utc: number;
}

/**
 * SQLite-backed storage for seen post ids and per-source cursors.
 * Pass ":memory:" for a throwaway database.
 */
export interface Storage {
	loadSeen(): SeenEntry[];
	saveSeen(upserts: SeenEntry[], deletions: string[]): void;
	loadCursors(): Map<string, number>;
	saveCursors(cursors: Map<string, number>): void;
	close(): void;
}

function initSchema(database: Database.Database): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS seen_posts (
			id TEXT PRIMARY KEY,
			seen_at INTEGER NOT NULL
		);

		CREATE INDEX IF NOT EXISTS idx_seen_posts_seen_at ON seen_posts(seen_at);

		CREATE TABLE IF NOT EXISTS cursors (
			source TEXT PRIMARY KEY,
			created_utc INTEGER NOT NULL,
			updated_at TEXT DEFAULT CURRENT_TIMESTAMP
		);
	`);
}

export function openStorage(dbPath: string): Storage {
	if (dbPath !== ":memory:") {
		const dir = path.dirname(dbPath);
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
	}

	const db = new Database(dbPath);
	if (dbPath !== ":memory:") {
		db.pragma("journal_mode = WAL");
	}
	initSchema(db);

	const upsertSeen = db.prepare<[string, number]>(`
		INSERT INTO seen_posts (id, seen_at) VALUES (?, ?)
		ON CONFLICT(id) DO UPDATE SET seen_at = excluded.seen_at
	`);
	const deleteSeen = db.prepare<[string]>("DELETE FROM seen_posts WHERE id = ?");
	const upsertCursor = db.prepare<[string, number]>(`
		INSERT INTO cursors (source, created_utc) VALUES (?, ?)
		ON CONFLICT(source) DO UPDATE SET created_utc = excluded.created_utc, updated_at = CURRENT_TIMESTAMP
	`);

	const writeSeen = db.transaction((upserts: SeenEntry[], deletions: string[]) => {
		for (const id of deletions) {
			deleteSeen.run(id);
		}
		for (const entry of upserts) {
			upsertSeen.run(entry.id, entry.seenAt);
		}
	});

	const writeCursors = db.transaction((cursors: Map<string, number>) => {
		for (const [source, createdUtc] of cursors) {
			upsertCursor.run(source, createdUtc);
		}
	});

	return {
		loadSeen(): SeenEntry[] {
			const rows = db.prepare<[], SeenRow>("SELECT id, seen_at FROM seen_posts").all();
			return rows.map((row) => ({ id: row.id, seenAt: row.seen_at }));
		},

		saveSeen(upserts: SeenEntry[], deletions: string[]): void {
			writeSeen(upserts, deletions);
		},

		loadCursors(): Map<string, number> {
			const rows = db.prepare<[], CursorRow>("SELECT source, created_utc FROM cursors").all();
			return new Map(rows.map((row) => [row.source, row.created_utc]));
		},

		saveCursors(cursors: Map<string, number>): void {
			writeCursors(cursors);
		},

		close(): void {
			if (db.open) {
				db.close();
			}
		},
	};
}
