/**
 * Ledger schema setup
 *
 * Fresh files get the full table. Files from older releases are brought
 * forward by adding whatever columns they lack; SQLite has no
 * "ADD COLUMN IF NOT EXISTS", so a duplicate-column error is the signal that
 * the column is already there.
 */

import type Database from "better-sqlite3"
import { log } from "../logger.js"

const CREATE_DOWNLOADS = `
CREATE TABLE IF NOT EXISTS downloads (
	url TEXT PRIMARY KEY,
	filename TEXT,
	full_path TEXT,
	download_date TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
	file_size INTEGER,
	status TEXT DEFAULT 'completed'
)`

/**
 * Columns added after the first release. ADD COLUMN cannot take a
 * non-constant default, so download_date arrives without one.
 */
const ADDED_COLUMNS: ReadonlyArray<{ name: string; definition: string }> = [
	{ name: "full_path", definition: "TEXT" },
	{ name: "download_date", definition: "TIMESTAMP" },
	{ name: "file_size", definition: "INTEGER" },
	{ name: "status", definition: "TEXT DEFAULT 'completed'" },
]

function isDuplicateColumnError(err: unknown): boolean {
	return err instanceof Error && /duplicate column name/i.test(err.message)
}

/**
 * Add a column unless it already exists.
 *
 * @returns true when the column was added
 */
export function addColumnIfMissing(
	sqlite: Database.Database,
	table: string,
	column: string,
	definition: string,
): boolean {
	try {
		sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`)
		return true
	} catch (err) {
		if (isDuplicateColumnError(err)) return false
		throw err
	}
}

/**
 * Create the downloads table and add any columns an older file lacks.
 *
 * @returns names of the columns that were added
 */
export function ensureSchema(sqlite: Database.Database): string[] {
	sqlite.exec(CREATE_DOWNLOADS)

	const added: string[] = []
	for (const { name, definition } of ADDED_COLUMNS) {
		if (addColumnIfMissing(sqlite, "downloads", name, definition)) {
			added.push(name)
		}
	}

	if (added.length > 0) {
		log.ledger.info({ columns: added }, "migrated ledger schema")
	}
	return added
}
