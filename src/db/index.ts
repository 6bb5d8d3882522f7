/**
 * Download ledger
 *
 * Durable record of every URL fetched to completion. It is the source of
 * truth for "already downloaded"; the file on disk only corroborates it.
 *
 * better-sqlite3 is synchronous, so each call below runs to completion within
 * one event-loop turn: concurrent workers can never interleave two upserts or
 * read a half-written row. WAL and a busy timeout cover a second process
 * opening the same file.
 */

import Database from "better-sqlite3"
import { mkdirSync, statSync } from "node:fs"
import { dirname, resolve } from "node:path"
import { count, eq } from "drizzle-orm"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import * as schema from "./schema.js"
import { downloads, type DownloadRow, type LedgerStatus } from "./schema.js"
import { ensureSchema } from "./migrate.js"
import { isZipArchive } from "../extract.js"
import { resolveLocalPath } from "../paths.js"
import { log } from "../logger.js"

export type DbClient = BetterSQLite3Database<typeof schema>

export interface LedgerEntry {
	url: string
	filename: string
	fullPath: string | null
	downloadDate: string | null
	fileSize: number | null
	status: LedgerStatus
}

export interface LedgerOptions {
	/** Clock for completion timestamps */
	now?: () => Date
}

function toEntry(row: DownloadRow): LedgerEntry {
	return {
		url: row.url,
		filename: row.filename ?? "",
		fullPath: row.fullPath,
		downloadDate: row.downloadDate,
		fileSize: row.fileSize,
		status: row.status ?? "completed",
	}
}

export class Ledger {
	private sqlite: Database.Database | null
	private readonly db: DbClient
	private readonly now: () => Date

	private constructor(
		readonly path: string,
		sqlite: Database.Database,
		options: LedgerOptions,
	) {
		this.sqlite = sqlite
		this.db = drizzle(sqlite, { schema })
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Open (or create) a ledger file and bring its schema up to date.
	 *
	 * @param path - SQLite file path, or ":memory:"
	 */
	static open(path: string, options: LedgerOptions = {}): Ledger {
		if (path !== ":memory:") {
			mkdirSync(dirname(resolve(path)), { recursive: true })
		}

		const sqlite = new Database(path)
		try {
			sqlite.pragma("journal_mode = WAL")
			sqlite.pragma("synchronous = NORMAL")
			sqlite.pragma("busy_timeout = 5000")
			ensureSchema(sqlite)
		} catch (err) {
			sqlite.close()
			throw err
		}

		log.ledger.debug({ path }, "ledger opened")
		return new Ledger(path, sqlite, options)
	}

	private get client(): DbClient {
		if (!this.sqlite) {
			throw new Error(`Ledger is closed: ${this.path}`)
		}
		return this.db
	}

	/**
	 * Whether a URL counts as already downloaded.
	 *
	 * Archive records are trusted without a disk check: the archive is
	 * deleted after extraction, so its absence does not mean the work is
	 * undone. Any other record also needs the file to still exist.
	 */
	exists(url: string, downloadRoot: string): boolean {
		const row = this.client
			.select({ filename: downloads.filename })
			.from(downloads)
			.where(eq(downloads.url, url))
			.get()

		if (!row?.filename) return false
		if (isZipArchive(row.filename)) return true

		const localPath = resolveLocalPath(downloadRoot, row.filename)
		return statSync(localPath, { throwIfNoEntry: false }) !== undefined
	}

	/**
	 * Record a completed download, replacing any earlier record for the URL.
	 * File size is read from disk now; null if the file is already gone.
	 */
	record(url: string, filename: string, downloadRoot: string): LedgerEntry {
		const localPath = resolveLocalPath(downloadRoot, filename)
		const stats = statSync(localPath, { throwIfNoEntry: false })

		const values = {
			filename,
			fullPath: resolve(localPath),
			downloadDate: this.now().toISOString(),
			fileSize: stats ? stats.size : null,
			status: "completed" as const,
		}

		const row = this.client
			.insert(downloads)
			.values({ url, ...values })
			.onConflictDoUpdate({ target: downloads.url, set: values })
			.returning()
			.get()

		return toEntry(row)
	}

	get(url: string): LedgerEntry | undefined {
		const row = this.client
			.select()
			.from(downloads)
			.where(eq(downloads.url, url))
			.get()
		return row ? toEntry(row) : undefined
	}

	count(): number {
		const row = this.client.select({ total: count() }).from(downloads).get()
		return row?.total ?? 0
	}

	/**
	 * Checkpoint and close. Safe to call more than once.
	 */
	close(): void {
		if (!this.sqlite) return
		const sqlite = this.sqlite
		this.sqlite = null

		try {
			sqlite.pragma("wal_checkpoint(TRUNCATE)")
		} catch (err) {
			log.ledger.warn({ err, path: this.path }, "WAL checkpoint failed")
		}
		sqlite.close()
	}
}

export * from "./schema.js"
