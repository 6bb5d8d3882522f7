/**
 * SQLite schema for the download ledger
 *
 * Column names match ledger files written by earlier releases, so an existing
 * downloads.db keeps working after upgrade.
 */

import { sql } from "drizzle-orm"
import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core"

export const LEDGER_STATUS = ["completed"] as const

export type LedgerStatus = (typeof LEDGER_STATUS)[number]

/**
 * One row per source URL that has been fetched completely.
 * Rows are replaced on re-fetch and never deleted.
 */
export const downloads = sqliteTable("downloads", {
	/** Absolute source URL */
	url: text("url").primaryKey(),
	/** Path relative to the download directory, decoded, "/"-separated */
	filename: text("filename"),
	/** Absolute local path at the time of recording */
	fullPath: text("full_path"),
	/** When the download completed (ISO 8601) */
	downloadDate: text("download_date").default(sql`CURRENT_TIMESTAMP`),
	/** Size on disk when recorded; null when the file was already gone */
	fileSize: integer("file_size"),
	status: text("status", { enum: LEDGER_STATUS }).default("completed"),
})

export type DownloadRow = typeof downloads.$inferSelect
