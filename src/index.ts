// This module is a library entry point
// For CLI usage, run: npx treefetch -u <url> -d <dir>

export * from "./config.js"
export * from "./errors.js"
export * from "./filters.js"
export * from "./listing.js"
export * from "./paths.js"
export * from "./http.js"
export * from "./extract.js"
export {
	downloadFile,
	backoffSeconds,
	getPartPath,
	MAX_ATTEMPTS,
	CHUNK_SIZE,
	type DownloadOptions as FileDownloadOptions,
	type DownloadResult as FileDownloadResult,
	type RetryInfo,
} from "./download.js"
export { Ledger } from "./db/index.js"
export type { LedgerEntry, LedgerOptions } from "./db/index.js"
export * from "./core/index.js"
