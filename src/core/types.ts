/**
 * Core event types
 *
 * The walker, fetch engine and pipeline are async generators. They emit these
 * events and never print anything themselves; the CLI decides how each one
 * is shown.
 */

import type { ArchiveOutcome } from "../extract.js"

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

/** Outcome of one leaf URL after the fetch engine is done with it */
export type FetchResult =
	| {
			url: string
			ok: true
			relativePath: string
			/** Already in the ledger; no network I/O was done */
			skipped: boolean
	  }
	| {
			url: string
			ok: false
			relativePath: null
			error: string
	  }

// ─────────────────────────────────────────────────────────────────────────────
// Walk Events
// ─────────────────────────────────────────────────────────────────────────────

export type WalkEvent = WalkScanEvent | WalkListingErrorEvent

/** Emitted before a directory listing is fetched */
export interface WalkScanEvent {
	type: "scan"
	url: string
	/** Directories still waiting in the queue */
	queued: number
}

/** Emitted when a listing fails; that subtree is skipped */
export interface WalkListingErrorEvent {
	type: "listing-error"
	url: string
	error: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Fetch Events
// ─────────────────────────────────────────────────────────────────────────────

export type FetchEvent =
	| FetchSkipEvent
	| FetchStartEvent
	| FetchRetryEvent
	| FetchCompleteEvent
	| FetchFailedEvent
	| FetchProgressEvent

/** Emitted when the ledger already has the URL */
export interface FetchSkipEvent {
	type: "skip"
	url: string
	relativePath: string
	result: FetchResult
}

/** Emitted when a transfer begins */
export interface FetchStartEvent {
	type: "start"
	url: string
	relativePath: string
}

/** Emitted after a failed attempt, before the backoff wait */
export interface FetchRetryEvent {
	type: "retry"
	url: string
	relativePath: string
	attempt: number
	maxAttempts: number
	error: string
	waitSeconds: number
}

/** Emitted when the file is on disk and recorded in the ledger */
export interface FetchCompleteEvent {
	type: "complete"
	url: string
	relativePath: string
	bytesDownloaded: number
	localPath: string
	result: FetchResult
}

/** Emitted when all attempts failed or the run was cancelled */
export interface FetchFailedEvent {
	type: "failed"
	url: string
	relativePath: string
	error: string
	cancelled: boolean
	result: FetchResult
}

/** Emitted every PROGRESS_INTERVAL processed URLs and after the last one */
export interface FetchProgressEvent {
	type: "progress"
	completed: number
	total: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline Events
// ─────────────────────────────────────────────────────────────────────────────

export type MirrorEvent =
	| WalkEvent
	| FetchEvent
	| MirrorWalkedEvent
	| MirrorFilteredEvent
	| MirrorCountEvent
	| MirrorFetchStartEvent
	| MirrorExtractEvent
	| MirrorDoneEvent

/** Emitted when traversal finishes */
export interface MirrorWalkedEvent {
	type: "walked"
	rootUrl: string
	total: number
}

/** Emitted after region filtering (only when a filter is active) */
export interface MirrorFilteredEvent {
	type: "filtered"
	regions: string[]
	matched: number
	total: number
}

/** Count-only mode: the number of files that would be fetched */
export interface MirrorCountEvent {
	type: "count"
	count: number
}

/** Emitted before the worker pool starts */
export interface MirrorFetchStartEvent {
	type: "fetch-start"
	total: number
	threads: number
}

/** Emitted after an archive has been post-processed */
export interface MirrorExtractEvent {
	type: "extract"
	url: string
	relativePath: string
	outcome: ArchiveOutcome
}

/** Final tally */
export interface MirrorDoneEvent {
	type: "done"
	succeeded: number
	skipped: number
	/** Exhausted their attempts */
	failed: number
	/** Cancelled by an interrupt before finishing */
	interrupted: number
	extracted: number
	cancelled: boolean
}
