/**
 * Single-file download with retry, exponential backoff and atomic rename
 *
 * - Streams to a .part file beside the destination (never buffers the body)
 * - Every attempt starts from scratch; partial content is overwritten
 * - Renames over the destination only once all bytes are on disk
 * - Removes partial output when the last attempt fails or the run is aborted
 */

import { createWriteStream } from "node:fs"
import { mkdir, rename, rm } from "node:fs/promises"
import { dirname } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { setTimeout as sleep } from "node:timers/promises"
import type { MirrorClient } from "./http.js"
import { TransientFetchError, describeError } from "./errors.js"
import { log } from "./logger.js"

/** Attempts per file, including the first */
export const MAX_ATTEMPTS = 3

/** Write buffer size for streaming to disk */
export const CHUNK_SIZE = 1024 * 1024

export interface DownloadOptions {
	client: MirrorClient
	/** Base backoff in seconds; attempt n (0-based) waits retryDelay * 2^n */
	retryDelay: number
	signal?: AbortSignal | undefined
	/** Called before each backoff wait */
	onRetry?: ((info: RetryInfo) => void) | undefined
}

export interface RetryInfo {
	/** 1-based number of the attempt that failed */
	attempt: number
	maxAttempts: number
	error: string
	waitSeconds: number
}

export interface DownloadResult {
	success: boolean
	/** Bytes written by the successful attempt */
	bytesDownloaded: number
	attempts: number
	/** True when the run was aborted before or during this file */
	aborted: boolean
	error?: string
}

/**
 * Get the .part file path for a destination
 */
export function getPartPath(destPath: string): string {
	return `${destPath}.part`
}

/**
 * Backoff before retrying after the given 0-based attempt
 */
export function backoffSeconds(
	attemptIndex: number,
	retryDelay: number,
): number {
	return retryDelay * 2 ** attemptIndex
}

/**
 * One attempt: stream the body into the part file, then rename it over the
 * destination.
 */
async function attemptDownload(
	url: string,
	destPath: string,
	options: DownloadOptions,
): Promise<number> {
	const partPath = getPartPath(destPath)
	const response = await options.client.get(url, options.signal)
	if (!response.body) {
		throw new TransientFetchError("No response body")
	}

	const fileStream = createWriteStream(partPath, {
		flags: "w",
		highWaterMark: CHUNK_SIZE,
	})

	try {
		// An abort reaches the body stream through the fetch signal
		await pipeline(Readable.fromWeb(response.body), fileStream)
	} catch (err) {
		if (options.signal?.aborted) throw err
		throw new TransientFetchError(describeError(err), { cause: err })
	}

	await rename(partPath, destPath)
	return fileStream.bytesWritten
}

/**
 * Remove partial output after a terminal failure. A cleanup error is logged
 * on its own and never replaces the failure being reported.
 */
async function cleanupPartial(destPath: string): Promise<void> {
	for (const path of [getPartPath(destPath), destPath]) {
		try {
			await rm(path, { force: true })
		} catch (err) {
			log.fetch.warn({ err, path }, "could not remove partial download")
		}
	}
}

/**
 * Download a file with retry logic and exponential backoff.
 *
 * Resolves with a failed result rather than throwing once attempts are
 * exhausted or the signal fires.
 */
export async function downloadFile(
	url: string,
	destPath: string,
	options: DownloadOptions,
): Promise<DownloadResult> {
	const { retryDelay, signal } = options

	await mkdir(dirname(destPath), { recursive: true })

	let lastError = "Max retries exceeded"
	for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
		if (signal?.aborted) {
			await cleanupPartial(destPath)
			return failed("cancelled", attempt, true)
		}

		try {
			const bytesDownloaded = await attemptDownload(url, destPath, options)
			return {
				success: true,
				bytesDownloaded,
				attempts: attempt + 1,
				aborted: false,
			}
		} catch (err) {
			lastError = describeError(err)
			if (signal?.aborted) {
				await cleanupPartial(destPath)
				return failed("cancelled", attempt + 1, true)
			}
		}

		if (attempt < MAX_ATTEMPTS - 1) {
			const waitSeconds = backoffSeconds(attempt, retryDelay)
			options.onRetry?.({
				attempt: attempt + 1,
				maxAttempts: MAX_ATTEMPTS,
				error: lastError,
				waitSeconds,
			})
			try {
				await sleep(waitSeconds * 1000, undefined, signal ? { signal } : {})
			} catch (err) {
				// Aborted during backoff: the check at the top of the loop reports it
				if (!signal?.aborted) throw err
			}
		}
	}

	await cleanupPartial(destPath)
	return failed(lastError, MAX_ATTEMPTS, false)
}

function failed(
	error: string,
	attempts: number,
	aborted: boolean,
): DownloadResult {
	return { success: false, bytesDownloaded: 0, attempts, aborted, error }
}
