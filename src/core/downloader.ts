/**
 * Core Fetch Engine
 *
 * Bounded worker pool over the leaf-URL list. Each URL is owned by exactly
 * one task; the ledger is the only state the tasks share.
 *
 * Per URL:
 * 1. Map the URL to a relative output path
 * 2. Skip it when the ledger says it is already downloaded
 * 3. Otherwise download with retries (see download.ts)
 * 4. Record it in the ledger once the file is complete on disk
 */

import pLimit from "p-limit"
import { downloadFile } from "../download.js"
import { describeError } from "../errors.js"
import type { MirrorClient } from "../http.js"
import type { Ledger } from "../db/index.js"
import { log } from "../logger.js"
import { resolveLocalPath, toRelativePath } from "../paths.js"
import type { FetchEvent, FetchResult } from "./types.js"

/** A progress event is emitted every this many processed URLs */
export const PROGRESS_INTERVAL = 50

export interface FetchAllOptions {
	/** Normalized root URL (trailing "/") */
	rootUrl: string
	downloadDir: string
	maxThreads: number
	/** Base backoff in seconds */
	retryDelay: number
	client: MirrorClient
	ledger: Ledger
	signal?: AbortSignal | undefined
}

/**
 * Async generator that yields fetch events.
 *
 * Usage:
 * ```ts
 * for await (const event of fetchAll(urls, options)) {
 *   switch (event.type) {
 *     case "complete": report(event.result); break
 *     case "failed": warn(event.error); break
 *   }
 * }
 * ```
 */
export async function* fetchAll(
	urls: Iterable<string>,
	options: FetchAllOptions,
): AsyncGenerator<FetchEvent> {
	const { rootUrl, downloadDir, ledger, client, signal } = options
	const work = [...urls]
	const total = work.length
	let processed = 0

	// Queue for yielding events from concurrent tasks
	const eventQueue: FetchEvent[] = []
	let resolveQueue: (() => void) | null = null

	const pushEvent = (event: FetchEvent): void => {
		eventQueue.push(event)
		if (resolveQueue) {
			resolveQueue()
			resolveQueue = null
		}
	}

	const finish = (event: FetchEvent): void => {
		pushEvent(event)
		processed++
		if (processed % PROGRESS_INTERVAL === 0 || processed === total) {
			pushEvent({ type: "progress", completed: processed, total })
		}
	}

	const fetchOne = async (url: string): Promise<void> => {
		const relativePath = toRelativePath(url, rootUrl)
		const failure = (error: string, cancelled: boolean): FetchEvent => ({
			type: "failed",
			url,
			relativePath,
			error,
			cancelled,
			result: { url, ok: false, relativePath: null, error },
		})

		if (signal?.aborted) {
			finish(failure("cancelled", true))
			return
		}

		try {
			if (ledger.exists(url, downloadDir)) {
				log.fetch.debug({ url, relativePath }, "already downloaded")
				finish({
					type: "skip",
					url,
					relativePath,
					result: { url, ok: true, relativePath, skipped: true },
				})
				return
			}

			const localPath = resolveLocalPath(downloadDir, relativePath)
			pushEvent({ type: "start", url, relativePath })

			const result = await downloadFile(url, localPath, {
				client,
				retryDelay: options.retryDelay,
				signal,
				onRetry: info => {
					log.fetch.debug({ url, ...info }, "attempt failed, retrying")
					pushEvent({ type: "retry", url, relativePath, ...info })
				},
			})

			if (!result.success) {
				const error = result.error ?? "Unknown error"
				log.fetch.warn({ url, error, attempts: result.attempts }, "failed")
				finish(failure(error, result.aborted))
				return
			}

			ledger.record(url, relativePath, downloadDir)
			finish({
				type: "complete",
				url,
				relativePath,
				bytesDownloaded: result.bytesDownloaded,
				localPath,
				result: { url, ok: true, relativePath, skipped: false },
			})
		} catch (err) {
			// Local failures (mkdir, ledger write) are isolated to this URL
			const error = describeError(err)
			log.fetch.error({ url, err }, "unexpected failure")
			finish(failure(error, false))
		}
	}

	const limit = pLimit(options.maxThreads)
	const allDone = Promise.all(work.map(url => limit(() => fetchOne(url))))

	let done = false
	void allDone.then(() => {
		done = true
		if (resolveQueue) resolveQueue()
	})

	while (!done || eventQueue.length > 0) {
		const next = eventQueue.shift()
		if (next) {
			yield next
		} else if (!done) {
			await new Promise<void>(resolve => {
				resolveQueue = resolve
			})
		}
	}
}

/**
 * Drain fetchAll() into the list of per-URL results
 */
export async function collectFetchResults(
	events: AsyncIterable<FetchEvent>,
): Promise<FetchResult[]> {
	const results: FetchResult[] = []
	for await (const event of events) {
		if ("result" in event) {
			results.push(event.result)
		}
	}
	return results
}
