/**
 * Mirror pipeline: walk -> region filter -> fetch -> archive post-processing
 *
 * Archives are unpacked as soon as their own download completes, while the
 * pool keeps working on other files.
 */

import { existsSync } from "node:fs"
import type { MirrorConfig } from "../config.js"
import { Ledger } from "../db/index.js"
import { isZipArchive, processArchive } from "../extract.js"
import { filterByRegion } from "../filters.js"
import { MirrorClient } from "../http.js"
import { log } from "../logger.js"
import { resolveLocalPath } from "../paths.js"
import { fetchAll } from "./downloader.js"
import type { MirrorEvent } from "./types.js"
import { walk } from "./walker.js"

export interface MirrorDeps {
	/** Shared HTTP client; created from config (and closed) when omitted */
	client?: MirrorClient | undefined
	/** Ledger; opened from config.dbFile (and closed) when omitted */
	ledger?: Ledger | undefined
	signal?: AbortSignal | undefined
}

export async function* runMirror(
	config: MirrorConfig,
	deps: MirrorDeps = {},
): AsyncGenerator<MirrorEvent> {
	const { signal } = deps
	const client =
		deps.client ??
		new MirrorClient({
			userAgent: config.userAgent,
			timeout: config.timeout,
			connections: config.maxThreads,
		})
	let ledger = deps.ledger

	try {
		// Discovery
		const leaves = yield* walk(config.baseUrl, client, { signal })
		yield { type: "walked", rootUrl: config.baseUrl, total: leaves.size }

		// Region filter
		let selected = leaves
		if (config.regions) {
			selected = filterByRegion(leaves, config.regions)
			yield {
				type: "filtered",
				regions: config.regions,
				matched: selected.size,
				total: leaves.size,
			}
		}

		if (config.countOnly) {
			yield { type: "count", count: selected.size }
			return
		}

		ledger ??= Ledger.open(config.dbFile)

		yield {
			type: "fetch-start",
			total: selected.size,
			threads: config.maxThreads,
		}

		let succeeded = 0
		let skipped = 0
		let failed = 0
		let interrupted = 0
		let extracted = 0

		const events = fetchAll(selected, {
			rootUrl: config.baseUrl,
			downloadDir: config.downloadDir,
			maxThreads: config.maxThreads,
			retryDelay: config.retryDelay,
			client,
			ledger,
			signal,
		})

		for await (const event of events) {
			yield event
			if (!("result" in event)) continue

			const { result } = event
			if (!result.ok) {
				if (event.type === "failed" && event.cancelled) interrupted++
				else failed++
				continue
			}
			if (result.skipped) skipped++
			else succeeded++

			if (!isZipArchive(result.relativePath)) continue
			const archivePath = resolveLocalPath(
				config.downloadDir,
				result.relativePath,
			)
			// Skipped archives were normally unpacked and deleted on an earlier run
			if (!existsSync(archivePath)) continue

			const outcome = await processArchive(archivePath)
			if (outcome.status === "extracted") extracted++
			yield {
				type: "extract",
				url: result.url,
				relativePath: result.relativePath,
				outcome,
			}
		}

		const cancelled = signal?.aborted ?? false
		log.fetch.info(
			{ succeeded, skipped, failed, interrupted, extracted, cancelled },
			"mirror run finished",
		)
		yield {
			type: "done",
			succeeded,
			skipped,
			failed,
			interrupted,
			extracted,
			cancelled,
		}
	} finally {
		if (!deps.ledger) ledger?.close()
		if (!deps.client) await client.close()
	}
}
