/**
 * Directory tree discovery
 *
 * Breadth-first over listing pages with an explicit queue, so depth of the
 * remote tree never grows the call stack. A directory is marked visited when
 * it is queued, which keeps every directory to a single fetch even when
 * listings link back to an ancestor.
 */

import { normalizeBaseUrl } from "../config.js"
import { TraversalError, describeError } from "../errors.js"
import type { MirrorClient } from "../http.js"
import {
	isNavigationHref,
	parseListing,
	type ListingLink,
} from "../listing.js"
import { log } from "../logger.js"
import type { WalkEvent } from "./types.js"

export interface WalkOptions {
	signal?: AbortSignal | undefined
}

/**
 * Resolve an href against its page and drop the fragment.
 * Returns null for hrefs that are not valid URLs.
 */
function resolveHref(href: string, pageUrl: string): string | null {
	try {
		const resolved = new URL(href, pageUrl)
		resolved.hash = ""
		return resolved.toString()
	} catch {
		return null
	}
}

/**
 * Walk the tree under rootUrl.
 *
 * Yields a scan event per directory and a listing-error event per failed
 * page; returns the set of leaf-file URLs. Only URLs under the root prefix
 * are followed or returned.
 */
export async function* walk(
	rootUrl: string,
	client: MirrorClient,
	options: WalkOptions = {},
): AsyncGenerator<WalkEvent, Set<string>> {
	const root = normalizeBaseUrl(rootUrl)
	const leaves = new Set<string>()
	const visited = new Set<string>([root])
	const queue: string[] = [root]

	while (queue.length > 0) {
		if (options.signal?.aborted) break
		const url = queue.shift()
		if (url === undefined) break

		yield { type: "scan", url, queued: queue.length }
		log.walk.debug({ url }, "scanning directory")

		let links: ListingLink[]
		try {
			links = parseListing(await client.getText(url, options.signal))
		} catch (err) {
			if (options.signal?.aborted) break
			const error = new TraversalError(url, describeError(err), {
				cause: err,
			})
			log.walk.warn({ url, err: error }, "failed to list directory")
			yield { type: "listing-error", url, error: error.message }
			continue
		}

		for (const { href, isDirectory } of links) {
			if (isNavigationHref(href)) continue

			const target = resolveHref(href, url)
			if (target === null || !target.startsWith(root)) continue

			if (isDirectory) {
				if (!visited.has(target)) {
					visited.add(target)
					queue.push(target)
				}
			} else {
				leaves.add(target)
			}
		}
	}

	log.walk.info(
		{ root, directories: visited.size, files: leaves.size },
		"walk complete",
	)
	return leaves
}

/**
 * Drain walk() and return only the leaf set
 */
export async function walkTree(
	rootUrl: string,
	client: MirrorClient,
	options: WalkOptions = {},
): Promise<Set<string>> {
	const walker = walk(rootUrl, client, options)
	for (;;) {
		const next = await walker.next()
		if (next.done) return next.value
	}
}
