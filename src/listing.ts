/**
 * HTML directory listing parser
 *
 * Apache and nginx autoindex pages and table-style listings all reduce to a set
 * of anchors; the only structure that matters is whether the href names a
 * sub-directory (trailing "/") or a file.
 */

import { load } from "cheerio"

export interface ListingLink {
	href: string
	isDirectory: boolean
}

/** Hrefs that never name a child of the listed directory */
const NAVIGATION_HREFS = new Set(["../", "./", "/", "index.html", "index.htm"])

/**
 * Extract every anchor target from a listing page, in document order,
 * without duplicates.
 */
export function parseListing(html: string): ListingLink[] {
	const $ = load(html)
	const links: ListingLink[] = []
	const seen = new Set<string>()

	$("a[href]").each((_, element) => {
		const href = $(element).attr("href")?.trim()
		if (!href || seen.has(href)) return
		seen.add(href)
		links.push({ href, isDirectory: href.endsWith("/") })
	})

	return links
}

/**
 * True for parent/self/index links, query links (sort toggles) and
 * in-page fragments
 */
export function isNavigationHref(href: string): boolean {
	return (
		NAVIGATION_HREFS.has(href) || href.includes("?") || href.startsWith("#")
	)
}
