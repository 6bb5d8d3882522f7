/**
 * Region filtering on No-Intro/Redump style filenames.
 *
 * Only the first parenthesized group is inspected: in "Game (Europe) (En,Fr)"
 * that is "Europe"; the language group is never consulted.
 */

import { basename } from "node:path/posix"
import { safeDecodeURIComponent } from "./paths.js"

export const REGION_ALIASES: Readonly<Record<string, string>> = {
	EU: "Europe",
	JP: "Japan",
	JPN: "Japan",
	AUS: "Australia",
	KR: "Korea",
	BR: "Brazil",
	CN: "China",
	FR: "France",
	DE: "Germany",
	HK: "Hong Kong",
	IT: "Italy",
	NL: "Netherlands",
	ES: "Spain",
	SE: "Sweden",
	CA: "Canada",
}

/**
 * Expand short region codes (EU, JP, ...) to the names used in filenames.
 * Unknown names pass through unchanged.
 */
export function resolveRegionAliases(regions: readonly string[]): string[] {
	return regions.map(region => REGION_ALIASES[region.toUpperCase()] ?? region)
}

/**
 * Split a comma-separated list (REGION env var), dropping blanks
 */
export function parseRegionList(value: string): string[] {
	return value
		.split(",")
		.map(part => part.trim())
		.filter(part => part.length > 0)
}

/**
 * First parenthesized group of a filename, lower-cased, or null
 */
export function extractRegionTag(filename: string): string | null {
	const match = filename.match(/\(([^)]+)\)/)
	return match?.[1] ? match[1].toLowerCase() : null
}

export function matchesRegion(
	filename: string,
	regions: readonly string[],
): boolean {
	const tag = extractRegionTag(filename)
	if (tag === null) return false
	return regions.some(region => tag.includes(region.toLowerCase()))
}

/**
 * Keep leaf URLs whose decoded filename carries a wanted region tag.
 * Without regions this is the identity (a copy of the input set).
 */
export function filterByRegion(
	urls: Iterable<string>,
	regions: readonly string[] | undefined,
): Set<string> {
	const all = new Set(urls)
	if (!regions || regions.length === 0) return all

	const kept = new Set<string>()
	for (const url of all) {
		const filename = safeDecodeURIComponent(basename(new URL(url).pathname))
		if (matchesRegion(filename, regions)) {
			kept.add(url)
		}
	}
	return kept
}
