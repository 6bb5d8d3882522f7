/**
 * Unit tests for region filtering
 */

import { describe, it, expect } from "vitest"
import {
	extractRegionTag,
	filterByRegion,
	matchesRegion,
	parseRegionList,
	resolveRegionAliases,
} from "../../src/filters.js"

describe("resolveRegionAliases", () => {
	it("expands known codes case-insensitively", () => {
		expect(resolveRegionAliases(["EU", "jp", "Jpn", "hk"])).toEqual([
			"Europe",
			"Japan",
			"Japan",
			"Hong Kong",
		])
	})

	it("passes unknown names through unchanged", () => {
		expect(resolveRegionAliases(["USA", "World"])).toEqual(["USA", "World"])
	})
})

describe("parseRegionList", () => {
	it("splits on commas and drops blanks", () => {
		expect(parseRegionList(" USA, EU ,,JP ")).toEqual(["USA", "EU", "JP"])
	})

	it("returns an empty list for an empty value", () => {
		expect(parseRegionList("")).toEqual([])
	})
})

describe("extractRegionTag", () => {
	it("returns the first parenthesized group lower-cased", () => {
		expect(extractRegionTag("Game (Europe) (En,Fr,De).bin")).toBe("europe")
	})

	it("returns null without a parenthesized group", () => {
		expect(extractRegionTag("readme.txt")).toBeNull()
	})
})

describe("matchesRegion", () => {
	const name = "Game (Europe) (En,Fr,De).bin"

	it("matches an alias-expanded region", () => {
		expect(matchesRegion(name, resolveRegionAliases(["EU"]))).toBe(true)
	})

	it("matches a substring of the tag", () => {
		expect(matchesRegion(name, ["Euro"])).toBe(true)
	})

	it("ignores tokens in later groups", () => {
		expect(matchesRegion(name, ["En"])).toBe(false)
	})

	it("is case-insensitive", () => {
		expect(matchesRegion("Game (USA, Europe).gb", ["usa"])).toBe(true)
		expect(matchesRegion("Game (usa).gb", ["USA"])).toBe(true)
	})

	it("matches when any wanted region is present", () => {
		expect(matchesRegion("Game (Japan).gb", ["USA", "Japan"])).toBe(true)
	})

	it("never matches a filename without a tag", () => {
		expect(matchesRegion("Game.gb", ["USA"])).toBe(false)
	})
})

describe("filterByRegion", () => {
	const root = "http://mirror.test/files/"
	const urls = [
		`${root}GB/Game%20(USA).zip`,
		`${root}GB/Game%20(Japan).zip`,
		`${root}GB/Other%20(Europe)%20(En,Fr).zip`,
		`${root}GB/readme.txt`,
	]

	it("is the identity without regions", () => {
		expect(filterByRegion(urls, undefined)).toEqual(new Set(urls))
		expect(filterByRegion(urls, [])).toEqual(new Set(urls))
	})

	it("decodes the final path segment before matching", () => {
		expect(filterByRegion(urls, ["Europe", "USA"])).toEqual(
			new Set([
				`${root}GB/Game%20(USA).zip`,
				`${root}GB/Other%20(Europe)%20(En,Fr).zip`,
			]),
		)
	})

	it("drops untagged files when a filter is active", () => {
		expect(filterByRegion(urls, ["txt"]).size).toBe(0)
	})

	it("only inspects the filename, not parent directories", () => {
		const nested = [`${root}Sets%20(USA)/Game%20(Japan).zip`]
		expect(filterByRegion(nested, ["USA"]).size).toBe(0)
	})
})
