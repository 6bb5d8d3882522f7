/**
 * Directory tree discovery against an in-process mirror
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { walk, walkTree } from "../src/core/walker.js"
import type { WalkEvent } from "../src/core/types.js"
import {
	ROOT_URL,
	createMockMirror,
	type MockMirror,
} from "./helpers/index.js"

async function drain(
	generator: AsyncGenerator<WalkEvent, Set<string>>,
): Promise<{ events: WalkEvent[]; leaves: Set<string> }> {
	const events: WalkEvent[] = []
	for (;;) {
		const next = await generator.next()
		if (next.done) return { events, leaves: next.value }
		events.push(next.value)
	}
}

describe("walk", () => {
	let mirror: MockMirror

	beforeEach(() => {
		mirror = createMockMirror()
	})

	afterEach(async () => {
		await mirror.close()
	})

	it("collects leaf files breadth-first", async () => {
		mirror.serveListing("/files/", ["GB/", "NES/", "readme.txt"])
		mirror.serveListing("/files/GB/", ["sub/", "a%20(Europe).gb"])
		mirror.serveListing("/files/NES/", ["b%20(USA).nes"])
		mirror.serveListing("/files/GB/sub/", ["deep.gb"])

		const { events, leaves } = await drain(walk(ROOT_URL, mirror.client))

		expect(events.map(e => e.url)).toEqual([
			ROOT_URL,
			`${ROOT_URL}GB/`,
			`${ROOT_URL}NES/`,
			`${ROOT_URL}GB/sub/`,
		])
		expect([...leaves].sort()).toEqual([
			`${ROOT_URL}GB/a%20(Europe).gb`,
			`${ROOT_URL}GB/sub/deep.gb`,
			`${ROOT_URL}NES/b%20(USA).nes`,
			`${ROOT_URL}readme.txt`,
		])
	})

	it("adds a trailing slash to the root", async () => {
		mirror.serveListing("/files/", ["only.bin"])

		const leaves = await walkTree("http://mirror.test/files", mirror.client)

		expect([...leaves]).toEqual([`${ROOT_URL}only.bin`])
	})

	it("matches links under a root written with a literal space", async () => {
		mirror.serveListing("/files/Game%20Boy/", ["a.gb", "sub/"])
		mirror.serveListing("/files/Game%20Boy/sub/", ["b.gb"])

		const leaves = await walkTree(
			"http://mirror.test/files/Game Boy/",
			mirror.client,
		)

		expect([...leaves].sort()).toEqual([
			`${ROOT_URL}Game%20Boy/a.gb`,
			`${ROOT_URL}Game%20Boy/sub/b.gb`,
		])
	})

	it("matches links under a root with an upper-case host", async () => {
		mirror.serveListing("/files/Game%20Boy/", ["a.gb", "b.gb"])

		const leaves = await walkTree(
			"http://MIRROR.test/files/Game%20Boy",
			mirror.client,
		)

		expect(leaves.size).toBe(2)
		expect(leaves.has(`${ROOT_URL}Game%20Boy/b.gb`)).toBe(true)
	})

	it("fetches each directory once when listings link back", async () => {
		mirror.serveListing("/files/", ["A/", "B/"])
		mirror.serveListing("/files/A/", ["/files/", "../B/", "x.bin"])
		mirror.serveListing("/files/B/", ["/files/A/", "y.bin"])

		const leaves = await walkTree(ROOT_URL, mirror.client)

		expect(leaves.size).toBe(2)
		expect(mirror.hits.get("/files/")).toBe(1)
		expect(mirror.hits.get("/files/A/")).toBe(1)
		expect(mirror.hits.get("/files/B/")).toBe(1)
	})

	it("never leaves the root prefix", async () => {
		mirror.serveListing("/files/", [
			"/elsewhere/",
			"/other/file.bin",
			"http://other.test/files/x.bin",
			"kept.bin",
		])

		const leaves = await walkTree(ROOT_URL, mirror.client)

		expect([...leaves]).toEqual([`${ROOT_URL}kept.bin`])
		expect(mirror.hits.has("/elsewhere/")).toBe(false)
	})

	it("ignores sort, parent and fragment links", async () => {
		mirror.serveListing("/files/", ["#top", "./", "index.html", "x.bin"])

		const { events, leaves } = await drain(walk(ROOT_URL, mirror.client))

		expect(events).toEqual([{ type: "scan", url: ROOT_URL, queued: 0 }])
		expect([...leaves]).toEqual([`${ROOT_URL}x.bin`])
	})

	it("strips fragments from file links", async () => {
		mirror.serveListing("/files/", ["x.bin#section"])

		const leaves = await walkTree(ROOT_URL, mirror.client)

		expect([...leaves]).toEqual([`${ROOT_URL}x.bin`])
	})

	it("skips a subtree whose listing fails and keeps going", async () => {
		mirror.serveListing("/files/", ["broken/", "ok/"])
		mirror.serve("/files/broken/", "server error", 500)
		mirror.serveListing("/files/ok/", ["fine.bin"])

		const { events, leaves } = await drain(walk(ROOT_URL, mirror.client))

		expect(events).toContainEqual({
			type: "listing-error",
			url: `${ROOT_URL}broken/`,
			error: expect.stringContaining("HTTP 500"),
		})
		expect([...leaves]).toEqual([`${ROOT_URL}ok/fine.bin`])
		expect(mirror.hits.get("/files/broken/")).toBe(1)
	})

	it("returns an empty set when the root listing fails", async () => {
		mirror.serve("/files/", "gone", 404)

		const leaves = await walkTree(ROOT_URL, mirror.client)

		expect(leaves.size).toBe(0)
	})

	it("stops before the next listing once aborted", async () => {
		mirror.serveListing("/files/", ["A/"])
		mirror.serveListing("/files/A/", ["x.bin"])
		const controller = new AbortController()

		const generator = walk(ROOT_URL, mirror.client, {
			signal: controller.signal,
		})
		const events: WalkEvent[] = []
		for (;;) {
			const next = await generator.next()
			if (next.done) break
			events.push(next.value)
			// Abort once the root listing has been requested
			controller.abort()
		}

		expect(events.map(e => e.type)).toEqual(["scan"])
		expect(mirror.hits.has("/files/A/")).toBe(false)
	})
})
