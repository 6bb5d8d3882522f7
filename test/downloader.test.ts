/**
 * Fetch engine: worker pool, ledger skips and per-URL results
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
	PROGRESS_INTERVAL,
	collectFetchResults,
	fetchAll,
	type FetchAllOptions,
} from "../src/core/downloader.js"
import type { FetchEvent } from "../src/core/types.js"
import { Ledger } from "../src/db/index.js"
import {
	MIRROR_ORIGIN,
	ROOT_URL,
	createMockMirror,
	type MockMirror,
} from "./helpers/index.js"

describe("fetchAll", () => {
	let tempDir: string
	let mirror: MockMirror
	let ledger: Ledger
	let options: FetchAllOptions

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "treefetch-fetch-"))
		mirror = createMockMirror()
		ledger = Ledger.open(":memory:")
		options = {
			rootUrl: ROOT_URL,
			downloadDir: tempDir,
			maxThreads: 3,
			retryDelay: 0,
			client: mirror.client,
			ledger,
		}
	})

	afterEach(async () => {
		ledger.close()
		await mirror.close()
		rmSync(tempDir, { recursive: true, force: true })
	})

	it("downloads to decoded relative paths and records each file", async () => {
		mirror.serve("/files/GB/My%20Game.gb", "spaced")

		const results = await collectFetchResults(
			fetchAll([`${ROOT_URL}GB/My%20Game.gb`], options),
		)

		expect(results).toEqual([
			{
				url: `${ROOT_URL}GB/My%20Game.gb`,
				ok: true,
				relativePath: "GB/My Game.gb",
				skipped: false,
			},
		])
		expect(readFileSync(join(tempDir, "GB", "My Game.gb"), "utf8")).toBe(
			"spaced",
		)
		expect(ledger.get(`${ROOT_URL}GB/My%20Game.gb`)?.fileSize).toBe(6)
	})

	it("emits start before complete for a transfer", async () => {
		mirror.serve("/files/a.bin", "a")

		const events: FetchEvent[] = []
		for await (const event of fetchAll([`${ROOT_URL}a.bin`], options)) {
			events.push(event)
		}

		expect(events.map(e => e.type)).toEqual(["start", "complete", "progress"])
		expect(events[1]).toMatchObject({
			bytesDownloaded: 1,
			localPath: join(tempDir, "a.bin"),
		})
	})

	it("skips URLs the ledger already has", async () => {
		mirror.serve("/files/a.bin", "a")
		await collectFetchResults(fetchAll([`${ROOT_URL}a.bin`], options))

		const results = await collectFetchResults(
			fetchAll([`${ROOT_URL}a.bin`], options),
		)

		expect(results).toEqual([
			{
				url: `${ROOT_URL}a.bin`,
				ok: true,
				relativePath: "a.bin",
				skipped: true,
			},
		])
		expect(mirror.hits.get("/files/a.bin")).toBe(1)
	})

	it("records a file once after two failed attempts", async () => {
		const pool = mirror.agent.get(MIRROR_ORIGIN)
		pool
			.intercept({ path: "/files/GB/flaky.gb", method: "GET" })
			.reply(500, "busy")
			.times(2)
		pool
			.intercept({ path: "/files/GB/flaky.gb", method: "GET" })
			.reply(200, "finally here")

		const events: FetchEvent[] = []
		for await (const event of fetchAll([`${ROOT_URL}GB/flaky.gb`], options)) {
			events.push(event)
		}

		expect(events.filter(e => e.type === "retry")).toHaveLength(2)
		expect(events.filter(e => e.type === "complete")).toHaveLength(1)
		expect(ledger.count()).toBe(1)
		const localPath = join(tempDir, "GB", "flaky.gb")
		expect(ledger.get(`${ROOT_URL}GB/flaky.gb`)?.fileSize).toBe(
			statSync(localPath).size,
		)
		expect(readFileSync(localPath, "utf8")).toBe("finally here")
	})

	it("isolates a failing URL from the rest", async () => {
		mirror.serve("/files/good.bin", "good")
		mirror.serve("/files/bad.bin", "nope", 404)

		const results = await collectFetchResults(
			fetchAll([`${ROOT_URL}bad.bin`, `${ROOT_URL}good.bin`], options),
		)

		const byUrl = new Map(results.map(r => [r.url, r]))
		expect(byUrl.get(`${ROOT_URL}good.bin`)).toMatchObject({ ok: true })
		expect(byUrl.get(`${ROOT_URL}bad.bin`)).toMatchObject({
			ok: false,
			relativePath: null,
			error: expect.stringContaining("HTTP 404"),
		})
		expect(ledger.count()).toBe(1)
	})

	it("reports progress every interval and after the last URL", async () => {
		const total = PROGRESS_INTERVAL + 2
		const urls: string[] = []
		for (let i = 0; i < total; i++) {
			mirror.serve(`/files/f${i}.bin`, String(i))
			urls.push(`${ROOT_URL}f${i}.bin`)
		}

		const progress: number[] = []
		for await (const event of fetchAll(urls, options)) {
			if (event.type === "progress") progress.push(event.completed)
		}

		expect(progress).toEqual([PROGRESS_INTERVAL, total])
	})

	it("cancels queued URLs without network I/O once aborted", async () => {
		mirror.serve("/files/a.bin", "a")
		const controller = new AbortController()
		controller.abort()

		const results = await collectFetchResults(
			fetchAll([`${ROOT_URL}a.bin`], {
				...options,
				signal: controller.signal,
			}),
		)

		expect(results).toEqual([
			{
				url: `${ROOT_URL}a.bin`,
				ok: false,
				relativePath: null,
				error: "cancelled",
			},
		])
		expect(mirror.hits.has("/files/a.bin")).toBe(false)
	})

	it("finishes immediately with no URLs", async () => {
		const results = await collectFetchResults(fetchAll([], options))
		expect(results).toEqual([])
	})
})
