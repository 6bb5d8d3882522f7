#!/usr/bin/env node
/**
 * treefetch CLI - mirror a remote directory tree to local storage
 */

import { Command, InvalidArgumentError } from "commander"
import { config as loadDotenv } from "dotenv"
import { resolveConfig, type CliFlags, type MirrorConfig } from "../config.js"
import { runMirror } from "../core/pipeline.js"
import type { MirrorEvent } from "../core/types.js"
import { ConfigurationError, describeError } from "../errors.js"
import { flushLogs, log, setLogLevel } from "../logger.js"
import { startProgressSpinner, type ProgressSpinner } from "../spinner.js"
import { ui } from "../ui.js"

const VERSION = "1.0.0"

/** Conventional exit code for a run stopped by SIGINT */
const EXIT_INTERRUPTED = 130

/** Events still printed under --quiet and --count */
const QUIET_EVENTS = new Set<MirrorEvent["type"]>([
	"count",
	"failed",
	"listing-error",
])

interface CliOptions extends CliFlags {
	quiet: boolean
	verbose: boolean
}

function parseInteger(value: string): number {
	const parsed = Number(value)
	if (!Number.isInteger(parsed)) {
		throw new InvalidArgumentError("Not an integer.")
	}
	return parsed
}

function parseNumber(value: string): number {
	const parsed = Number(value)
	if (!Number.isFinite(parsed)) {
		throw new InvalidArgumentError("Not a number.")
	}
	return parsed
}

async function exitWithCode(code: number): Promise<void> {
	try {
		await flushLogs()
	} catch (err) {
		// Never block exiting on a log flush failure
		console.error(`log flush failed: ${describeError(err)}`)
	}
	process.exitCode = code
}

/**
 * First SIGINT/SIGTERM aborts the run (no new work, in-flight transfers
 * cleaned up); a second one exits immediately.
 */
function installInterruptHandler(controller: AbortController): () => void {
	const handle = (signal: NodeJS.Signals): void => {
		if (controller.signal.aborted) {
			ui.warn("Force exit requested")
			process.exit(EXIT_INTERRUPTED)
		}
		ui.warn(
			`Received ${signal}, finishing in-flight work. Press Ctrl+C again to force exit.`,
		)
		log.cli.info({ signal }, "shutdown requested")
		controller.abort()
	}

	process.on("SIGINT", handle)
	process.on("SIGTERM", handle)
	return () => {
		process.off("SIGINT", handle)
		process.off("SIGTERM", handle)
	}
}

/**
 * Print one event as a tagged line
 */
function reportEvent(
	event: MirrorEvent,
	config: MirrorConfig,
	spinner: { current: ProgressSpinner | null },
	quiet: boolean,
): void {
	switch (event.type) {
		case "scan":
			if (!quiet) ui.info(`Scanning directory: ${event.url}`)
			break
		case "listing-error":
			ui.error(`Failed to list ${event.url}: ${event.error}`)
			break
		case "walked":
			ui.info(`Found ${event.total} files under ${event.rootUrl}`)
			break
		case "filtered":
			ui.info(
				`Region filter [${event.regions.join(", ")}]: ${event.matched}/${event.total} files matched`,
			)
			break
		case "count":
			console.log(event.count)
			break
		case "fetch-start":
			ui.info(
				`Starting download of ${event.total} files with ${event.threads} threads...`,
			)
			spinner.current = startProgressSpinner("Downloading", event.total, quiet)
			break
		case "start":
			break
		case "skip":
			ui.skip(`${event.relativePath} already downloaded`)
			break
		case "complete":
			ui.ok(event.relativePath)
			break
		case "retry":
			ui.retry(
				`${event.relativePath} - attempt ${event.attempt}/${event.maxAttempts} failed: ${event.error}, retrying in ${event.waitSeconds}s...`,
			)
			break
		case "failed":
			// Interrupted files are tallied in the final line
			if (!event.cancelled) {
				ui.fail(`${event.relativePath} - ${event.error}`)
			}
			break
		case "progress":
			spinner.current?.update(event.completed, event.total)
			ui.info(`Progress: ${event.completed}/${event.total} files processed`)
			break
		case "extract": {
			const { outcome } = event
			if (outcome.status === "extracted") {
				ui.extract(
					`${event.relativePath} -> ${outcome.extractedFiles.length} file(s), archive deleted`,
				)
			} else if (outcome.status === "invalid") {
				ui.warn(`${event.relativePath} is not a valid zip file`)
			} else {
				ui.error(`Failed to unzip ${event.relativePath}: ${outcome.error}`)
			}
			break
		}
		case "done":
			spinner.current?.stop()
			spinner.current = null
			ui.info(
				`Done: ${event.succeeded} downloaded, ${event.skipped} skipped, ${event.failed} failed, ${event.extracted} extracted` +
					(event.interrupted > 0 ? `, ${event.interrupted} interrupted` : ""),
			)
			ui.finalStatus(event.failed, event.cancelled)
			log.cli.debug({ downloadDir: config.downloadDir }, "run complete")
			break
	}
}

async function run(options: CliOptions): Promise<void> {
	if (options.verbose) setLogLevel("debug")

	let config: MirrorConfig
	try {
		config = resolveConfig(options)
	} catch (err) {
		if (err instanceof ConfigurationError) {
			ui.error(err.message)
			await exitWithCode(1)
			return
		}
		throw err
	}

	// Count-only output must stay a bare number
	const quiet = options.quiet || config.countOnly
	if (!quiet) {
		ui.banner(
			VERSION,
			config.baseUrl,
			config.downloadDir,
			config.maxThreads,
			config.regions,
		)
	}

	const controller = new AbortController()
	const removeInterruptHandler = installInterruptHandler(controller)
	const spinner: { current: ProgressSpinner | null } = { current: null }

	try {
		for await (const event of runMirror(config, {
			signal: controller.signal,
		})) {
			if (quiet && !QUIET_EVENTS.has(event.type)) continue
			reportEvent(event, config, spinner, quiet)
		}
	} finally {
		spinner.current?.stop()
		removeInterruptHandler()
	}

	await exitWithCode(controller.signal.aborted ? EXIT_INTERRUPTED : 0)
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("treefetch")
	.version(VERSION)
	.description(
		"Mirror a remote HTML directory tree to local storage, tracking completed downloads in SQLite",
	)
	.option("-c, --count", "Print the number of matched files and exit")
	.option("-u, --url <url>", "Base URL to mirror (env: BASE_URL)")
	.option(
		"-d, --download-dir <dir>",
		"Directory to save files into (env: DOWNLOAD_DIR)",
	)
	.option(
		"-t, --threads <number>",
		"Concurrent downloads (env: MAX_THREADS, default 8)",
		parseInteger,
	)
	.option(
		"--timeout <seconds>",
		"Request timeout in seconds (env: TIMEOUT, default 20)",
		parseInteger,
	)
	.option(
		"--db-file <path>",
		"SQLite ledger file (env: DB_FILE, default downloads.db)",
	)
	.option("--user-agent <ua>", "User-Agent header (env: USER_AGENT)")
	.option(
		"-r, --region <regions...>",
		"Only files whose region tag matches (e.g. -r USA EU JP; env: REGION, comma-separated)",
	)
	.option(
		"--retry-delay <seconds>",
		"Base retry backoff in seconds, doubled per attempt (env: RETRY_DELAY, default 1)",
		parseNumber,
	)
	.option("-q, --quiet", "Only print failures and the final count", false)
	.option("--verbose", "Debug logging", false)
	.action(async () => {
		await run(program.opts<CliOptions>())
	})

loadDotenv()

program.parseAsync(process.argv).catch(async (err: unknown) => {
	ui.error(describeError(err))
	log.cli.error({ err }, "fatal error")
	await exitWithCode(1)
})
