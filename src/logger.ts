/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured logging for debugging and CI capture
 * - UI module (ui.ts) prints the one-line-per-outcome run report
 *
 * Log levels:
 * - error: Operation failed
 * - warn: Recoverable issue (failed listing, malformed archive)
 * - info: Key milestones (default)
 * - debug: Per-file detail (--verbose or DEBUG=1)
 */

import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stderr.isTTY && !process.env["CI"]

/** stdout carries the run report and the bare --count number */
export const LOG_FD = 2

export const prettyTransport = {
	target: "pino-pretty",
	options: {
		colorize: true,
		translateTime: "HH:MM:ss",
		ignore: "pid,hostname",
		messageFormat: "{module}: {msg}",
		destination: LOG_FD,
	},
}

export function jsonDestination() {
	return pino.destination({ fd: LOG_FD })
}

function createRootLogger() {
	return isDev
		? pino({ level, transport: prettyTransport })
		: pino(
				{ level, base: { pid: undefined, hostname: undefined } },
				jsonDestination(),
			)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export const logger = createRootLogger()

/** Raise or lower verbosity at runtime (e.g. from --verbose) */
export function setLogLevel(next: string): void {
	logger.level = next
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("walk")
 * log.debug({ url }, "scanning directory")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

export const log = {
	get walk() {
		return createLogger("walk")
	},
	get fetch() {
		return createLogger("fetch")
	},
	get extract() {
		return createLogger("extract")
	},
	get ledger() {
		return createLogger("ledger")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
