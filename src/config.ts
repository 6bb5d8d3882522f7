/**
 * Configuration management with Zod validation
 *
 * Precedence: CLI flags > environment (including .env) > built-in defaults.
 */

import { z } from "zod"
import { ConfigurationError } from "./errors.js"
import { parseRegionList, resolveRegionAliases } from "./filters.js"

/** Ledger file, resolved against the working directory */
export const DEFAULT_DB_FILE = "downloads.db"

export const DEFAULT_USER_AGENT =
	"treefetch/1.0 (directory mirror; set USER_AGENT to identify yourself)"

const ConfigSchema = z.object({
	baseUrl: z.string().url(),
	downloadDir: z.string().min(1),
	maxThreads: z.number().int().min(1).max(64).default(8),
	/** Request timeout in seconds (connect, headers and idle body reads) */
	timeout: z.number().int().min(1).default(20),
	dbFile: z.string().min(1).default(DEFAULT_DB_FILE),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
	/** Region names after alias resolution; undefined disables filtering */
	regions: z.array(z.string().min(1)).min(1).optional(),
	countOnly: z.boolean().default(false),
	/** Base backoff in seconds; attempt n waits retryDelay * 2^n */
	retryDelay: z.number().min(0).default(1),
})

export type MirrorConfig = z.infer<typeof ConfigSchema>

/** Values as they arrive from commander; every field is optional */
export interface CliFlags {
	url?: string | undefined
	downloadDir?: string | undefined
	threads?: number | undefined
	timeout?: number | undefined
	dbFile?: string | undefined
	userAgent?: string | undefined
	region?: string[] | undefined
	count?: boolean | undefined
	retryDelay?: number | undefined
}

export type Env = Record<string, string | undefined>

function envString(env: Env, name: string): string | undefined {
	const value = env[name]?.trim()
	return value ? value : undefined
}

function envNumber(env: Env, name: string): number | undefined {
	const raw = envString(env, name)
	if (raw === undefined) return undefined
	const parsed = Number(raw)
	if (!Number.isFinite(parsed)) {
		throw new ConfigurationError(`${name} must be a number, got "${raw}"`)
	}
	return parsed
}

/**
 * Canonical root URL with a trailing separator. Discovered links are
 * serialized by the URL parser, so the root must be too, or prefix checks
 * fail on spaces, host case and default ports. Unparseable input is
 * returned as-is for validation to reject.
 */
export function normalizeBaseUrl(url: string): string {
	const withSlash = url.endsWith("/") ? url : `${url}/`
	try {
		return new URL(withSlash).href
	} catch {
		return withSlash
	}
}

/**
 * Merge CLI flags over environment values and validate the result.
 *
 * @throws ConfigurationError when the root URL or output directory is missing,
 * or any value fails validation
 */
export function resolveConfig(
	flags: CliFlags,
	env: Env = process.env,
): MirrorConfig {
	const baseUrl = flags.url ?? envString(env, "BASE_URL")
	if (!baseUrl) {
		throw new ConfigurationError(
			"No base URL specified. Use -u/--url or set BASE_URL",
		)
	}

	const downloadDir = flags.downloadDir ?? envString(env, "DOWNLOAD_DIR")
	if (!downloadDir) {
		throw new ConfigurationError(
			"No download directory specified. Use -d/--download-dir or set DOWNLOAD_DIR",
		)
	}

	const rawRegions =
		flags.region ?? parseRegionList(envString(env, "REGION") ?? "")
	const regions =
		rawRegions.length > 0 ? resolveRegionAliases(rawRegions) : undefined

	const candidate = {
		baseUrl: normalizeBaseUrl(baseUrl),
		downloadDir,
		maxThreads: flags.threads ?? envNumber(env, "MAX_THREADS"),
		timeout: flags.timeout ?? envNumber(env, "TIMEOUT"),
		dbFile: flags.dbFile ?? envString(env, "DB_FILE"),
		userAgent: flags.userAgent ?? envString(env, "USER_AGENT"),
		regions,
		countOnly: flags.count ?? false,
		retryDelay: flags.retryDelay ?? envNumber(env, "RETRY_DELAY"),
	}

	const parsed = ConfigSchema.safeParse(candidate)
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
			.join("; ")
		throw new ConfigurationError(`Invalid configuration: ${issues}`)
	}
	return parsed.data
}
