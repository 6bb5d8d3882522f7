/**
 * URL to local path mapping
 */

import { join } from "node:path"

export function safeDecodeURIComponent(value: string): string {
	try {
		return decodeURIComponent(value)
	} catch {
		return value
	}
}

/**
 * Relative output path for a leaf URL: root prefix stripped, percent-decoded,
 * separators trimmed. Empty, "." and ".." segments are dropped so the result
 * always stays inside the download directory.
 *
 * @example
 * toRelativePath("https://host/files/GBA/Game%20(USA).zip", "https://host/files/")
 * // => "GBA/Game (USA).zip"
 */
export function toRelativePath(url: string, rootUrl: string): string {
	const remainder = url.startsWith(rootUrl) ? url.slice(rootUrl.length) : url
	return safeDecodeURIComponent(remainder)
		.split(/[\\/]+/)
		.filter(segment => segment !== "" && segment !== "." && segment !== "..")
		.join("/")
}

/**
 * Absolute-or-relative local path for a relative output path
 */
export function resolveLocalPath(
	downloadDir: string,
	relativePath: string,
): string {
	return join(downloadDir, ...relativePath.split("/"))
}
