/**
 * Core module exports
 *
 * UI-independent pipeline stages. Each is an async generator of events.
 */

export { walk, walkTree } from "./walker.js"
export type { WalkOptions } from "./walker.js"
export {
	fetchAll,
	collectFetchResults,
	PROGRESS_INTERVAL,
} from "./downloader.js"
export type { FetchAllOptions } from "./downloader.js"
export { runMirror } from "./pipeline.js"
export type { MirrorDeps } from "./pipeline.js"
export type * from "./types.js"
