/**
 * Shared HTTP client for listing pages and file transfers
 *
 * One undici Agent per run, sized to the worker count so concurrent
 * transfers never wait on the pool. Constructed once and passed to every
 * worker; nothing about it changes after setup.
 */

import { Agent, fetch, type Dispatcher, type Response } from "undici"
import { TransientFetchError, describeError } from "./errors.js"

export interface MirrorClientOptions {
	userAgent: string
	/** Seconds allowed for connect, response headers and each body read */
	timeout: number
	/** Pool size; use the worker count */
	connections: number
	/** Replace the pooled agent (tests use undici's MockAgent) */
	dispatcher?: Dispatcher | undefined
}

/**
 * undici reports every transport failure as "fetch failed"; the useful part
 * (ECONNRESET, timeout, DNS) lives on the cause.
 */
function transportMessage(err: unknown): string {
	const message = describeError(err)
	if (err instanceof Error && err.cause !== undefined) {
		return `${message} (${describeError(err.cause)})`
	}
	return message
}

export class MirrorClient {
	private readonly dispatcher: Dispatcher
	private readonly ownsDispatcher: boolean
	private readonly userAgent: string

	constructor(options: MirrorClientOptions) {
		this.userAgent = options.userAgent
		if (options.dispatcher) {
			this.dispatcher = options.dispatcher
			this.ownsDispatcher = false
		} else {
			const timeoutMs = options.timeout * 1000
			this.dispatcher = new Agent({
				connections: options.connections,
				keepAliveTimeout: 30_000,
				headersTimeout: timeoutMs,
				bodyTimeout: timeoutMs,
				connect: { timeout: timeoutMs },
			})
			this.ownsDispatcher = true
		}
	}

	/**
	 * GET a URL, resolving only for 2xx responses.
	 *
	 * @throws TransientFetchError on transport errors or non-2xx status
	 */
	async get(url: string, signal?: AbortSignal): Promise<Response> {
		let response: Response
		try {
			response = await fetch(url, {
				headers: { "User-Agent": this.userAgent },
				dispatcher: this.dispatcher,
				...(signal ? { signal } : {}),
			})
		} catch (err) {
			throw new TransientFetchError(transportMessage(err), { cause: err })
		}

		if (!response.ok) {
			// Release the connection back to the pool
			await response.body?.cancel()
			throw new TransientFetchError(
				`HTTP ${response.status}: ${response.statusText}`,
				{ status: response.status },
			)
		}
		return response
	}

	/** GET a listing page body as text */
	async getText(url: string, signal?: AbortSignal): Promise<string> {
		const response = await this.get(url, signal)
		try {
			return await response.text()
		} catch (err) {
			throw new TransientFetchError(transportMessage(err), { cause: err })
		}
	}

	/** Release pooled connections; an injected dispatcher is left to its owner */
	async close(): Promise<void> {
		if (this.ownsDispatcher) {
			await this.dispatcher.close()
		}
	}
}
