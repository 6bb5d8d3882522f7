/**
 * Progress spinner with spinner-safe logging
 *
 * ora disables itself when stdout is not a TTY, so piped or CI output is
 * plain lines only.
 */

import ora, { type Ora } from "ora"

// Global spinner reference for spinner-safe logging
let activeSpinner: Ora | null = null

/**
 * Print a line without tearing an active spinner.
 * Stops the spinner, prints the message, then restarts it.
 */
export function spinnerSafeLog(message: string): void {
	if (activeSpinner?.isSpinning) {
		const text = activeSpinner.text
		activeSpinner.stop()
		console.log(message)
		activeSpinner.start(text)
	} else {
		console.log(message)
	}
}

export interface ProgressSpinner {
	update(completed: number, total: number): void
	stop(): void
}

/**
 * Spinner showing "<label>: completed/total". Returns a no-op in quiet mode.
 */
export function startProgressSpinner(
	label: string,
	total: number,
	quiet: boolean,
): ProgressSpinner {
	if (quiet || total === 0) {
		return { update: () => {}, stop: () => {} }
	}

	const spinner = ora(`${label}: 0/${total}`).start()
	activeSpinner = spinner

	return {
		update(completed: number, nextTotal: number): void {
			spinner.text = `${label}: ${completed}/${nextTotal}`
		},
		stop(): void {
			spinner.stop()
			if (activeSpinner === spinner) activeSpinner = null
		},
	}
}
