/**
 * Terminal output helpers with consistent styling
 *
 * Every download outcome gets its own tagged line so a run can be audited
 * from its output alone.
 */

import chalk from "chalk"
import { spinnerSafeLog } from "./spinner.js"

export const ui = {
	/** Skipped because the ledger already has it */
	skip(text: string): void {
		spinnerSafeLog(chalk.dim("[SKIP]  ") + text)
	},

	/** Downloaded and recorded */
	ok(text: string): void {
		spinnerSafeLog(chalk.green("[OK]    ") + text)
	},

	/** Attempt failed, another one follows */
	retry(text: string): void {
		spinnerSafeLog(chalk.yellow("[RETRY] ") + text)
	},

	/** Terminal failure */
	fail(text: string): void {
		spinnerSafeLog(chalk.red("[FAIL]  ") + text)
	},

	/** Archive unpacked */
	extract(text: string): void {
		spinnerSafeLog(chalk.cyan("[UNZIP] ") + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("[WARN]  ") + text)
	},

	error(text: string): void {
		spinnerSafeLog(chalk.red("[ERROR] ") + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("[INFO]  ") + text)
	},

	/** Banner for startup */
	banner(
		version: string,
		rootUrl: string,
		downloadDir: string,
		threads: number,
		regions?: string[],
	): void {
		console.log(chalk.bold("treefetch") + ` v${version}`)
		console.log(`Source: ${chalk.cyan(rootUrl)}`)
		console.log(`Target: ${chalk.cyan(downloadDir)}`)
		console.log(`Threads: ${chalk.cyan(String(threads))}`)
		if (regions) {
			console.log(`Regions: ${chalk.cyan(regions.join(", "))}`)
		}
		console.log()
	},

	/** Final status line */
	finalStatus(failed: number, cancelled: boolean): void {
		console.log()
		if (cancelled) {
			console.log(chalk.yellow.bold("⚠ Run interrupted. Re-run to continue."))
		} else if (failed === 0) {
			console.log(chalk.green.bold("✓ All downloads completed."))
		} else {
			console.log(
				chalk.yellow.bold(`⚠ ${failed} file(s) failed. See [FAIL] lines above.`),
			)
		}
	},
}
