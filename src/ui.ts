/**
 * Terminal output helpers with consistent styling
 *
 * Everything the user reads goes through here; pino output (stderr) is
 * for diagnostics only.
 */

import chalk from "chalk"
import ora, { type Ora } from "ora"
import QRCode from "qrcode"
import type { RestoreItemCompleteEvent, RestoreSummary } from "./core/types.js"
import type { ChallengeRenderer } from "./session/auth.js"

const RULE = "=".repeat(60)

export const ui = {
	/** Startup banner */
	banner(version: string): void {
		console.log(chalk.bold("Steam Icon Restorer") + ` v${version}`)
		console.log()
	},

	/** Success message with checkmark */
	success(text: string): void {
		console.log(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		console.error(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		console.log(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		console.log(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			console.log(chalk.dim("  → " + text))
		}
	},

	/** Spinner for the short blocking phases */
	spinner(text: string): Ora {
		return ora({ text, stream: process.stdout }).start()
	},

	/** One line per processed game */
	item(event: RestoreItemCompleteEvent): void {
		console.log(formatItemLine(event))
	},

	/** Final counts */
	summary(summary: RestoreSummary): void {
		console.log()
		console.log(RULE)
		console.log(chalk.bold("Icon restoration complete!"))
		console.log(`Successful: ${chalk.green(String(summary.successCount))}`)
		console.log(`Failed/Skipped: ${chalk.yellow(String(summary.failureCount))}`)
		console.log(`Total: ${summary.total}`)
		if (summary.interrupted) {
			console.log(chalk.yellow("Stopped early: the Steam session was closed."))
		}
		console.log(RULE)
	},
}

/**
 * `[3/12] Portal 2 (AppID: 620)... [OK]`
 */
export function formatItemLine(event: RestoreItemCompleteEvent): string {
	const prefix = `[${event.index}/${event.total}] ${event.game.name} (AppID: ${event.game.appId})...`
	switch (event.status) {
		case "ok":
			return `${prefix} ${chalk.green("[OK]")}`
		case "skipped":
			return `${prefix} ${chalk.yellow(`[SKIPPED - ${event.detail ?? "no icon available"}]`)}`
		case "failed":
			return `${prefix} ${chalk.red(`[FAILED - ${event.detail ?? "unknown error"}]`)}`
	}
}

/**
 * Shows the device-linked login challenge as a terminal QR code, falling
 * back to the bare URL when the code cannot be drawn.
 */
export class TerminalChallengeRenderer implements ChallengeRenderer {
	async render(url: string, refreshed: boolean): Promise<void> {
		console.log()
		if (refreshed) {
			ui.info("Steam has refreshed the challenge URL")
		}
		ui.info("Use the Steam Mobile App to sign in via QR code:")

		try {
			const code = await QRCode.toString(url, { type: "terminal" })
			console.log(code)
		} catch (err) {
			ui.warn(
				`Could not draw QR code (${err instanceof Error ? err.message : String(err)})`,
			)
		}
		console.log(`Challenge URL: ${chalk.cyan(url)}`)
		console.log()
	}
}
