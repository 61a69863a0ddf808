/**
 * Icon restore pipeline
 *
 * Walks the installed games one at a time: resolve the client icon token
 * through the logged-on session, download the .ico, count the result.
 * A failing game never stops the batch; only a dropped session does.
 *
 * Usage:
 * ```ts
 * for await (const event of restoreIcons(games, context, options)) {
 *   switch (event.type) {
 *     case 'item-complete': printLine(event); break;
 *     case 'complete': printSummary(event.summary); break;
 *   }
 * }
 * ```
 */

import { log } from "../logger.js"
import type { SessionContext } from "../session/orchestrator.js"
import type { GameRecord } from "../types.js"
import { downloadIcon, iconUrl, resolveClientIcon } from "./icons.js"
import type { IconResolution, RestoreEvent, RestoreOptions } from "./types.js"

const SKIP_DETAILS: Record<NonNullable<IconResolution["reason"]>, string> = {
	"app-missing": "no icon available",
	"no-common-section": "no icon available",
	"no-client-icon": "no icon available",
	timeout: "no icon available (lookup timed out)",
	aborted: "session closed",
}

export async function* restoreIcons(
	games: GameRecord[],
	context: SessionContext,
	options: RestoreOptions,
): AsyncGenerator<RestoreEvent> {
	const startedAt = Date.now()
	const total = games.length
	let successCount = 0
	let failureCount = 0
	let interrupted = false

	yield { type: "start", total }

	for (const [i, game] of games.entries()) {
		const index = i + 1
		if (context.signal.aborted) {
			// Games never looked up count as skipped
			interrupted = true
			failureCount += total - i
			yield { type: "interrupted", processed: i, total }
			break
		}

		let resolution: IconResolution
		try {
			resolution = await resolveClientIcon(
				context,
				game.appId,
				options.metadataTimeoutMs,
			)
		} catch (err) {
			const error = err instanceof Error ? err.message : String(err)
			log.icons.warn({ appId: game.appId, error }, "product info request failed")
			failureCount++
			yield {
				type: "item-complete",
				index,
				total,
				game,
				status: "failed",
				detail: `lookup error - ${error}`,
			}
			continue
		}

		yield { type: "resolve", index, total, game, resolution }

		if (!resolution.iconToken) {
			failureCount++
			yield {
				type: "item-complete",
				index,
				total,
				game,
				status: "skipped",
				detail: SKIP_DETAILS[resolution.reason ?? "no-client-icon"],
			}
			continue
		}

		const outcome = await downloadIcon(
			game.appId,
			resolution.iconToken,
			options.steamPath,
			options.download,
		)
		yield {
			type: "download",
			index,
			game,
			url: iconUrl(game.appId, resolution.iconToken),
			outcome,
		}

		if (outcome.success) {
			successCount++
			yield { type: "item-complete", index, total, game, status: "ok" }
		} else {
			failureCount++
			log.icons.warn(
				{ appId: game.appId, error: outcome.error },
				"icon download failed",
			)
			yield {
				type: "item-complete",
				index,
				total,
				game,
				status: "failed",
				detail: `download error - ${outcome.error ?? "unknown error"}`,
			}
		}
	}

	yield {
		type: "complete",
		summary: { successCount, failureCount, total, interrupted },
		durationMs: Date.now() - startedAt,
	}
}
