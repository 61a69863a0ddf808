/**
 * One complete restore run, minus the terminal
 *
 * The CLI resolves options and renders events; everything between the
 * Steam install path and the final summary happens here so it can be
 * driven with a fake session in tests.
 */

import type { Dispatcher } from "undici"
import { restoreIcons } from "./core/restore.js"
import type { RestoreEvent, RestoreSummary } from "./core/types.js"
import { discoverLibraries, findInstalledGames, type ManifestWarning } from "./library.js"
import { log } from "./logger.js"
import type { AuthFlow } from "./session/auth.js"
import { SessionOrchestrator } from "./session/orchestrator.js"
import type { SteamSession } from "./session/types.js"
import {
	refreshShellIcons,
	supportsShellRefresh,
	type ShellRefreshResult,
} from "./shell.js"
import type { GameRecord, RestoreRunOptions } from "./types.js"

export interface InstallScan {
	libraries: string[]
	games: GameRecord[]
	warnings: ManifestWarning[]
}

/**
 * Everything that can be learned without a network connection. Throws
 * ConfigurationError when the library folders file is missing or broken.
 */
export async function scanInstall(steamPath: string): Promise<InstallScan> {
	const libraries = await discoverLibraries(steamPath)
	const { games, warnings } = await findInstalledGames(libraries)
	log.cli.debug(
		{ libraries: libraries.length, games: games.length, skipped: warnings.length },
		"install scanned",
	)
	return { libraries, games, warnings }
}

export interface RestoreDependencies {
	session: SteamSession
	authFlow: AuthFlow
	/** undici dispatcher for icon downloads; tests pass a MockAgent */
	dispatcher?: Dispatcher | undefined
	platform?: NodeJS.Platform | undefined
	refreshShell?: ((platform: NodeJS.Platform) => Promise<ShellRefreshResult>) | undefined
	onEvent?: ((event: RestoreEvent) => void) | undefined
}

export interface RestoreRunResult {
	summary: RestoreSummary
	durationMs: number
	shell: ShellRefreshResult
}

/**
 * Log on, restore every game's icon, log off, then refresh the shell if
 * anything was written. Throws AuthenticationError when logon fails.
 */
export async function restoreSteamIcons(
	games: GameRecord[],
	settings: RestoreRunOptions,
	deps: RestoreDependencies,
): Promise<RestoreRunResult> {
	const orchestrator = new SessionOrchestrator(deps.session, deps.authFlow, {
		pumpIntervalMs: settings.pumpIntervalMs,
		logoffGraceMs: settings.logoffGraceMs,
	})

	const completed = await orchestrator.run(async context => {
		let last: { summary: RestoreSummary; durationMs: number } | undefined
		for await (const event of restoreIcons(games, context, {
			steamPath: settings.steamPath,
			metadataTimeoutMs: settings.metadataTimeoutMs,
			download: {
				timeoutMs: settings.downloadTimeoutMs,
				dispatcher: deps.dispatcher,
			},
		})) {
			deps.onEvent?.(event)
			if (event.type === "complete") {
				last = { summary: event.summary, durationMs: event.durationMs }
			}
		}
		return (
			last ?? {
				summary: { successCount: 0, failureCount: 0, total: games.length, interrupted: true },
				durationMs: 0,
			}
		)
	})

	const platform = deps.platform ?? process.platform
	let shell: ShellRefreshResult = { attempted: false, ok: true }
	if (
		completed.summary.successCount > 0 &&
		settings.restartShell &&
		supportsShellRefresh(platform)
	) {
		shell = await (deps.refreshShell ?? refreshShellIcons)(platform)
	}

	return { ...completed, shell }
}
