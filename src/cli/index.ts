#!/usr/bin/env node
/**
 * steam-icon-restore CLI
 * Restores missing desktop and Start menu icons for installed Steam games
 */

import { Command, Option } from "commander"
import { loadConfig, type Config } from "../config.js"
import type { RestoreEvent } from "../core/types.js"
import { ConfigurationError, errorMessage } from "../errors.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import {
	ConsoleSteamGuardAuthenticator,
	promptAuthMethod,
	promptCredentials,
	promptSteamPath,
	setupPromptHandlers,
} from "../prompts.js"
import { restoreSteamIcons, scanInstall } from "../run.js"
import { createAuthFlow, type AuthFlow } from "../session/auth.js"
import { SteamUserSession } from "../session/steam-user-session.js"
import { detectSteamPath, isDirectory } from "../steam-path.js"
import type { AuthMethod } from "../types.js"
import { TerminalChallengeRenderer, ui } from "../ui.js"

const VERSION = "1.0.0"

interface CliOptions {
	username?: string
	password?: string
	qr?: boolean
	useQrCode?: boolean
	steamPath?: string
	interactive?: boolean
	verbose?: boolean
	restartShell: boolean
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(`Could not flush logs: ${errorMessage(err)}`)
	}
	process.exitCode = code
}

// ─────────────────────────────────────────────────────────────────────────────
// Option resolution
// ─────────────────────────────────────────────────────────────────────────────

async function resolveSteamPath(
	options: CliOptions,
	config: Config,
	interactive: boolean,
): Promise<string> {
	let steamPath = options.steamPath ?? config.steamPath
	if (interactive) {
		steamPath = await promptSteamPath(steamPath ?? (await detectSteamPath()))
	} else if (!steamPath) {
		steamPath = await detectSteamPath()
		if (steamPath) ui.info(`Detected Steam installation: ${steamPath}`)
	}

	if (!steamPath) {
		throw new ConfigurationError(
			"Could not find a Steam installation. Use --steam-path to specify it.",
		)
	}
	if (!isDirectory(steamPath)) {
		throw new ConfigurationError(`Steam installation not found at: ${steamPath}`)
	}
	return steamPath
}

async function resolveAuthFlow(
	options: CliOptions,
	config: Config,
	interactive: boolean,
): Promise<AuthFlow> {
	const qrRequested = Boolean(options.qr || options.useQrCode)
	let method: AuthMethod = qrRequested || config.useQrCode ? "qr" : "credentials"
	if (interactive && !qrRequested && !options.username) {
		method = await promptAuthMethod(method)
	}

	if (method === "qr") {
		return createAuthFlow({ method: "qr", renderer: new TerminalChallengeRenderer() })
	}

	let username = options.username ?? config.username
	let password = options.password
	if (interactive && (!username || !password)) {
		const entered = await promptCredentials(username)
		username = entered.username
		password = entered.password
	}

	// Throws ConfigurationError before any connection when either is missing
	return createAuthFlow({
		method: "credentials",
		username,
		password,
		authenticator: new ConsoleSteamGuardAuthenticator(),
	})
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

function renderEvent(event: RestoreEvent, verbose: boolean): void {
	switch (event.type) {
		case "start":
			ui.info(`Restoring icons for ${event.total} games...`)
			console.log()
			break
		case "resolve":
			if (event.resolution.iconToken) {
				ui.debug(`${event.game.name}: icon ${event.resolution.iconToken}`, verbose)
			}
			break
		case "download":
			ui.debug(`GET ${event.url}`, verbose)
			break
		case "item-complete":
			ui.item(event)
			break
		case "interrupted":
			ui.warn(
				`Steam session closed after ${event.processed} of ${event.total} games`,
			)
			break
		case "complete":
			ui.debug(`Finished in ${(event.durationMs / 1000).toFixed(1)}s`, verbose)
			break
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(options: CliOptions, interactive: boolean): Promise<void> {
	const verbose = Boolean(options.verbose)
	configureLogging({ verbose })
	const config = loadConfig()

	ui.banner(VERSION)
	if (interactive) setupPromptHandlers()

	const steamPath = await resolveSteamPath(options, config, interactive)
	const authFlow = await resolveAuthFlow(options, config, interactive)

	const spinner = ui.spinner("Scanning Steam libraries...")
	let scan: Awaited<ReturnType<typeof scanInstall>>
	try {
		scan = await scanInstall(steamPath)
	} catch (err) {
		spinner.fail("Could not read Steam libraries")
		throw err
	}
	spinner.succeed(`Found ${scan.games.length} installed games.`)
	for (const warning of scan.warnings) {
		ui.warn(`Skipped ${warning.manifestPath}: ${warning.error}`)
	}

	if (scan.games.length === 0) {
		ui.warn("No installed games found; nothing to restore.")
		return
	}

	ui.info("Connecting to Steam...")
	const result = await restoreSteamIcons(
		scan.games,
		{
			steamPath,
			restartShell: options.restartShell && config.restartShell,
			metadataTimeoutMs: config.metadataTimeoutMs,
			downloadTimeoutMs: config.downloadTimeoutMs,
			pumpIntervalMs: config.pumpIntervalMs,
			logoffGraceMs: config.logoffGraceMs,
		},
		{
			session: new SteamUserSession(),
			authFlow,
			onEvent: event => renderEvent(event, verbose),
		},
	)

	ui.summary(result.summary)

	if (result.shell.attempted) {
		if (result.shell.ok) {
			ui.success("Windows Explorer restarted to refresh icons")
		} else {
			ui.warn(`Could not restart Windows Explorer: ${result.shell.error ?? "unknown error"}`)
		}
	} else if (result.summary.successCount > 0) {
		ui.info("Restart your desktop session if icons do not update right away.")
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("steam-icon-restore")
	.version(VERSION)
	.description("Restore missing Steam game shortcut icons")
	.option("-u, --username <name>", "Steam username")
	.option("-p, --password <password>", "Steam password")
	.option("-q, --qr", "Log in by scanning a QR code with the Steam Mobile App")
	.addOption(new Option("--use-qr-code", "Same as --qr").hideHelp())
	.option("-s, --steam-path <path>", "Steam installation directory")
	.option("-i, --interactive", "Prompt for every setting")
	.option("-v, --verbose", "Verbose output and debug logging")
	.option("--no-restart-shell", "Do not restart Windows Explorer afterwards")
	.action(async () => {
		const options = program.opts<CliOptions>()
		const interactive =
			Boolean(options.interactive) || process.argv.slice(2).length === 0

		try {
			await main(options, interactive)
		} catch (err) {
			log.cli.debug({ error: errorMessage(err) }, "run failed")
			if (options.verbose && err instanceof Error && err.stack) {
				ui.error(err.stack)
			} else {
				ui.error(`Error: ${errorMessage(err)}`)
			}
			await exitWithCode(1)
		}
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

program.parseAsync().catch(async err => {
	ui.error(`Error: ${errorMessage(err)}`)
	await exitWithCode(1)
})
