/**
 * Client icon lookup and download
 *
 * Steam publishes each app's desktop icon as `common.clienticon` in its
 * PICS product info; the .ico itself lives on the community CDN.
 */

import { existsSync, unlinkSync } from "node:fs"
import { mkdir, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { Agent, fetch as undiciFetch } from "undici"
import { findChild, type KeyValueNode } from "../keyvalues.js"
import { log } from "../logger.js"
import type { SessionContext } from "../session/orchestrator.js"
import { CompletionSignal } from "../session/signal.js"
import type {
	DownloadOutcome,
	IconDownloadOptions,
	IconResolution,
} from "./types.js"

const ICON_CDN_BASE =
	"https://cdn.cloudflare.steamstatic.com/steamcommunity/public/images/apps"
const USER_AGENT = "steam-icon-restore/1.0.0"
const ICON_TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/

const ICON_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	connections: 4,
})

// ─────────────────────────────────────────────────────────────────────────────
// Resolve
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Pull the client icon token out of an app's product info.
 */
export function extractClientIcon(
	appId: number,
	appInfo: KeyValueNode | undefined,
): IconResolution {
	if (!appInfo) {
		return { appId, reason: "app-missing" }
	}
	const common = findChild(appInfo, "common")
	if (!common) {
		return { appId, reason: "no-common-section" }
	}
	const token = findChild(common, "clienticon")?.value?.trim()
	if (!token) {
		return { appId, reason: "no-client-icon" }
	}
	return { appId, iconToken: token }
}

/**
 * Ask Steam for an app's product info and wait, up to timeoutMs, for the
 * answer. The response subscription is released on every path; a response
 * arriving after the timeout finds nobody listening.
 */
export async function resolveClientIcon(
	context: SessionContext,
	appId: number,
	timeoutMs: number,
): Promise<IconResolution> {
	const answer = new CompletionSignal<IconResolution>()
	const subscription = context.pump.subscribe("productInfo", event => {
		if (!event.requested.includes(appId)) return
		answer.resolve(extractClientIcon(appId, event.apps.get(appId)))
	})

	try {
		log.icons.debug({ appId }, "requesting product info")
		context.session.requestProductInfo([appId])

		const waited = await answer.wait(timeoutMs, context.signal)
		switch (waited.status) {
			case "resolved":
				return waited.value
			case "timeout":
				log.icons.warn({ appId, timeoutMs }, "timeout waiting for app info")
				return { appId, reason: "timeout" }
			case "aborted":
				return { appId, reason: "aborted" }
		}
	} finally {
		subscription.dispose()
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Download
// ─────────────────────────────────────────────────────────────────────────────

export function iconUrl(appId: number, iconToken: string): string {
	return `${ICON_CDN_BASE}/${appId}/${iconToken}.ico`
}

/** Where the Steam client looks for a game's shortcut icon */
export function iconPath(steamPath: string, iconToken: string): string {
	return join(steamPath, "steam", "games", `${iconToken}.ico`)
}

function cleanupPartFile(partPath: string): void {
	try {
		if (existsSync(partPath)) {
			unlinkSync(partPath)
		}
	} catch (err) {
		log.icons.debug(
			{ partPath, error: err instanceof Error ? err.message : String(err) },
			"could not remove partial file",
		)
	}
}

/**
 * Fetch an icon and write it to the Steam games folder.
 * Network and filesystem errors become a failed outcome.
 */
export async function downloadIcon(
	appId: number,
	iconToken: string,
	steamPath: string,
	options: IconDownloadOptions,
): Promise<DownloadOutcome> {
	if (!ICON_TOKEN_PATTERN.test(iconToken)) {
		return { appId, success: false, error: `Invalid icon token "${iconToken}"` }
	}

	const url = iconUrl(appId, iconToken)
	const destPath = iconPath(steamPath, iconToken)
	const partPath = `${destPath}.part`

	try {
		const response = await undiciFetch(url, {
			headers: { "User-Agent": USER_AGENT },
			dispatcher: options.dispatcher ?? ICON_AGENT,
			signal: AbortSignal.timeout(options.timeoutMs),
		})

		if (!response.ok) {
			// Drain so the connection can be reused
			await response.arrayBuffer().catch(() => undefined)
			return {
				appId,
				success: false,
				error: `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ""}`,
			}
		}

		const bytes = Buffer.from(await response.arrayBuffer())
		if (bytes.length === 0) {
			return { appId, success: false, error: "Downloaded file is empty" }
		}

		await mkdir(dirname(destPath), { recursive: true })
		await writeFile(partPath, bytes)
		await rename(partPath, destPath)

		log.icons.debug({ appId, destPath, bytes: bytes.length }, "icon saved")
		return { appId, success: true, path: destPath }
	} catch (err) {
		cleanupPartFile(partPath)
		const message =
			err instanceof Error && err.name === "TimeoutError"
				? `Timed out after ${options.timeoutMs}ms`
				: err instanceof Error
					? err.message
					: String(err)
		return { appId, success: false, error: message }
	}
}
