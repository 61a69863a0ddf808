/**
 * Desktop icon refresh
 *
 * Windows caches shortcut icons in Explorer; restarting it makes the new
 * .ico files show up without a reboot.
 */

import { execFile, spawn } from "node:child_process"
import { promisify } from "node:util"
import { log } from "./logger.js"

const execFileAsync = promisify(execFile)

export interface ShellRefreshResult {
	attempted: boolean
	ok: boolean
	error?: string | undefined
}

export function supportsShellRefresh(
	platform: NodeJS.Platform = process.platform,
): boolean {
	return platform === "win32"
}

/**
 * Restart explorer.exe. Failures are returned, never thrown.
 */
export async function refreshShellIcons(
	platform: NodeJS.Platform = process.platform,
): Promise<ShellRefreshResult> {
	if (!supportsShellRefresh(platform)) {
		return { attempted: false, ok: true }
	}

	try {
		log.shell.info("restarting Windows Explorer")
		await execFileAsync("taskkill", ["/IM", "explorer.exe", "/F"], {
			windowsHide: true,
			timeout: 5000,
		})
		const child = spawn("explorer.exe", [], { detached: true, stdio: "ignore" })
		child.unref()
		return { attempted: true, ok: true }
	} catch (err) {
		const error = err instanceof Error ? err.message : String(err)
		log.shell.warn({ error }, "failed to restart Explorer")
		return { attempted: true, ok: false, error }
	}
}
