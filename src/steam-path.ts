/**
 * Steam install location detection
 */

import { execFile } from "node:child_process"
import { statSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { promisify } from "node:util"
import { log } from "./logger.js"

const execFileAsync = promisify(execFile)

export function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory()
	} catch {
		return false
	}
}

/**
 * Default install locations per platform, most likely first
 */
export function candidateSteamPaths(
	platform: NodeJS.Platform = process.platform,
	home: string = homedir(),
): string[] {
	switch (platform) {
		case "win32": {
			const programFilesX86 =
				process.env["ProgramFiles(x86)"] ?? "C:\\Program Files (x86)"
			const programFiles = process.env["ProgramFiles"] ?? "C:\\Program Files"
			return [
				...new Set([
					"C:\\Program Files (x86)\\Steam",
					"C:\\Program Files\\Steam",
					join(programFilesX86, "Steam"),
					join(programFiles, "Steam"),
				]),
			]
		}
		case "linux":
			return [
				join(home, ".steam", "steam"),
				join(home, ".local", "share", "Steam"),
				"/usr/share/steam",
				"/usr/local/share/steam",
			]
		case "darwin":
			return [join(home, "Library", "Application Support", "Steam")]
		default:
			return []
	}
}

/**
 * Pull the value out of `reg query` output:
 *     SteamPath    REG_SZ    c:/program files (x86)/steam
 */
export function parseRegistryValue(
	stdout: string,
	valueName: string,
): string | undefined {
	const wanted = valueName.toLowerCase()
	for (const line of stdout.split(/\r?\n/)) {
		const match = line.match(/^\s*(\S+)\s+REG_(?:EXPAND_)?SZ\s+(.+?)\s*$/i)
		if (match?.[1]?.toLowerCase() === wanted && match[2]) {
			return match[2]
		}
	}
	return undefined
}

async function readSteamPathFromRegistry(): Promise<string | undefined> {
	try {
		const { stdout } = await execFileAsync(
			"reg",
			["query", "HKCU\\Software\\Valve\\Steam", "/v", "SteamPath"],
			{ windowsHide: true },
		)
		return parseRegistryValue(stdout, "SteamPath")
	} catch (err) {
		log.cli.debug(
			{ error: err instanceof Error ? err.message : String(err) },
			"registry lookup failed",
		)
		return undefined
	}
}

/**
 * Find the Steam install directory, or undefined if none is found.
 */
export async function detectSteamPath(
	platform: NodeJS.Platform = process.platform,
): Promise<string | undefined> {
	if (platform === "win32") {
		const fromRegistry = await readSteamPathFromRegistry()
		if (fromRegistry && isDirectory(fromRegistry)) {
			return fromRegistry
		}
	}

	return candidateSteamPaths(platform).find(isDirectory)
}
