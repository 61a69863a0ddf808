/**
 * Steam library discovery and app manifest reading
 *
 * libraryfolders.vdf lists every library root; each root's steamapps/
 * directory holds one appmanifest_<id>.acf per installed app.
 */

import { existsSync } from "node:fs"
import { readdir } from "node:fs/promises"
import { join } from "node:path"
import { ConfigurationError } from "./errors.js"
import { childValue, readKeyValuesFile } from "./keyvalues.js"
import { log } from "./logger.js"
import { isDirectory } from "./steam-path.js"
import type { GameRecord } from "./types.js"

const LIBRARY_FOLDERS_ROOT = "libraryfolders"
const MANIFEST_PATTERN = /^appmanifest_.*\.acf$/i
const MAX_APP_ID = 0xffffffff

export interface ManifestWarning {
	manifestPath: string
	error: string
}

export interface InstalledGames {
	games: GameRecord[]
	/** Manifests that were skipped */
	warnings: ManifestWarning[]
}

export function libraryFoldersPath(steamPath: string): string {
	return join(steamPath, "steamapps", "libraryfolders.vdf")
}

/**
 * Read libraryfolders.vdf and return every library root that exists on disk,
 * in file order. A missing or malformed file is fatal.
 */
export async function discoverLibraries(steamPath: string): Promise<string[]> {
	const file = libraryFoldersPath(steamPath)
	if (!existsSync(file)) {
		throw new ConfigurationError(`Library folders file not found at: ${file}`)
	}

	const parsed = await readKeyValuesFile(file)
	if (!parsed.ok) {
		throw new ConfigurationError(
			`Failed to read library folders file: ${parsed.error.message}`,
			{ cause: parsed.error },
		)
	}

	const root = parsed.node
	if (root.name.toLowerCase() !== LIBRARY_FOLDERS_ROOT) {
		throw new ConfigurationError(
			`Invalid library folders file format: expected root "${LIBRARY_FOLDERS_ROOT}", found "${root.name}"`,
		)
	}

	const libraries: string[] = []
	for (const entry of root.children) {
		// Older clients wrote `"1" "D:\\SteamLibrary"` instead of a section
		const path =
			entry.value !== undefined && /^\d+$/.test(entry.name)
				? entry.value
				: childValue(entry, "path")

		if (!path) continue
		if (!isDirectory(path)) {
			log.library.debug({ path }, "library folder missing on disk")
			continue
		}
		libraries.push(path)
	}

	log.library.debug({ count: libraries.length }, "libraries discovered")
	return libraries
}

/**
 * Parse an app id the way Steam stores it: a decimal uint32.
 */
export function parseAppId(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined
	const trimmed = raw.trim()
	if (!/^\d+$/.test(trimmed)) return undefined
	const value = Number(trimmed)
	return value <= MAX_APP_ID ? value : undefined
}

export function fallbackGameName(appId: number): string {
	return `Unknown Game (${appId})`
}

/**
 * Read a single appmanifest file.
 * Returns the record, or an error message when the file must be skipped.
 */
export async function readManifest(
	manifestPath: string,
): Promise<{ game?: GameRecord; error?: string }> {
	const parsed = await readKeyValuesFile(manifestPath)
	if (!parsed.ok) {
		return { error: parsed.error.reason }
	}

	const rawId = childValue(parsed.node, "appid")
	if (rawId === undefined) {
		return { error: "missing appid" }
	}
	const appId = parseAppId(rawId)
	if (appId === undefined) {
		return { error: `invalid appid "${rawId}"` }
	}

	const name = childValue(parsed.node, "name")
	return {
		game: { appId, name: name ?? fallbackGameName(appId), manifestPath },
	}
}

/**
 * Enumerate installed games across all libraries.
 *
 * Libraries are visited in the given order and manifests in sorted filename
 * order. Games installed in several libraries appear once per library.
 */
export async function findInstalledGames(
	libraries: string[],
): Promise<InstalledGames> {
	const games: GameRecord[] = []
	const warnings: ManifestWarning[] = []

	for (const library of libraries) {
		const steamAppsPath = join(library, "steamapps")
		if (!isDirectory(steamAppsPath)) continue

		let files: string[]
		try {
			files = await readdir(steamAppsPath)
		} catch (err) {
			log.library.warn(
				{ steamAppsPath, error: err instanceof Error ? err.message : String(err) },
				"cannot list steamapps directory",
			)
			continue
		}

		const manifests = files.filter(f => MANIFEST_PATTERN.test(f)).sort()
		for (const file of manifests) {
			const manifestPath = join(steamAppsPath, file)
			const { game, error } = await readManifest(manifestPath)
			if (game) {
				games.push(game)
			} else {
				const warning = { manifestPath, error: error ?? "unknown error" }
				log.library.warn(warning, "skipping manifest")
				warnings.push(warning)
			}
		}
	}

	return { games, warnings }
}
