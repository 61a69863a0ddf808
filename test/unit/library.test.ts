/**
 * Unit tests for library discovery and manifest reading
 */

import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, it, expect } from "vitest"
import { ConfigurationError } from "../../src/errors.js"
import {
	discoverLibraries,
	fallbackGameName,
	findInstalledGames,
	libraryFoldersPath,
	parseAppId,
	readManifest,
} from "../../src/library.js"
import { withTempDir, writeLibraryFolders, writeManifest } from "../helpers/index.js"

describe("discoverLibraries", () => {
	it("returns existing library roots in file order", async () => {
		await withTempDir(async dir => {
			const steam = join(dir, "Steam")
			const second = join(dir, "Library2")
			await mkdir(second, { recursive: true })
			await writeLibraryFolders(steam, [steam, join(dir, "Unplugged"), second])

			const libraries = await discoverLibraries(steam)

			expect(libraries).toEqual([steam, second])
		})
	})

	it("accepts the legacy flat layout", async () => {
		await withTempDir(async dir => {
			const steam = join(dir, "Steam")
			const extra = join(dir, "Extra")
			await mkdir(join(steam, "steamapps"), { recursive: true })
			await mkdir(extra)
			await writeFile(
				libraryFoldersPath(steam),
				`"LibraryFolders"\n{\n\t"TimeNextStatsReport"\t"1700000000"\n\t"1"\t"${extra}"\n}\n`,
			)

			expect(await discoverLibraries(steam)).toEqual([extra])
		})
	})

	it("fails when the file is missing", async () => {
		await withTempDir(async dir => {
			const promise = discoverLibraries(dir)

			await expect(promise).rejects.toBeInstanceOf(ConfigurationError)
			await expect(promise).rejects.toThrow(
				`Library folders file not found at: ${libraryFoldersPath(dir)}`,
			)
		})
	})

	it("fails when the file is malformed", async () => {
		await withTempDir(async dir => {
			await mkdir(join(dir, "steamapps"))
			await writeFile(libraryFoldersPath(dir), '"libraryfolders"\n{\n\t"0"\n\t{\n')

			await expect(discoverLibraries(dir)).rejects.toThrow(
				/^Failed to read library folders file: .*libraryfolders\.vdf, line 4: unbalanced braces: section "0"/,
			)
		})
	})

	it("fails when the root is not libraryfolders", async () => {
		await withTempDir(async dir => {
			await mkdir(join(dir, "steamapps"))
			await writeFile(libraryFoldersPath(dir), '"AppState" { "appid" "10" }')

			await expect(discoverLibraries(dir)).rejects.toThrow(
				'Invalid library folders file format: expected root "libraryfolders", found "AppState"',
			)
		})
	})
})

describe("parseAppId", () => {
	it("accepts decimal uint32 values", () => {
		expect(parseAppId("10")).toBe(10)
		expect(parseAppId(" 42 ")).toBe(42)
		expect(parseAppId("4294967295")).toBe(4294967295)
	})

	it("rejects everything else", () => {
		expect(parseAppId(undefined)).toBeUndefined()
		expect(parseAppId("")).toBeUndefined()
		expect(parseAppId("-1")).toBeUndefined()
		expect(parseAppId("1e3")).toBeUndefined()
		expect(parseAppId("4294967296")).toBeUndefined()
	})
})

describe("readManifest", () => {
	it("falls back to a placeholder name", async () => {
		await withTempDir(async dir => {
			const path = await writeManifest(dir, 20, undefined)

			const { game, error } = await readManifest(path)

			expect(error).toBeUndefined()
			expect(game).toEqual({ appId: 20, name: "Unknown Game (20)", manifestPath: path })
		})
	})

	it("reports a missing or invalid appid", async () => {
		await withTempDir(async dir => {
			const noId = join(dir, "appmanifest_x.acf")
			await writeFile(noId, '"AppState" { "name" "Nameless" }')
			const badId = await writeManifest(dir, "abc", "Broken")

			expect(await readManifest(noId)).toEqual({ error: "missing appid" })
			expect(await readManifest(badId)).toEqual({ error: 'invalid appid "abc"' })
		})
	})

	it("reports a parse failure", async () => {
		await withTempDir(async dir => {
			const path = join(dir, "appmanifest_1.acf")
			await writeFile(path, "")

			expect(await readManifest(path)).toEqual({ error: "document is empty" })
		})
	})
})

describe("findInstalledGames", () => {
	it("lists games across libraries and skips broken manifests", async () => {
		await withTempDir(async dir => {
			const first = join(dir, "Steam")
			const second = join(dir, "Library2")
			const alpha = await writeManifest(first, 10, "Alpha")
			const broken = join(first, "steamapps", "appmanifest_bad.acf")
			await writeFile(broken, '"AppState" {')
			const unnamed = await writeManifest(second, 20, undefined)
			await writeFile(join(second, "steamapps", "libraryfolders.vdf"), "ignored")

			const { games, warnings } = await findInstalledGames([first, second])

			expect(games).toEqual([
				{ appId: 10, name: "Alpha", manifestPath: alpha },
				{ appId: 20, name: fallbackGameName(20), manifestPath: unnamed },
			])
			expect(warnings).toEqual([
				{
					manifestPath: broken,
					error: 'unbalanced braces: section "AppState" opened at line 1 is never closed',
				},
			])
		})
	})

	it("reads manifests in sorted filename order", async () => {
		await withTempDir(async dir => {
			await writeManifest(dir, 300, "Gamma")
			await writeManifest(dir, 100, "Alpha")
			await writeManifest(dir, 20, "Beta")

			const { games } = await findInstalledGames([dir])

			// Lexical order: appmanifest_100, appmanifest_20, appmanifest_300
			expect(games.map(g => g.appId)).toEqual([100, 20, 300])
		})
	})

	it("ignores libraries without a steamapps directory", async () => {
		await withTempDir(async dir => {
			expect(await findInstalledGames([join(dir, "nothing-here")])).toEqual({
				games: [],
				warnings: [],
			})
		})
	})

	it("keeps a game installed in two libraries twice", async () => {
		await withTempDir(async dir => {
			await writeManifest(join(dir, "a"), 10, "Alpha")
			await writeManifest(join(dir, "b"), 10, "Alpha")

			const { games } = await findInstalledGames([join(dir, "a"), join(dir, "b")])

			expect(games.map(g => g.appId)).toEqual([10, 10])
		})
	})
})
