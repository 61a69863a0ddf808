/**
 * Unit tests for configuration loading
 */

import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, it, expect } from "vitest"
import { DEFAULT_CONFIG, configPaths, loadConfig, parseConfig } from "../../src/config.js"
import { withTempDir } from "../helpers/index.js"

describe("parseConfig", () => {
	it("fills in defaults", () => {
		expect(parseConfig({})).toEqual(DEFAULT_CONFIG)
	})

	it("keeps provided values", () => {
		const config = parseConfig({
			steamPath: "/opt/steam",
			username: "tester",
			useQrCode: true,
			metadataTimeoutMs: 5000,
			restartShell: false,
		})

		expect(config).toEqual({
			...DEFAULT_CONFIG,
			steamPath: "/opt/steam",
			username: "tester",
			useQrCode: true,
			metadataTimeoutMs: 5000,
			restartShell: false,
		})
	})

	it("rejects out-of-range and mistyped values", () => {
		expect(() => parseConfig({ metadataTimeoutMs: 5 })).toThrow()
		expect(() => parseConfig({ useQrCode: "yes" })).toThrow()
	})
})

describe("loadConfig", () => {
	it("uses the first valid file in search order", async () => {
		await withTempDir(async dir => {
			const [rc, rcJson] = configPaths(dir, join(dir, "home"))
			if (!rc || !rcJson) throw new Error("missing config paths")
			await writeFile(rc, "{ not json")
			await writeFile(rcJson, JSON.stringify({ username: "tester" }))

			expect(loadConfig([rc, rcJson])).toEqual({ ...DEFAULT_CONFIG, username: "tester" })
		})
	})

	it("falls back to defaults when nothing is found", async () => {
		await withTempDir(async dir => {
			expect(loadConfig(configPaths(dir, dir))).toEqual(DEFAULT_CONFIG)
		})
	})
})
