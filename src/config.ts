/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"

const ConfigSchema = z.object({
	steamPath: z.string().min(1).optional(),
	username: z.string().min(1).optional(),
	useQrCode: z.boolean().default(false),
	metadataTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
	downloadTimeoutMs: z.number().int().min(100).max(300_000).default(30_000),
	pumpIntervalMs: z.number().int().min(10).max(10_000).default(1000),
	logoffGraceMs: z.number().int().min(0).max(30_000).default(2000),
	restartShell: z.boolean().default(true),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = {
	useQrCode: false,
	metadataTimeoutMs: 10_000,
	downloadTimeoutMs: 30_000,
	pumpIntervalMs: 1000,
	logoffGraceMs: 2000,
	restartShell: true,
}

/**
 * Validate a parsed config object. Throws a ZodError on invalid values.
 */
export function parseConfig(raw: unknown): Config {
	return ConfigSchema.parse(raw)
}

export function configPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
	return [
		join(cwd, ".steamiconrc"),
		join(cwd, ".steamiconrc.json"),
		join(home, ".steamiconrc"),
		join(home, ".steamiconrc.json"),
	]
}

/**
 * Load configuration from .steamiconrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(paths: string[] = configPaths()): Config {
	for (const path of paths) {
		if (existsSync(path)) {
			try {
				const raw: unknown = JSON.parse(readFileSync(path, "utf-8"))
				return parseConfig(raw)
			} catch (err) {
				// Continue to next path if invalid
				log.cli.debug(
					{ path, error: err instanceof Error ? err.message : String(err) },
					"ignoring invalid config file",
				)
			}
		}
	}

	return DEFAULT_CONFIG
}

export { DEFAULT_CONFIG }
