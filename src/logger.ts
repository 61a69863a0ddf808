/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured logging for diagnostics
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue (skipped manifest, failed shell refresh)
 * - info: Key milestones (connected, logged on, logged off)
 * - debug: Detailed operation info (--verbose)
 * - trace: Every session event through the pump
 */

import pino from "pino"

// Determine log level from environment or use sensible default
const envLevel =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : undefined)

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

function createRootLogger(level: string) {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
						destination: 2,
					},
				},
			})
		: pino(
				{
					level,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export const logger = createRootLogger(envLevel ?? "warn")

/**
 * Raise the level for --verbose. An explicit LOG_LEVEL always wins.
 */
export function configureLogging(options: { verbose: boolean }): void {
	if (envLevel) return
	logger.level = options.verbose ? "debug" : "warn"
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("icons")
 * log.debug({ appId }, "requesting product info")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get session() {
		return createLogger("session")
	},
	get auth() {
		return createLogger("auth")
	},
	get library() {
		return createLogger("library")
	},
	get icons() {
		return createLogger("icons")
	},
	get shell() {
		return createLogger("shell")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
