/**
 * Core types for the icon restore pipeline
 *
 * These types define the event-based interface between the pipeline
 * generator and whatever renders progress (the CLI's plain output).
 */

import type { Dispatcher } from "undici"
import type { GameRecord } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Per-item results
// ─────────────────────────────────────────────────────────────────────────────

export type IconSkipReason =
	| "app-missing"
	| "no-common-section"
	| "no-client-icon"
	| "timeout"
	| "aborted"

export interface IconResolution {
	appId: number
	/** Absent when Steam publishes no icon or the lookup gave up */
	iconToken?: string | undefined
	reason?: IconSkipReason | undefined
}

export interface DownloadOutcome {
	appId: number
	success: boolean
	/** Written file on success */
	path?: string | undefined
	error?: string | undefined
}

export interface RestoreSummary {
	successCount: number
	failureCount: number
	total: number
	/** True when the session dropped before every game was processed */
	interrupted: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Restore Events
// ─────────────────────────────────────────────────────────────────────────────

export type RestoreEvent =
	| RestoreStartEvent
	| RestoreResolveEvent
	| RestoreDownloadEvent
	| RestoreItemCompleteEvent
	| RestoreInterruptedEvent
	| RestoreCompleteEvent

/** Emitted once before the first game */
export interface RestoreStartEvent {
	type: "start"
	total: number
}

/** Emitted after the product info lookup for a game */
export interface RestoreResolveEvent {
	type: "resolve"
	index: number
	total: number
	game: GameRecord
	resolution: IconResolution
}

/** Emitted after an icon download attempt */
export interface RestoreDownloadEvent {
	type: "download"
	index: number
	game: GameRecord
	url: string
	outcome: DownloadOutcome
}

/** Emitted when a game is done, whatever the result */
export interface RestoreItemCompleteEvent {
	type: "item-complete"
	index: number
	total: number
	game: GameRecord
	status: "ok" | "skipped" | "failed"
	detail?: string | undefined
}

/** Emitted when the session dropped mid-batch */
export interface RestoreInterruptedEvent {
	type: "interrupted"
	processed: number
	total: number
}

/** Emitted last */
export interface RestoreCompleteEvent {
	type: "complete"
	summary: RestoreSummary
	durationMs: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface IconDownloadOptions {
	/** Abort the HTTP request after this long */
	timeoutMs: number
	/** undici dispatcher; tests pass a MockAgent */
	dispatcher?: Dispatcher | undefined
}

export interface RestoreOptions {
	steamPath: string
	/** Upper bound on waiting for one product info response */
	metadataTimeoutMs: number
	download: IconDownloadOptions
}
