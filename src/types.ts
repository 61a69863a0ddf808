/**
 * Shared type definitions
 */

// ─────────────────────────────────────────────────────────────────────────────
// Installed games
// ─────────────────────────────────────────────────────────────────────────────

export interface GameRecord {
	/** Steam app id (uint32) */
	appId: number
	/** Display name from the manifest, or a placeholder built from the id */
	name: string
	/** appmanifest_<id>.acf the record was read from */
	manifestPath: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Run options
// ─────────────────────────────────────────────────────────────────────────────

export type AuthMethod = "qr" | "credentials"

/** Settings a restore run reads once the auth flow is chosen */
export interface RestoreRunOptions {
	steamPath: string
	restartShell: boolean
	metadataTimeoutMs: number
	downloadTimeoutMs: number
	pumpIntervalMs: number
	logoffGraceMs: number
}
