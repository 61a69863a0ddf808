// This module is a library entry point
// For CLI usage, run: npx steam-icon-restore --qr

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./keyvalues.js"
export * from "./library.js"
export * from "./steam-path.js"
export * from "./shell.js"
export * from "./run.js"
export * from "./session/types.js"
export * from "./session/signal.js"
export * from "./session/pump.js"
export * from "./session/auth.js"
export * from "./session/orchestrator.js"
export { SteamUserSession, parseProductInfoResponse } from "./session/steam-user-session.js"
export * from "./core/types.js"
export * from "./core/icons.js"
export { restoreIcons } from "./core/restore.js"
