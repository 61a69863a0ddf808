/**
 * Interactive prompts using the prompts library
 */

import prompts from "prompts"
import { AuthenticationError } from "./errors.js"
import type { SteamGuardAuthenticator } from "./session/types.js"
import type { AuthMethod } from "./types.js"
import { ui } from "./ui.js"

function requireAnswer(value: unknown, what: string): string {
	if (typeof value !== "string") {
		throw new AuthenticationError(`Cancelled while entering ${what}`)
	}
	return value.trim()
}

/**
 * Ask whether to use the detected install, or for a path when none was found
 */
export async function promptSteamPath(
	detected: string | undefined,
): Promise<string | undefined> {
	if (detected) {
		ui.info(`Detected Steam installation: ${detected}`)
		const response = await prompts({
			type: "confirm",
			name: "useDetected",
			message: "Use this path?",
			initial: true,
		})
		if (response.useDetected === true) return detected
	}

	const response = await prompts({
		type: "text",
		name: "steamPath",
		message: "Enter your Steam installation path",
	})
	const entered: unknown = response.steamPath
	return typeof entered === "string" && entered.trim() ? entered.trim() : undefined
}

export async function promptAuthMethod(initial: AuthMethod = "qr"): Promise<AuthMethod> {
	const response = await prompts({
		type: "select",
		name: "method",
		message: "Choose authentication method",
		choices: [
			{ title: "QR code (Steam Mobile App)", value: "qr" },
			{ title: "Username and password", value: "credentials" },
		],
		initial: initial === "qr" ? 0 : 1,
	})
	return response.method === "credentials" ? "credentials" : "qr"
}

export async function promptCredentials(
	username?: string,
): Promise<{ username: string; password: string }> {
	const response = await prompts([
		{
			type: username ? null : "text",
			name: "username",
			message: "Steam username",
		},
		{
			type: "password",
			name: "password",
			message: "Steam password",
		},
	])

	return {
		username: username ?? requireAnswer(response.username, "the username"),
		password: requireAnswer(response.password, "the password"),
	}
}

/**
 * Answers Steam Guard challenges on the terminal
 */
export class ConsoleSteamGuardAuthenticator implements SteamGuardAuthenticator {
	async getDeviceCode(previousCodeWasIncorrect: boolean): Promise<string> {
		if (previousCodeWasIncorrect) {
			ui.warn("The previous code was incorrect.")
		}
		const response = await prompts({
			type: "text",
			name: "code",
			message: "Enter 2FA code from your authenticator app:",
		})
		return requireAnswer(response.code, "the 2FA code")
	}

	async getEmailCode(
		email: string,
		previousCodeWasIncorrect: boolean,
	): Promise<string> {
		if (previousCodeWasIncorrect) {
			ui.warn("The previous code was incorrect.")
		}
		const response = await prompts({
			type: "text",
			name: "code",
			message: `Enter the code sent to ${email}:`,
		})
		return requireAnswer(response.code, "the email code")
	}

	async acceptDeviceConfirmation(): Promise<boolean> {
		ui.info("Please confirm this login in your Steam Mobile App...")
		return true
	}
}

/**
 * Setup prompt handlers for graceful exit
 */
export function setupPromptHandlers(): void {
	// Handle Ctrl+C
	process.on("SIGINT", () => {
		console.log("\n\nAborted.")
		process.exit(130)
	})
}
