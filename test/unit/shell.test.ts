/**
 * Unit tests for the desktop shell refresh
 */

import { describe, it, expect } from "vitest"
import { refreshShellIcons, supportsShellRefresh } from "../../src/shell.js"

describe("shell refresh", () => {
	it("is only supported on Windows", () => {
		expect(supportsShellRefresh("win32")).toBe(true)
		expect(supportsShellRefresh("linux")).toBe(false)
		expect(supportsShellRefresh("darwin")).toBe(false)
	})

	it("does nothing elsewhere", async () => {
		expect(await refreshShellIcons("linux")).toEqual({ attempted: false, ok: true })
	})
})
