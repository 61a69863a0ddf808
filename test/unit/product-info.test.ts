/**
 * Unit tests for decoding steam-user product info responses
 */

import { describe, it, expect } from "vitest"
import { extractClientIcon } from "../../src/core/icons.js"
import { parseProductInfoResponse } from "../../src/session/steam-user-session.js"

describe("parseProductInfoResponse", () => {
	it("maps each returned app to a KeyValues tree", () => {
		const apps = parseProductInfoResponse({
			apps: {
				"10": { changenumber: 1, missingToken: false, appinfo: { common: { clienticon: "abc123" } } },
				"20": { changenumber: 2, missingToken: false, appinfo: { common: { name: "No icon" } } },
			},
			packages: {},
			unknownApps: [30],
			unknownPackages: [],
		})

		expect([...apps.keys()]).toEqual([10, 20])
		expect(extractClientIcon(10, apps.get(10))).toEqual({ appId: 10, iconToken: "abc123" })
		expect(extractClientIcon(20, apps.get(20))).toEqual({ appId: 20, reason: "no-client-icon" })
		expect(apps.has(30)).toBe(false)
	})

	it("returns nothing for an unexpected shape", () => {
		expect(parseProductInfoResponse({ apps: "nope" }).size).toBe(0)
		expect(parseProductInfoResponse(null).size).toBe(0)
	})
})
