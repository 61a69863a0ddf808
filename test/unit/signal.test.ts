/**
 * Unit tests for CompletionSignal
 */

import { describe, it, expect } from "vitest"
import { CompletionSignal } from "../../src/session/signal.js"

describe("CompletionSignal", () => {
	it("only honours the first completion", async () => {
		const signal = new CompletionSignal<string>()

		expect(signal.resolve("first")).toBe(true)
		expect(signal.resolve("second")).toBe(false)
		expect(signal.reject(new Error("late"))).toBe(false)
		expect(signal.isSettled).toBe(true)
		await expect(signal.promise).resolves.toBe("first")
	})

	it("reports a value that arrives before the timeout", async () => {
		const signal = new CompletionSignal<number>()
		setTimeout(() => signal.resolve(7), 5)

		expect(await signal.wait(1000)).toEqual({ status: "resolved", value: 7 })
	})

	it("times out when nothing arrives", async () => {
		const signal = new CompletionSignal<number>()

		expect(await signal.wait(10)).toEqual({ status: "timeout" })
		expect(signal.isSettled).toBe(false)
	})

	it("stops waiting when the abort signal fires", async () => {
		const signal = new CompletionSignal<number>()
		const controller = new AbortController()
		setTimeout(() => controller.abort(), 5)

		expect(await signal.wait(1000, controller.signal)).toEqual({ status: "aborted" })
	})

	it("returns aborted immediately for an already aborted signal", async () => {
		const signal = new CompletionSignal<number>()
		signal.resolve(1)

		expect(await signal.wait(1000, AbortSignal.abort())).toEqual({ status: "aborted" })
	})

	it("propagates a rejection", async () => {
		const signal = new CompletionSignal<number>()
		signal.reject(new Error("boom"))

		await expect(signal.wait(1000)).rejects.toThrow("boom")
	})
})
