/**
 * Single-fire completion signal
 *
 * Bridges event handlers (the writers) and sequential code (the reader).
 * Only the first resolve/reject takes effect; later calls return false so
 * racing callbacks can all try to finish the run.
 */

export type WaitResult<T> =
	| { status: "resolved"; value: T }
	| { status: "timeout" }
	| { status: "aborted" }

export class CompletionSignal<T> {
	readonly promise: Promise<T>
	private settled = false
	private resolveFn: (value: T) => void = () => undefined
	private rejectFn: (reason: unknown) => void = () => undefined

	constructor() {
		this.promise = new Promise<T>((resolve, reject) => {
			this.resolveFn = resolve
			this.rejectFn = reject
		})
		// A rejection nobody waits for is not an unhandled rejection
		void this.promise.catch(() => undefined)
	}

	get isSettled(): boolean {
		return this.settled
	}

	resolve(value: T): boolean {
		if (this.settled) return false
		this.settled = true
		this.resolveFn(value)
		return true
	}

	reject(reason: unknown): boolean {
		if (this.settled) return false
		this.settled = true
		this.rejectFn(reason)
		return true
	}

	/**
	 * Wait for the signal with an upper bound. Rejections propagate; the
	 * timer and abort listener are always released.
	 */
	async wait(timeoutMs: number, signal?: AbortSignal): Promise<WaitResult<T>> {
		if (signal?.aborted) return { status: "aborted" }

		let timer: NodeJS.Timeout | undefined
		let onAbort: (() => void) | undefined

		const timeout = new Promise<WaitResult<T>>(resolve => {
			timer = setTimeout(() => resolve({ status: "timeout" }), timeoutMs)
		})
		const aborted = new Promise<WaitResult<T>>(resolve => {
			if (!signal) return
			onAbort = () => resolve({ status: "aborted" })
			signal.addEventListener("abort", onAbort, { once: true })
		})

		try {
			return await Promise.race([
				this.promise.then((value): WaitResult<T> => ({ status: "resolved", value })),
				timeout,
				aborted,
			])
		} finally {
			clearTimeout(timer)
			if (signal && onAbort) signal.removeEventListener("abort", onAbort)
		}
	}
}
