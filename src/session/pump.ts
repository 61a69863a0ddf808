/**
 * Event pump for Steam session callbacks
 *
 * The session adapter posts events into a queue; run() drains it on its own
 * async loop and hands each event to the subscribers for its type, in
 * arrival order. Handlers must not block: anything long-running is started
 * as its own task from inside the handler.
 */

import { log } from "../logger.js"
import { CompletionSignal } from "./signal.js"
import type { SessionEvent, SessionEventType } from "./types.js"

export type EventOf<K extends SessionEventType> = Extract<
	SessionEvent,
	{ type: K }
>

export interface Subscription {
	dispose(): void
}

interface Entry {
	type: SessionEventType
	handler: (event: SessionEvent) => void
}

function isEventOf<K extends SessionEventType>(
	event: SessionEvent,
	type: K,
): event is EventOf<K> {
	return event.type === type
}

export class EventPump {
	private readonly queue: SessionEvent[] = []
	private readonly entries = new Set<Entry>()
	private arrival: CompletionSignal<void> | null = null

	/** Number of live subscriptions */
	get subscriberCount(): number {
		return this.entries.size
	}

	/** Number of events waiting for dispatch */
	get pending(): number {
		return this.queue.length
	}

	post(event: SessionEvent): void {
		this.queue.push(event)
		this.arrival?.resolve()
	}

	subscribe<K extends SessionEventType>(
		type: K,
		handler: (event: EventOf<K>) => void,
	): Subscription {
		const entry: Entry = {
			type,
			handler: event => {
				if (isEventOf(event, type)) handler(event)
			},
		}
		this.entries.add(entry)

		let disposed = false
		return {
			dispose: () => {
				if (disposed) return
				disposed = true
				this.entries.delete(entry)
			},
		}
	}

	/**
	 * Wait up to timeoutMs for at least one event, then dispatch everything
	 * queued. Returns the number of events dispatched.
	 */
	async runWaitCallbacks(timeoutMs: number, signal?: AbortSignal): Promise<number> {
		if (this.queue.length === 0) {
			this.arrival = new CompletionSignal<void>()
			try {
				await this.arrival.wait(timeoutMs, signal)
			} finally {
				this.arrival = null
			}
		}

		let dispatched = 0
		for (let event = this.queue.shift(); event; event = this.queue.shift()) {
			this.dispatch(event)
			dispatched++
		}
		return dispatched
	}

	/**
	 * Pump until the signal aborts. Events still queued at that point are
	 * dispatched before returning.
	 */
	async run(signal: AbortSignal, intervalMs: number): Promise<void> {
		log.session.debug({ intervalMs }, "event pump started")
		while (!signal.aborted) {
			await this.runWaitCallbacks(intervalMs, signal)
		}
		await this.runWaitCallbacks(0)
		log.session.debug("event pump stopped")
	}

	private dispatch(event: SessionEvent): void {
		log.session.trace({ event: event.type }, "dispatch")
		// Copy: handlers may dispose themselves or subscribe others
		for (const entry of [...this.entries]) {
			if (entry.type !== event.type || !this.entries.has(entry)) continue
			try {
				entry.handler(event)
			} catch (err) {
				log.session.error(
					{ event: event.type, error: err instanceof Error ? err.message : String(err) },
					"event handler threw",
				)
			}
		}
	}
}
