/**
 * TypedEmitter — payload-typed event emitter backed by eventemitter3.
 *
 * Each event carries exactly one payload object. Listeners run synchronously
 * in subscription order; a listener that throws is reported to the optional
 * error callback and does not stop the remaining listeners.
 */

import { EventEmitter } from "eventemitter3";

export type Listener<P> = (payload: P) => void;

/** Invoked when a listener throws during `emit`. */
export type ListenerErrorCallback = (event: string, error: unknown) => void;

/** `TEvents` maps each event name to its payload type. */
export class TypedEmitter<TEvents extends Record<keyof TEvents, object>> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: ListenerErrorCallback | null;

	constructor(onListenerError?: ListenerErrorCallback) {
		this.onListenerError = onListenerError ?? null;
	}

	/**
	 * Subscribe to an event.
	 * @returns Function that removes this subscription
	 */
	on<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): () => void {
		const wrapped = this.guard(event, listener);
		this.ee.on(event, wrapped);
		return () => {
			this.ee.off(event, wrapped);
		};
	}

	/** Subscribe for the next occurrence only. */
	once<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): () => void {
		const wrapped = this.guard(event, listener);
		this.ee.once(event, wrapped);
		return () => {
			this.ee.off(event, wrapped);
		};
	}

	/** @returns true if at least one listener was registered for the event */
	emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
		return this.ee.emit(event, payload);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	/** Remove all listeners for one event, or for every event when omitted. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): void {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
	}

	private guard<P>(event: string, listener: Listener<P>): Listener<P> {
		return (payload: P) => {
			try {
				listener(payload);
			} catch (error) {
				if (this.onListenerError) {
					this.onListenerError(event, error);
				} else {
					throw error;
				}
			}
		};
	}
}
