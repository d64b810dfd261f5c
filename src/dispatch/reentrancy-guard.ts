/**
 * ReentrancyGuard — one flag shared by every adapter entry point.
 *
 * Set on entry, cleared on exit (also when the body throws). A call made
 * while the flag is set fails immediately without running its body.
 */

import { type AdapterError, ReentrancyError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";

export class ReentrancyGuard {
	private inFlight: string | null = null;

	isLocked(): boolean {
		return this.inFlight !== null;
	}

	/** Entry point currently on the stack, if any. */
	current(): string | null {
		return this.inFlight;
	}

	run<T>(entryPoint: string, body: () => Result<T, AdapterError>): Result<T, AdapterError> {
		if (this.inFlight !== null) {
			return err(new ReentrancyError(entryPoint, this.inFlight));
		}
		this.inFlight = entryPoint;
		try {
			return body();
		} finally {
			this.inFlight = null;
		}
	}
}
