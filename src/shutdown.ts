import { setTimeout as sleep } from "node:timers/promises";

export class ShutdownRequestedError extends Error {
	constructor(reason: string) {
		super(`Shutdown requested: ${reason}`);
		this.name = "ShutdownRequestedError";
	}
}

/**
 * Cancellation flag shared by the daemon loop and the signal handlers.
 * Requesting wakes any pending `wait`.
 */
export class ShutdownSignal {
	private readonly controller = new AbortController();
	private _reason: string | undefined;

	get requested(): boolean {
		return this.controller.signal.aborted;
	}

	get reason(): string | undefined {
		return this._reason;
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	request(reason: string): void {
		if (this.requested) return;
		this._reason = reason;
		this.controller.abort(new ShutdownRequestedError(reason));
	}

	/** Sleeps for `ms`, returning early (with `false`) if shutdown is requested. */
	async wait(ms: number): Promise<boolean> {
		if (this.requested) return false;
		try {
			await sleep(ms, undefined, { signal: this.controller.signal });
			return true;
		} catch (err) {
			if (this.requested) return false;
			throw err;
		}
	}
}
