import { describeError } from "../errors.js";
import type { GuardController } from "../guard/controller.js";
import type { GuardLogger } from "../logger.js";
import type { ShutdownSignal } from "../shutdown.js";

/** Signals that release the guard and end the process. */
export const TERMINATION_SIGNALS = ["SIGINT", "SIGQUIT", "SIGTERM"] as const satisfies readonly NodeJS.Signals[];

/** Signals that are intercepted only so they do not kill the daemon. */
export const IGNORED_SIGNALS = ["SIGHUP", "SIGUSR1", "SIGUSR2"] as const satisfies readonly NodeJS.Signals[];

export const HANDLED_SIGNALS: readonly NodeJS.Signals[] = [...TERMINATION_SIGNALS, ...IGNORED_SIGNALS];

export interface SignalSource {
	on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
	removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalHandlerOptions {
	guard: Pick<GuardController, "setGuard">;
	shutdown: ShutdownSignal;
	logger: GuardLogger;
	/** Leave the guard in place on termination signals and ignore them. */
	ignoreSignals: boolean;
	exit?: (code: number) => void;
	source?: SignalSource;
}

function isTerminationSignal(signal: NodeJS.Signals): boolean {
	return TERMINATION_SIGNALS.some((candidate) => candidate === signal);
}

export class SignalHandlers {
	private readonly guard: Pick<GuardController, "setGuard">;
	private readonly shutdown: ShutdownSignal;
	private readonly logger: GuardLogger;
	private readonly ignoreSignals: boolean;
	private readonly exit: (code: number) => void;
	private readonly source: SignalSource;
	private readonly listener = (signal: NodeJS.Signals): void => {
		void this.handle(signal);
	};
	private releasing: Promise<void> | undefined;
	private installed = false;

	constructor(opts: SignalHandlerOptions) {
		this.guard = opts.guard;
		this.shutdown = opts.shutdown;
		this.logger = opts.logger;
		this.ignoreSignals = opts.ignoreSignals;
		this.exit = opts.exit ?? ((code) => process.exit(code));
		this.source = opts.source ?? process;
	}

	install(): this {
		if (this.installed) return this;
		for (const signal of HANDLED_SIGNALS) {
			this.source.on(signal, this.listener);
		}
		this.installed = true;
		return this;
	}

	dispose(): void {
		if (!this.installed) return;
		for (const signal of HANDLED_SIGNALS) {
			this.source.removeListener(signal, this.listener);
		}
		this.installed = false;
	}

	/** Resolves once a signal-triggered release (if any) has finished. */
	async settled(): Promise<void> {
		await this.releasing;
	}

	handle(signal: NodeJS.Signals): Promise<void> {
		if (this.ignoreSignals || !isTerminationSignal(signal)) {
			this.logger.warn({ tag: "signal.ignored", signal }, `Ignoring ${signal}`);
			return Promise.resolve();
		}

		if (this.releasing) {
			this.logger.warn({ tag: "signal.received", signal }, `${signal} received, release already in progress`);
			return this.releasing;
		}

		this.logger.info({ tag: "signal.received", signal }, `${signal} received, releasing guard and exiting`);
		this.shutdown.request(signal);
		this.releasing = this.release();
		return this.releasing;
	}

	private async release(): Promise<void> {
		let code = 0;
		try {
			await this.guard.setGuard(false);
		} catch (err) {
			code = 1;
			this.logger.error({ tag: "signal.release-failed", err: describeError(err) }, "Could not release guard on exit");
		}
		this.exit(code);
	}
}
