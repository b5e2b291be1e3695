import { describeError } from "../errors.js";
import type { GuardLogger } from "../logger.js";
import type { ServiceManager } from "../systemd/manager.js";
import { type DropInLocation, removeDropIn, writeDropIn } from "./dropin.js";

export interface GuardResult {
	/** Targets whose block state was changed by this call. */
	changed: string[];
	/** Targets that could not be queried or mutated. */
	failed: string[];
	reloaded: boolean;
}

export interface GuardControllerOptions {
	targets: readonly string[];
	location: DropInLocation;
	serviceManager: Pick<ServiceManager, "isBlocked" | "reload">;
	logger: GuardLogger;
}

type TargetOutcome = "changed" | "unchanged" | "failed";

/**
 * Owns the drop-ins that stop shutdown targets from being started directly.
 * Block state is always read back from the service manager before acting, so
 * calling `setGuard` repeatedly with the same value is a no-op.
 */
export class GuardController {
	readonly targets: readonly string[];
	private readonly location: DropInLocation;
	private readonly serviceManager: Pick<ServiceManager, "isBlocked" | "reload">;
	private readonly logger: GuardLogger;
	private queue: Promise<void> = Promise.resolve();

	constructor(opts: GuardControllerOptions) {
		this.targets = opts.targets;
		this.location = opts.location;
		this.serviceManager = opts.serviceManager;
		this.logger = opts.logger;
	}

	/**
	 * Blocks (`enforce = true`) or unblocks every target. Calls are serialised,
	 * so a release issued from a signal handler runs after any install in flight.
	 */
	setGuard(enforce: boolean): Promise<GuardResult> {
		const next = this.queue.then(() => this.apply(enforce));
		// Failures reach the caller through `next`; the queue only tracks ordering.
		this.queue = next.then(
			() => undefined,
			() => undefined,
		);
		return next;
	}

	private async apply(enforce: boolean): Promise<GuardResult> {
		const changed: string[] = [];
		const failed: string[] = [];

		for (const target of this.targets) {
			const outcome = await this.applyToTarget(target, enforce);
			if (outcome === "changed") {
				changed.push(target);
			} else if (outcome === "failed") {
				failed.push(target);
			}
		}

		if (changed.length === 0) {
			this.logger.debug(
				{ tag: "guard.unchanged", enforce },
				enforce ? "Shutdown already blocked" : "Shutdown already unblocked",
			);
			return { changed, failed, reloaded: false };
		}

		this.logger.info(
			{ tag: enforce ? "guard.block" : "guard.unblock", targets: changed },
			enforce ? `Blocked ${changed.join(", ")}` : `Unblocked ${changed.join(", ")}`,
		);

		let reloaded = false;
		try {
			await this.serviceManager.reload();
			reloaded = true;
		} catch (err) {
			this.logger.error(
				{ tag: "guard.reload-failed", err: describeError(err) },
				"Service manager reload failed; drop-ins take effect on the next reload",
			);
		}
		return { changed, failed, reloaded };
	}

	private async applyToTarget(target: string, enforce: boolean): Promise<TargetOutcome> {
		let blocked: boolean;
		try {
			blocked = await this.serviceManager.isBlocked(target);
		} catch (err) {
			this.logger.error(
				{ tag: "guard.query-failed", target, err: describeError(err) },
				`Could not read block state of ${target}`,
			);
			return "failed";
		}

		if (blocked === enforce) {
			return "unchanged";
		}

		try {
			const path = enforce ? await writeDropIn(this.location, target) : await removeDropIn(this.location, target);
			this.logger.debug({ tag: enforce ? "guard.dropin-written" : "guard.dropin-removed", target, path });
			return "changed";
		} catch (err) {
			this.logger.error(
				{ tag: enforce ? "guard.block-failed" : "guard.unblock-failed", target, err: describeError(err) },
				enforce ? `Could not block ${target}` : `Could not unblock ${target}`,
			);
			return "failed";
		}
	}
}
