import type { CycleSummary } from "@helpdesk/core-contracts";
import {
	Injectable,
	type OnApplicationBootstrap,
	type OnApplicationShutdown,
} from "@nestjs/common";
import type { WorkerConfig } from "../config/config.module.js";
import { errorCode, toError } from "../errors/error-classifier.js";
import type { LifecycleService } from "../lifecycle/lifecycle.service.js";
import type { EventLogger } from "../telemetry/events.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";
import type {
	CycleResult,
	PollerStatus,
	PollerStatusSource,
} from "./poller.types.js";

/**
 * Base class for poll-driven workers.
 *
 * Runs `runCycle` once per interval, never overlapping two cycles. In
 * daemon mode the first cycle runs during application bootstrap so that a
 * mailbox or database that cannot be reached at all fails startup.
 * Extend this class and implement `runCycle`.
 */
@Injectable()
export abstract class BasePollerService
	implements OnApplicationBootstrap, OnApplicationShutdown, PollerStatusSource
{
	private timer: NodeJS.Timeout | null = null;
	private current: Promise<CycleResult> | null = null;
	private stopping = false;
	private readonly status: PollerStatus = {
		cycles: 0,
		inProgress: false,
		consecutiveFailures: 0,
	};

	constructor(
		protected readonly telemetry: TelemetryService,
		protected readonly logger: LoggerService,
		protected readonly events: EventLogger,
		protected readonly config: WorkerConfig,
		protected readonly lifecycle?: LifecycleService,
	) {}

	/**
	 * Process everything currently available. Throw a cycle-scoped error to
	 * abort; per-message failures belong in the summary.
	 */
	protected abstract runCycle(cycle: number): Promise<CycleSummary>;

	async onApplicationBootstrap(): Promise<void> {
		if (this.config.runMode !== "daemon") {
			return;
		}

		const first = await this.pollOnce();
		if (!first.ok) {
			throw first.error;
		}

		this.events.pollerStarted();
		this.scheduleNext();
	}

	async onApplicationShutdown(): Promise<void> {
		this.stopping = true;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.current) {
			await this.current;
		}
	}

	/**
	 * Run one cycle now. Resolves with the outcome; never rejects.
	 */
	async pollOnce(): Promise<CycleResult> {
		if (this.current) {
			return this.current;
		}

		this.current = this.executeCycle();
		try {
			return await this.current;
		} finally {
			this.current = null;
		}
	}

	getStatus(): PollerStatus {
		return { ...this.status };
	}

	/**
	 * True once shutdown began; subclasses stop between messages
	 */
	protected isStopping(): boolean {
		return this.stopping || (this.lifecycle?.isShutdownInProgress() ?? false);
	}

	private async executeCycle(): Promise<CycleResult> {
		const cycle = this.status.cycles + 1;
		const started = Date.now();

		this.status.cycles = cycle;
		this.status.inProgress = true;
		this.status.lastCycleAt = new Date(started);
		this.lifecycle?.setCycleInProgress(true);

		try {
			const summary = await this.telemetry.withSpan(
				`${this.config.service}.cycle`,
				{ stage: this.config.stage },
				() => this.runCycle(cycle),
			);

			this.status.consecutiveFailures = 0;
			this.status.lastSuccessAt = new Date();
			this.status.lastSummary = summary;
			delete this.status.lastError;

			this.telemetry.timing("cycle.duration_ms", summary.duration_ms);
			this.events.cycleCompleted(cycle, summary);

			return { ok: true, cycle, summary };
		} catch (error) {
			const err = toError(error);
			const durationMs = Date.now() - started;

			this.status.consecutiveFailures += 1;
			this.status.lastError = err.message;

			this.telemetry.increment("cycle.failed", 1, {
				error_code: errorCode(err),
			});
			this.logger.critical("Fetch cycle aborted", {
				cycle,
				error_code: errorCode(err),
				error_message: err.message,
				duration_ms: durationMs,
			});
			this.events.cycleFailed(cycle, errorCode(err), err.message, durationMs);

			return { ok: false, cycle, error: err };
		} finally {
			this.status.inProgress = false;
			this.lifecycle?.setCycleInProgress(false);
		}
	}

	private scheduleNext(): void {
		if (this.stopping) {
			return;
		}

		this.timer = setTimeout(() => {
			this.timer = null;
			// pollOnce never rejects; failures were logged and counted
			void this.pollOnce().then(() => this.scheduleNext());
		}, this.config.poll.intervalMs);
	}
}
