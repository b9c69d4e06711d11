import {
	type BeforeApplicationShutdown,
	Injectable,
	type OnApplicationShutdown,
} from "@nestjs/common";
import type { EventLogger } from "../telemetry/events.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT" | "ERROR";

type ShutdownCallback = () => Promise<void>;

@Injectable()
export class LifecycleService
	implements OnApplicationShutdown, BeforeApplicationShutdown
{
	private readonly shutdownCallbacks: ShutdownCallback[] = [];
	private isShuttingDown = false;
	private shutdownStartTime?: number;
	private shutdownSignal?: string;
	private cycleInProgress = false;

	constructor(
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly eventLogger: EventLogger,
	) {
		process.on("SIGTERM", () => this.handleSignal("SIGTERM"));
		process.on("SIGINT", () => this.handleSignal("SIGINT"));
		process.on("uncaughtException", (error) =>
			this.handleUncaughtException(error),
		);
		process.on("unhandledRejection", (reason) =>
			this.handleUnhandledRejection(reason),
		);
	}

	/**
	 * Called by the poller around each fetch cycle
	 */
	setCycleInProgress(inProgress: boolean): void {
		this.cycleInProgress = inProgress;
	}

	/**
	 * Register a callback to run during shutdown (last registered runs first)
	 */
	onShutdown(callback: ShutdownCallback): void {
		this.shutdownCallbacks.push(callback);
	}

	isShutdownInProgress(): boolean {
		return this.isShuttingDown;
	}

	async beforeApplicationShutdown(signal?: string): Promise<void> {
		this.isShuttingDown = true;
		this.shutdownStartTime = Date.now();
		this.shutdownSignal = signal ?? this.shutdownSignal;
		this.eventLogger.pollerShutdownInitiated(
			this.cycleInProgress,
			this.shutdownSignal,
		);
		this.telemetry.increment("poller.shutdown_started");
	}

	async onApplicationShutdown(): Promise<void> {
		for (const callback of [...this.shutdownCallbacks].reverse()) {
			try {
				await callback();
			} catch (error) {
				this.logger.error(
					"Shutdown callback failed",
					error instanceof Error ? error.stack : String(error),
				);
			}
		}

		const durationMs = this.shutdownStartTime
			? Date.now() - this.shutdownStartTime
			: 0;
		this.eventLogger.pollerShutdownCompleted(
			durationMs,
			this.shutdownSignal ? "signal" : "graceful",
		);
		this.telemetry.increment("poller.shutdown_completed");
	}

	private handleSignal(signal: ShutdownSignal): void {
		if (this.isShuttingDown) {
			return;
		}

		// The poller checks this flag between messages
		this.isShuttingDown = true;
		this.shutdownSignal = signal;
		this.telemetry.increment("poller.signal_received", 1, { signal });
	}

	private handleUncaughtException(error: Error): void {
		this.logger.critical("Uncaught exception", {
			error_message: error.message,
			stack: error.stack,
		});
		this.telemetry.increment("poller.uncaught_exception");

		// Let the logs flush before exiting
		setTimeout(() => {
			process.exit(1);
		}, 1000);
	}

	private handleUnhandledRejection(reason: unknown): void {
		const message = reason instanceof Error ? reason.message : String(reason);
		const stack = reason instanceof Error ? reason.stack : undefined;

		this.logger.critical("Unhandled rejection", {
			error_message: message,
			stack,
		});
		this.telemetry.increment("poller.unhandled_rejection");

		setTimeout(() => {
			process.exit(1);
		}, 1000);
	}
}
