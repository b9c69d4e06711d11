import { Injectable } from "@nestjs/common";
import type { CycleSummary } from "@helpdesk/core-contracts";
import type { WorkerConfig } from "../config/config.module.js";
import type {
	BaseEvent,
	CycleCompletedEvent,
	CycleFailedEvent,
	HealthChangedEvent,
	MessageFailedEvent,
	MessageSealedEvent,
	MessageSkippedEvent,
	PollerShutdownCompletedEvent,
	PollerShutdownInitiatedEvent,
	PollerStartedEvent,
	ServiceTags,
} from "./events.types.js";
import type { LoggerService } from "./logger.service.js";

export const EVENT_LOGGER = "EVENT_LOGGER";

function createBaseEvent<T extends string>(event: T): BaseEvent & { event: T } {
	return {
		event,
		timestamp: new Date().toISOString(),
		"dd.forward": true,
	};
}

/**
 * Emits typed, always-indexed events through the logger
 */
@Injectable()
export class EventLogger {
	private readonly baseTags: ServiceTags;

	constructor(
		private readonly logger: LoggerService,
		private readonly config: WorkerConfig,
	) {
		this.baseTags = {
			service: config.service,
			version: config.version,
			env: config.env,
			team: config.team,
			domain: config.domain,
			stage: config.stage,
		};
	}

	private emit(event: BaseEvent & Record<string, unknown>): void {
		this.logger.info(event.event, { ...this.baseTags, ...event });
	}

	pollerStarted(): void {
		const event: PollerStartedEvent = {
			...createBaseEvent("helpdesk.poller.started"),
			config: {
				run_mode: this.config.runMode,
				poll_interval_ms: this.config.poll.intervalMs,
				health_port: this.config.healthPort,
			},
		};
		this.emit({ ...event });
	}

	pollerShutdownInitiated(cycleInProgress: boolean, signal?: string): void {
		const event: PollerShutdownInitiatedEvent = {
			...createBaseEvent("helpdesk.poller.shutdown.initiated"),
			cycle_in_progress: cycleInProgress,
		};
		if (signal) event.signal = signal;
		this.emit({ ...event });
	}

	pollerShutdownCompleted(
		durationMs: number,
		reason: PollerShutdownCompletedEvent["reason"],
	): void {
		const event: PollerShutdownCompletedEvent = {
			...createBaseEvent("helpdesk.poller.shutdown.completed"),
			duration_ms: durationMs,
			reason,
		};
		this.emit({ ...event });
	}

	cycleCompleted(cycle: number, summary: CycleSummary): void {
		const event: CycleCompletedEvent = {
			...createBaseEvent("helpdesk.cycle.completed"),
			cycle,
			fetched: summary.fetched,
			skipped: summary.skipped,
			sealed: summary.sealed,
			created: summary.created,
			failed: summary.failed,
			duration_ms: summary.duration_ms,
		};
		this.emit({ ...event });
	}

	cycleFailed(
		cycle: number,
		errorCode: string,
		errorMessage: string,
		durationMs: number,
	): void {
		const event: CycleFailedEvent = {
			...createBaseEvent("helpdesk.cycle.failed"),
			cycle,
			error_code: errorCode,
			error_message: errorMessage,
			duration_ms: durationMs,
		};
		this.emit({ ...event });
	}

	messageSealed(
		uniqueId: string,
		ticketId: string,
		details: {
			created: boolean;
			attachmentCount: number;
			undelivered: boolean;
			durationMs: number;
		},
	): void {
		const event: MessageSealedEvent = {
			...createBaseEvent("helpdesk.message.sealed"),
			unique_id: uniqueId,
			ticket_id: ticketId,
			created: details.created,
			attachment_count: details.attachmentCount,
			undelivered: details.undelivered,
			duration_ms: details.durationMs,
		};
		this.emit({ ...event });
	}

	messageSkipped(uniqueId: string, reason: string): void {
		const event: MessageSkippedEvent = {
			...createBaseEvent("helpdesk.message.skipped"),
			unique_id: uniqueId,
			reason,
		};
		this.emit({ ...event });
	}

	messageFailed(
		uniqueId: string,
		errorCode: string,
		errorMessage: string,
		classification: string,
	): void {
		const event: MessageFailedEvent = {
			...createBaseEvent("helpdesk.message.failed"),
			unique_id: uniqueId,
			error_code: errorCode,
			error_message: errorMessage,
			classification,
		};
		this.emit({ ...event });
	}

	healthChanged(
		previousStatus: HealthChangedEvent["previous_status"],
		currentStatus: HealthChangedEvent["current_status"],
		checks: Record<string, boolean>,
	): void {
		const event: HealthChangedEvent = {
			...createBaseEvent("helpdesk.health.changed"),
			previous_status: previousStatus,
			current_status: currentStatus,
			checks,
		};
		this.emit({ ...event });
	}
}
