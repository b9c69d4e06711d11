/**
 * Structured event types.
 *
 * Every event carries `dd.forward: true` so it is indexed regardless of
 * log tier. Names follow `helpdesk.<subject>.<action>`.
 */

export interface ServiceTags {
	service: string;
	version: string;
	env: string;
	team: string;
	domain: string;
	stage: string;
}

export interface BaseEvent {
	event: string;
	/** ISO 8601 timestamp */
	timestamp: string;
	"dd.forward": true;
}

// ============================================================================
// Poller lifecycle
// ============================================================================

export interface PollerStartedEvent extends BaseEvent {
	event: "helpdesk.poller.started";
	config: {
		run_mode: string;
		poll_interval_ms: number;
		health_port: number;
	};
}

export interface PollerShutdownInitiatedEvent extends BaseEvent {
	event: "helpdesk.poller.shutdown.initiated";
	signal?: string;
	cycle_in_progress: boolean;
}

export interface PollerShutdownCompletedEvent extends BaseEvent {
	event: "helpdesk.poller.shutdown.completed";
	duration_ms: number;
	reason: "graceful" | "error" | "signal";
}

export type PollerLifecycleEvent =
	| PollerStartedEvent
	| PollerShutdownInitiatedEvent
	| PollerShutdownCompletedEvent;

// ============================================================================
// Fetch cycles
// ============================================================================

export interface CycleCompletedEvent extends BaseEvent {
	event: "helpdesk.cycle.completed";
	cycle: number;
	fetched: number;
	skipped: number;
	sealed: number;
	created: number;
	failed: number;
	duration_ms: number;
}

export interface CycleFailedEvent extends BaseEvent {
	event: "helpdesk.cycle.failed";
	cycle: number;
	error_code: string;
	error_message: string;
	duration_ms: number;
}

// ============================================================================
// Messages
// ============================================================================

export interface MessageSealedEvent extends BaseEvent {
	event: "helpdesk.message.sealed";
	unique_id: string;
	ticket_id: string;
	created: boolean;
	attachment_count: number;
	undelivered: boolean;
	duration_ms: number;
}

export interface MessageSkippedEvent extends BaseEvent {
	event: "helpdesk.message.skipped";
	unique_id: string;
	reason: string;
}

export interface MessageFailedEvent extends BaseEvent {
	event: "helpdesk.message.failed";
	unique_id: string;
	error_code: string;
	error_message: string;
	classification: string;
}

export type MessageEvent =
	| MessageSealedEvent
	| MessageSkippedEvent
	| MessageFailedEvent;

// ============================================================================
// Health
// ============================================================================

export interface HealthChangedEvent extends BaseEvent {
	event: "helpdesk.health.changed";
	previous_status: "ok" | "degraded" | "unhealthy" | "unknown";
	current_status: "ok" | "degraded" | "unhealthy";
	checks: Record<string, boolean>;
}

export type HelpdeskEvent =
	| PollerLifecycleEvent
	| CycleCompletedEvent
	| CycleFailedEvent
	| MessageEvent
	| HealthChangedEvent;

export type EventName = HelpdeskEvent["event"];
