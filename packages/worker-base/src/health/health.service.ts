import { Injectable } from "@nestjs/common";
import type { PollerStatusSource } from "../poller/poller.types.js";
import type { EventLogger } from "../telemetry/events.js";

export interface DatabaseHealthCheck {
	check(): Promise<boolean>;
}

export type HealthState = "ok" | "degraded" | "unhealthy";

export interface HealthResponse {
	status: HealthState;
	timestamp: string;
	checks: {
		poller: { status: HealthState; message?: string };
		database?: { status: "ok" | "unhealthy"; message?: string };
	};
}

export const DATABASE_HEALTH = "DATABASE_HEALTH";
export const HEALTH_SERVICE = "HEALTH_SERVICE";

/** Consecutive failed cycles before the poller counts as unhealthy */
const UNHEALTHY_AFTER_FAILURES = 3;

@Injectable()
export class HealthService {
	private lastStatus: HealthState | "unknown" = "unknown";

	constructor(
		private readonly poller: PollerStatusSource,
		private readonly dbHealth?: DatabaseHealthCheck,
		private readonly eventLogger?: EventLogger,
	) {}

	async check(): Promise<HealthResponse> {
		const status = this.poller.getStatus();
		const checks: HealthResponse["checks"] = {
			poller: { status: "ok" },
		};

		if (status.consecutiveFailures >= UNHEALTHY_AFTER_FAILURES) {
			checks.poller = {
				status: "unhealthy",
				message: `${status.consecutiveFailures} consecutive cycles failed: ${status.lastError ?? "unknown error"}`,
			};
		} else if (status.consecutiveFailures > 0) {
			checks.poller = {
				status: "degraded",
				message: status.lastError ?? "last cycle failed",
			};
		}

		if (this.dbHealth) {
			try {
				const isHealthy = await this.dbHealth.check();
				checks.database = isHealthy
					? { status: "ok" }
					: { status: "unhealthy", message: "Database check failed" };
			} catch (error) {
				checks.database = {
					status: "unhealthy",
					message:
						error instanceof Error ? error.message : "Database check failed",
				};
			}
		}

		const states = Object.values(checks).map((c) => c.status);
		const overall: HealthState = states.includes("unhealthy")
			? "unhealthy"
			: states.includes("degraded")
				? "degraded"
				: "ok";

		if (overall !== this.lastStatus) {
			this.eventLogger?.healthChanged(this.lastStatus, overall, {
				poller: checks.poller.status === "ok",
				...(checks.database && { database: checks.database.status === "ok" }),
			});
			this.lastStatus = overall;
		}

		return {
			status: overall,
			timestamp: new Date().toISOString(),
			checks,
		};
	}
}
