import type { CycleSummary } from "@helpdesk/core-contracts";

/**
 * Snapshot of the poll loop, read by the health checks
 */
export interface PollerStatus {
	cycles: number;
	inProgress: boolean;
	consecutiveFailures: number;
	lastCycleAt?: Date;
	lastSuccessAt?: Date;
	lastError?: string;
	lastSummary?: CycleSummary;
}

export interface PollerStatusSource {
	getStatus(): PollerStatus;
}

export const POLLER_STATUS = "POLLER_STATUS";

export type CycleResult =
	| { ok: true; cycle: number; summary: CycleSummary }
	| { ok: false; cycle: number; error: Error };
