import { vi } from "vitest";
import type { WorkerConfig } from "../config/config.module.js";
import type { EventLogger } from "../telemetry/events.js";
import { LogTier } from "../telemetry/log-tier.js";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export const createMockConfig = (
	overrides: Partial<WorkerConfig> = {},
): WorkerConfig => ({
	service: "test-poller",
	version: "1.0.0",
	env: "test",
	team: "support",
	domain: "mail",
	stage: "ingest",
	tracingEnabled: false,
	runMode: "daemon",
	poll: { intervalMs: 1000 },
	databaseTimeoutMs: 5000,
	logLevel: "info",
	logFormat: "json",
	healthPort: 3000,
	logging: {
		level: "info",
		shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
		sampleDebugRate: 0,
	},
	...overrides,
});

export const createMockLogger = (): LoggerService =>
	({
		log: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		verbose: vi.fn(),
		critical: vi.fn(),
		operational: vi.fn(),
		lifecycle: vi.fn(),
		tiered: vi.fn(),
		child: vi.fn(),
	}) as unknown as LoggerService;

export const createMockTelemetry = (): TelemetryService =>
	({
		increment: vi.fn(),
		gauge: vi.fn(),
		timing: vi.fn(),
		withSpan: vi.fn((_name: string, _tags: unknown, fn: () => Promise<unknown>) =>
			fn(),
		),
	}) as unknown as TelemetryService;

export const createMockEvents = (): EventLogger =>
	({
		pollerStarted: vi.fn(),
		pollerShutdownInitiated: vi.fn(),
		pollerShutdownCompleted: vi.fn(),
		cycleCompleted: vi.fn(),
		cycleFailed: vi.fn(),
		messageSealed: vi.fn(),
		messageSkipped: vi.fn(),
		messageFailed: vi.fn(),
		healthChanged: vi.fn(),
	}) as unknown as EventLogger;
