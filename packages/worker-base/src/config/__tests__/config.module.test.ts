import { describe, expect, it } from "vitest";
import { z } from "zod";
import { LogTier } from "../../telemetry/log-tier.js";
import { ConfigValidationError } from "../config.errors.js";
import { loadWorkerConfig, parseEnv } from "../config.module.js";

describe("loadWorkerConfig", () => {
	it("applies defaults to an empty environment", () => {
		const config = loadWorkerConfig({});

		expect(config).toMatchObject({
			service: "mail-ticketer",
			version: "0.1.0",
			env: "dev",
			team: "support",
			domain: "mail",
			stage: "ingest",
			tracingEnabled: false,
			runMode: "daemon",
			poll: { intervalMs: 60000 },
			databaseTimeoutMs: 10000,
			logLevel: "info",
			logFormat: "json",
			healthPort: 3000,
		});
		expect(config.databaseUrl).toBeUndefined();
	});

	it("coerces numeric variables and keeps the run mode", () => {
		const config = loadWorkerConfig(
			{
				POLL_INTERVAL_MS: "15000",
				HEALTH_PORT: "8081",
				DATABASE_URL: "postgres://localhost/helpdesk",
				DD_TRACE_ENABLED: "true",
			},
			"once",
		);

		expect(config.poll.intervalMs).toBe(15000);
		expect(config.healthPort).toBe(8081);
		expect(config.databaseUrl).toBe("postgres://localhost/helpdesk");
		expect(config.tracingEnabled).toBe(true);
		expect(config.runMode).toBe("once");
	});

	it("uses production log shipping in production", () => {
		const config = loadWorkerConfig({ DD_ENV: "production", LOG_LEVEL: "warn" });

		expect(config.logging).toEqual({
			level: "warn",
			shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
			sampleDebugRate: 0,
		});
	});

	it("ships every tier outside production", () => {
		const config = loadWorkerConfig({ DD_ENV: "staging" });

		expect(config.logging.shipTiers).toContain(LogTier.DEBUG);
		expect(config.logging.level).toBe("info");
	});

	it("reports every invalid variable", () => {
		try {
			loadWorkerConfig({ POLL_INTERVAL_MS: "soon", LOG_FORMAT: "xml" });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigValidationError);
			if (!(error instanceof ConfigValidationError)) return;
			expect(error.errors.map((e) => e.path)).toEqual([
				"POLL_INTERVAL_MS",
				"LOG_FORMAT",
			]);
			expect(error.message).toMatch(/^Invalid worker configuration: /);
		}
	});
});

describe("parseEnv", () => {
	it("returns parsed values for a custom schema", () => {
		const schema = z.object({ MAIL_PORT: z.coerce.number().default(995) });

		expect(parseEnv(schema, {}, "mailbox")).toEqual({ MAIL_PORT: 995 });
	});
});
