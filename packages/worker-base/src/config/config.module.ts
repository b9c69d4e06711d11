import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { type ZodType, type ZodTypeDef, z } from "zod";
import {
	LOCAL_LOGGING_CONFIG,
	type LoggingConfig,
	PRODUCTION_LOGGING_CONFIG,
} from "../telemetry/log-tier.js";
import { ConfigValidationError } from "./config.errors.js";

/**
 * Environment variables shared by every helpdesk poller
 */
const workerEnvSchema = z.object({
	// Unified service tags
	DD_ENV: z.string().default("dev"),
	SERVICE_NAME: z.string().min(1).default("mail-ticketer"),
	SERVICE_VERSION: z.string().min(1).default("0.1.0"),
	HELPDESK_TEAM: z.string().default("support"),
	HELPDESK_DOMAIN: z.string().default("mail"),
	HELPDESK_STAGE: z.string().default("ingest"),
	DD_TRACE_ENABLED: z
		.enum(["true", "false"])
		.default("false")
		.transform((v) => v === "true"),

	// Poll loop
	POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60000),

	// Database
	DATABASE_URL: z.string().optional(),
	DATABASE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

	// Logging and health
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),
	HEALTH_PORT: z.coerce.number().int().positive().default(3000),
});

export type WorkerEnv = z.infer<typeof workerEnvSchema>;

export type RunMode = "daemon" | "once";

export interface WorkerConfig {
	// Service identity
	service: string;
	version: string;
	env: string;

	// Helpdesk tags
	team: string;
	domain: string;
	stage: string;
	tracingEnabled: boolean;

	// Poll loop
	runMode: RunMode;
	poll: {
		intervalMs: number;
	};

	// Database
	databaseUrl?: string;
	databaseTimeoutMs: number;

	// Server
	logLevel: string;
	logFormat: "json" | "pretty";
	logging: LoggingConfig;
	healthPort: number;
}

export const WORKER_CONFIG = "WORKER_CONFIG";

export interface WorkerConfigOptions {
	envFilePath?: string;
	runMode?: RunMode;
}

type Env = Record<string, string | undefined>;

/**
 * Validate an env object against a zod schema, collecting every issue
 */
export function parseEnv<T>(
	schema: ZodType<T, ZodTypeDef, unknown>,
	env: Env,
	name: string,
): T {
	const result = schema.safeParse(env);
	if (!result.success) {
		const errors = result.error.errors.map((e) => ({
			path: e.path.join("."),
			message: e.message,
		}));
		throw new ConfigValidationError(`Invalid ${name} configuration`, errors);
	}
	return result.data;
}

export function loadWorkerConfig(
	env: Env = process.env,
	runMode: RunMode = "daemon",
): WorkerConfig {
	const parsed = parseEnv(workerEnvSchema, env, "worker");

	const logging =
		parsed.DD_ENV === "prod" || parsed.DD_ENV === "production"
			? { ...PRODUCTION_LOGGING_CONFIG, level: parsed.LOG_LEVEL }
			: { ...LOCAL_LOGGING_CONFIG, level: parsed.LOG_LEVEL };

	return {
		service: parsed.SERVICE_NAME,
		version: parsed.SERVICE_VERSION,
		env: parsed.DD_ENV,

		team: parsed.HELPDESK_TEAM,
		domain: parsed.HELPDESK_DOMAIN,
		stage: parsed.HELPDESK_STAGE,
		tracingEnabled: parsed.DD_TRACE_ENABLED,

		runMode,
		poll: { intervalMs: parsed.POLL_INTERVAL_MS },

		...(parsed.DATABASE_URL && { databaseUrl: parsed.DATABASE_URL }),
		databaseTimeoutMs: parsed.DATABASE_TIMEOUT_MS,

		logLevel: parsed.LOG_LEVEL,
		logFormat: parsed.LOG_FORMAT,
		logging,
		healthPort: parsed.HEALTH_PORT,
	};
}

@Global()
@Module({})
export class WorkerConfigModule {
	static forRoot(options: WorkerConfigOptions = {}): DynamicModule {
		return {
			module: WorkerConfigModule,
			imports: [
				ConfigModule.forRoot({
					...(options.envFilePath && { envFilePath: options.envFilePath }),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: WORKER_CONFIG,
					useFactory: () => loadWorkerConfig(process.env, options.runMode),
				},
			],
			exports: [WORKER_CONFIG],
		};
	}
}
