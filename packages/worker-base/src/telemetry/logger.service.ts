import {
	Injectable,
	type LoggerService as NestLoggerService,
} from "@nestjs/common";
import pino, { type Logger as PinoLogger } from "pino";
import type { WorkerConfig } from "../config/config.module.js";
import { LogTier, shouldForwardLog } from "./log-tier.js";

export const LOGGER = "LOGGER";

/**
 * PII patterns that MUST be redacted from logs
 */
const PII_PATTERNS = [
	/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

const SENSITIVE_KEYS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/body/i, // Never log message bodies
	/raw_message/i,
	/content$/i,
];

function redactValue(value: unknown): unknown {
	if (typeof value === "string") {
		let result = value;
		for (const pattern of PII_PATTERNS) {
			result = result.replace(pattern, "[PII_REDACTED]");
		}
		return result;
	}

	if (Array.isArray(value)) {
		return value.map(redactValue);
	}

	if (value instanceof Date) {
		return value.toISOString();
	}

	if (value && typeof value === "object") {
		return redactObject(Object.fromEntries(Object.entries(value)));
	}

	return value;
}

export function redactObject(
	obj: Record<string, unknown>,
): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (SENSITIVE_KEYS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		result[key] = redactValue(value);
	}

	return result;
}

export interface LogContext {
	unique_id?: string;
	ticket_id?: string;
	stage?: string;
	error_code?: string;
	duration_ms?: number;
	[key: string]: unknown;
}

export interface TieredLogContext extends LogContext {
	tier?: LogTier;
}

@Injectable()
export class LoggerService implements NestLoggerService {
	private readonly pino: PinoLogger;
	private readonly baseTags: Record<string, string>;

	constructor(
		private readonly config: WorkerConfig,
		instance?: PinoLogger,
	) {
		this.baseTags = {
			env: config.env,
			service: config.service,
			version: config.version,
			team: config.team,
			domain: config.domain,
			stage: config.stage,
		};

		this.pino = instance ?? pino(this.buildOptions(config));
	}

	private buildOptions(config: WorkerConfig): pino.LoggerOptions {
		const options: pino.LoggerOptions = {
			level: config.logLevel,
			base: {
				env: config.env,
				service: config.service,
				version: config.version,
			},
			formatters: {
				level: (label: string) => ({ level: label }),
			},
			timestamp: pino.stdTimeFunctions.isoTime,
		};

		if (config.logFormat === "pretty") {
			options.transport = {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:standard",
					ignore: "pid,hostname",
				},
			};
		}

		return options;
	}

	private formatContext(
		context?: TieredLogContext,
		defaultTier: LogTier = LogTier.OPERATIONAL,
	): Record<string, unknown> {
		const base = { ...this.baseTags };

		if (!context) {
			const { forward } = shouldForwardLog(defaultTier, this.config.logging);
			return {
				...base,
				tier: defaultTier,
				"dd.forward": forward,
			};
		}

		const { tier: contextTier, ...rest } = context;
		const tier = contextTier ?? defaultTier;
		const { forward, sampled } = shouldForwardLog(
			tier,
			this.config.logging,
			context.unique_id,
		);

		return {
			...base,
			...redactObject(rest),
			tier,
			"dd.forward": forward,
			...(sampled !== undefined && { "dd.sampled": sampled }),
		};
	}

	log(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.info({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.info(this.formatContext(context), message);
		}
	}

	error(message: string, trace?: string, context?: string): void {
		this.pino.error(
			{ ...this.baseTags, nestContext: context, stack: trace },
			message,
		);
	}

	warn(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.warn({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.warn(this.formatContext(context), message);
		}
	}

	debug(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.debug({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.debug(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	verbose(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.trace({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.trace(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	/**
	 * Log with explicit context (preferred method for business logic)
	 */
	info(message: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), message);
	}

	/**
	 * Create a child logger with additional bound context
	 */
	child(bindings: Record<string, unknown>): LoggerService {
		return new LoggerService(
			this.config,
			this.pino.child(redactObject(bindings)),
		);
	}

	// ==========================================================================
	// Tier-aware logging methods
	// ==========================================================================

	/**
	 * Always forwarded. Use for: aborted cycles, corrupt state, uncaught errors
	 */
	critical(message: string, context?: LogContext): void {
		this.pino.error(
			this.formatContext(
				{ ...context, tier: LogTier.CRITICAL },
				LogTier.CRITICAL,
			),
			message,
		);
	}

	/**
	 * Always forwarded. Use for: sealed tickets, per-message failures
	 */
	operational(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.OPERATIONAL },
				LogTier.OPERATIONAL,
			),
			message,
		);
	}

	/**
	 * Use for: startup, shutdown, mailbox connect/disconnect
	 */
	lifecycle(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.LIFECYCLE },
				LogTier.LIFECYCLE,
			),
			message,
		);
	}

	tiered(tier: LogTier, message: string, context?: LogContext): void {
		const formattedContext = this.formatContext({ ...context, tier }, tier);

		switch (tier) {
			case LogTier.CRITICAL:
				this.pino.error(formattedContext, message);
				break;
			case LogTier.OPERATIONAL:
			case LogTier.LIFECYCLE:
				this.pino.info(formattedContext, message);
				break;
			case LogTier.DEBUG:
				this.pino.debug(formattedContext, message);
				break;
		}
	}
}
