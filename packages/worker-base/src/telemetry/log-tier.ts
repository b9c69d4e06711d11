/**
 * Log tiers decide which records are forwarded to the log pipeline:
 * - CRITICAL: always (cycle aborts, corrupt state, uncaught errors)
 * - OPERATIONAL: always (sealed tickets, per-message failures)
 * - LIFECYCLE: startup, shutdown, connection changes
 * - DEBUG: only when sampled
 */
export enum LogTier {
	CRITICAL = "critical",
	OPERATIONAL = "operational",
	LIFECYCLE = "lifecycle",
	DEBUG = "debug",
}

export interface LoggingConfig {
	/** Base log level (debug, info, warn, error) */
	level: string;
	/** Tiers forwarded downstream */
	shipTiers: LogTier[];
	/** Fraction of debug logs to forward (0-1) */
	sampleDebugRate: number;
}

export const PRODUCTION_LOGGING_CONFIG: LoggingConfig = {
	level: "info",
	shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
	sampleDebugRate: 0,
};

export const LOCAL_LOGGING_CONFIG: LoggingConfig = {
	level: "debug",
	shipTiers: [
		LogTier.CRITICAL,
		LogTier.OPERATIONAL,
		LogTier.LIFECYCLE,
		LogTier.DEBUG,
	],
	sampleDebugRate: 1,
};

export function shouldForwardLog(
	tier: LogTier,
	config: LoggingConfig,
	sampleKey?: string,
): { forward: boolean; sampled?: boolean } {
	if (tier === LogTier.CRITICAL) {
		return { forward: true };
	}

	if (!config.shipTiers.includes(tier)) {
		return { forward: false };
	}

	if (tier !== LogTier.DEBUG) {
		return { forward: true };
	}

	if (config.sampleDebugRate <= 0) {
		return { forward: false };
	}
	if (config.sampleDebugRate >= 1) {
		return { forward: true, sampled: true };
	}

	// Same key, same decision: all debug lines of one message travel together
	const sampled = sampleKey
		? hashToRate(sampleKey) < config.sampleDebugRate
		: Math.random() < config.sampleDebugRate;

	return { forward: sampled, sampled };
}

function hashToRate(key: string): number {
	let hash = 0;
	for (let i = 0; i < key.length; i++) {
		hash = (hash << 5) - hash + key.charCodeAt(i);
		hash |= 0;
	}
	return Math.abs(hash) / 2147483647;
}
