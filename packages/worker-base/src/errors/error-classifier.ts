/**
 * Error classification drives what happens to a message or a cycle:
 * - retryable: leave the message unsealed, the next poll retries it
 * - non_retryable: the input itself is at fault; degrade and continue
 * - poison: a broken invariant; surface loudly
 */
export type ErrorClassification = "retryable" | "non_retryable" | "poison";

/**
 * How far a failure reaches: one message, the whole fetch cycle, or startup
 */
export type ErrorScope = "message" | "cycle" | "startup";

export class WorkerError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly classification: ErrorClassification,
		public readonly scope: ErrorScope = "message",
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "WorkerError";
	}
}

/**
 * Mail server or database unreachable. Aborts the cycle; nothing is sealed.
 */
export class TransportError extends WorkerError {
	constructor(message: string, code = "TRANSPORT", options?: { cause?: unknown }) {
		super(message, code, "retryable", "cycle", options);
		this.name = "TransportError";
	}
}

/**
 * Malformed message. Recorded as a warning on a best-effort extraction.
 */
export class ParseError extends WorkerError {
	constructor(message: string, code = "PARSE", options?: { cause?: unknown }) {
		super(message, code, "non_retryable", "message", options);
		this.name = "ParseError";
	}
}

/**
 * Attachment or record write failed. The message stays unsealed.
 */
export class StorageError extends WorkerError {
	constructor(message: string, code = "STORAGE", options?: { cause?: unknown }) {
		super(message, code, "retryable", "message", options);
		this.name = "StorageError";
	}
}

/**
 * The identity backend could not name a single winner for a conversation key.
 */
export class IdentityConflictError extends WorkerError {
	constructor(
		public readonly conversationKey: string,
		message = `No ticket id could be resolved for conversation key ${conversationKey}`,
	) {
		super(message, "IDENTITY_CONFLICT", "poison", "message");
		this.name = "IdentityConflictError";
	}
}

/**
 * Durable state exists but cannot be read back. Startup must stop here
 * rather than continue with an empty store.
 */
export class StateCorruptError extends WorkerError {
	constructor(
		public readonly location: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(
			`Durable state at ${location} is unreadable: ${message}`,
			"STATE_CORRUPT",
			"non_retryable",
			"startup",
			options,
		);
		this.name = "StateCorruptError";
	}
}

/**
 * Patterns that indicate retryable errors
 */
const RETRYABLE_PATTERNS = [
	/ECONNREFUSED/i,
	/ETIMEDOUT/i,
	/ENOTFOUND/i,
	/ECONNRESET/i,
	/EPIPE/i,
	/connection.*terminated/i,
	/connection.*reset/i,
	/timeout/i,
	/timed out/i,
	/temporarily unavailable/i,
	/too many connections/i,
	/deadlock/i,
	/could not serialize/i,
	/ENOSPC/i,
	/EACCES/i,
	/EBUSY/i,
	/network/i,
];

/**
 * Patterns that indicate malformed input
 */
const POISON_PATTERNS = [
	/unexpected token/i,
	/invalid.*format/i,
	/schema.*validation/i,
	/missing.*required/i,
];

/**
 * `code` of a Node system error (ENOENT, ECONNRESET, ...)
 */
export function systemErrorCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string"
		? error.code
		: undefined;
}

/**
 * Classify an error for retry decisions
 */
export function classifyError(error: Error): ErrorClassification {
	if (error instanceof WorkerError) {
		return error.classification;
	}

	const message = error.message;
	const code = systemErrorCode(error) ?? "";

	for (const pattern of POISON_PATTERNS) {
		if (pattern.test(message)) {
			return "poison";
		}
	}

	for (const pattern of RETRYABLE_PATTERNS) {
		if (pattern.test(message) || pattern.test(code)) {
			return "retryable";
		}
	}

	return "non_retryable";
}

/**
 * Whether an error must abort the whole fetch cycle rather than one message
 */
export function isCycleScoped(error: unknown): boolean {
	return error instanceof WorkerError && error.scope !== "message";
}

/**
 * Stable error code for logs and events
 */
export function errorCode(error: unknown): string {
	if (error instanceof WorkerError) return error.code;
	if (error instanceof Error) {
		return systemErrorCode(error) ?? error.name;
	}
	return "UNKNOWN";
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
