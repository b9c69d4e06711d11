import {
	StorageError,
	TransportError,
	WorkerError,
	systemErrorCode,
	toError,
} from "@helpdesk/worker-base";

const CONNECTION_ERROR_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ETIMEDOUT",
	"ENOTFOUND",
	"EHOSTUNREACH",
	"EPIPE",
	// admin_shutdown, cannot_connect_now
	"57P01",
	"57P03",
]);

const CONNECTION_MESSAGES =
	/connection terminated|timeout exceeded when trying to connect|Connection refused/i;

/**
 * Map a pg failure onto the worker error taxonomy: an unreachable database
 * aborts the cycle, anything else fails the one message
 */
export function databaseFailure(action: string, error: unknown): WorkerError {
	const err = toError(error);
	if (err instanceof WorkerError) return err;

	const code = systemErrorCode(err);
	// SQLSTATE class 08: connection exception
	if (
		(code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) ||
		CONNECTION_MESSAGES.test(err.message)
	) {
		return new TransportError(
			`Database unreachable while trying to ${action}: ${err.message}`,
			"DATABASE_UNREACHABLE",
			{ cause: err },
		);
	}

	return new StorageError(`Failed to ${action}: ${err.message}`, code ?? "DATABASE", {
		cause: err,
	});
}
