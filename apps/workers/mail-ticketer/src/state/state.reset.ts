import type { LoggerService, WorkerConfig } from "@helpdesk/worker-base";
import { createPool } from "../db/database.module.js";
import { SeenMessageStore } from "./seen-message.store.js";
import type { StateConfig } from "./state.config.js";
import { createStateBackends } from "./state.module.js";
import { TicketIdentityRegistry } from "./ticket-identity.registry.js";

/**
 * Empty both durable stores without reading them first, so a corrupt
 * state file can be cleared too. Returns the locations that were reset.
 */
export async function resetDurableState(
	stateConfig: StateConfig,
	workerConfig: WorkerConfig,
	logger: LoggerService,
): Promise<string[]> {
	const pool =
		stateConfig.backend === "postgres" ? createPool(workerConfig) : undefined;

	try {
		const backends = createStateBackends(stateConfig, pool);
		await new SeenMessageStore(backends.seen, logger).reset();
		await new TicketIdentityRegistry(backends.identities, logger).reset();
		return [backends.seen.location, backends.identities.location];
	} finally {
		await pool?.end();
	}
}
