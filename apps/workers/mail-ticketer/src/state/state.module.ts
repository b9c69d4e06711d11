import { LOGGER, type LoggerService } from "@helpdesk/worker-base";
import { Module } from "@nestjs/common";
import type pg from "pg";
import { DB_POOL } from "../db/database.module.js";
import { SeenMessageStore } from "./seen-message.store.js";
import {
	type DurableMapBackend,
	type DurableSetBackend,
	FileMapBackend,
	FileSetBackend,
	PgMapBackend,
	PgSetBackend,
} from "./state.backends.js";
import {
	STATE_CONFIG,
	type StateConfig,
	createStateConfig,
} from "./state.config.js";
import { TicketIdentityRegistry } from "./ticket-identity.registry.js";

export interface StateBackends {
	seen: DurableSetBackend;
	identities: DurableMapBackend;
}

export function createStateBackends(
	config: StateConfig,
	pool?: pg.Pool,
): StateBackends {
	if (config.backend === "file") {
		return {
			seen: new FileSetBackend(config.dir),
			identities: new FileMapBackend(config.dir),
		};
	}
	if (!pool) {
		throw new Error("The postgres state backend needs a database pool");
	}
	return { seen: new PgSetBackend(pool), identities: new PgMapBackend(pool) };
}

const STATE_BACKENDS = "STATE_BACKENDS";

@Module({
	providers: [
		{
			provide: STATE_CONFIG,
			useFactory: () => createStateConfig(),
		},
		{
			provide: STATE_BACKENDS,
			useFactory: (config: StateConfig, pool: pg.Pool) =>
				createStateBackends(config, pool),
			inject: [STATE_CONFIG, DB_POOL],
		},
		{
			provide: SeenMessageStore,
			useFactory: (backends: StateBackends, logger: LoggerService) =>
				new SeenMessageStore(backends.seen, logger),
			inject: [STATE_BACKENDS, LOGGER],
		},
		{
			provide: TicketIdentityRegistry,
			useFactory: (backends: StateBackends, logger: LoggerService) =>
				new TicketIdentityRegistry(backends.identities, logger),
			inject: [STATE_BACKENDS, LOGGER],
		},
	],
	exports: [SeenMessageStore, TicketIdentityRegistry],
})
export class StateModule {}
