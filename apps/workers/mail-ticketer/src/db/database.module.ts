import {
	DATABASE_HEALTH,
	type DatabaseHealthCheck,
	LOGGER,
	type LoggerService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@helpdesk/worker-base";
import {
	Global,
	Inject,
	Module,
	type OnModuleDestroy,
	type OnModuleInit,
} from "@nestjs/common";
import pg from "pg";
import { databaseFailure } from "./database.errors.js";

const { Pool } = pg;

export const DB_POOL = "DB_POOL";

export function createPool(config: WorkerConfig): pg.Pool {
	if (!config.databaseUrl) {
		throw new Error("DATABASE_URL is required");
	}

	return new Pool({
		connectionString: config.databaseUrl,
		max: 5,
		idleTimeoutMillis: 30000,
		connectionTimeoutMillis: config.databaseTimeoutMs,
		statement_timeout: config.databaseTimeoutMs,
		query_timeout: config.databaseTimeoutMs,
	});
}

@Global()
@Module({
	providers: [
		{
			provide: DB_POOL,
			useFactory: (config: WorkerConfig) => createPool(config),
			inject: [WORKER_CONFIG],
		},
		{
			provide: DATABASE_HEALTH,
			useFactory: (pool: pg.Pool): DatabaseHealthCheck => ({
				async check(): Promise<boolean> {
					try {
						await pool.query("SELECT 1");
						return true;
					} catch {
						return false;
					}
				},
			}),
			inject: [DB_POOL],
		},
	],
	exports: [DB_POOL, DATABASE_HEALTH],
})
export class DatabaseModule implements OnModuleInit, OnModuleDestroy {
	constructor(
		@Inject(DB_POOL) private readonly pool: pg.Pool,
		@Inject(LOGGER) private readonly logger: LoggerService,
	) {}

	/**
	 * Fail startup when the record store cannot be reached at all
	 */
	async onModuleInit(): Promise<void> {
		try {
			await this.pool.query("SELECT 1");
		} catch (error) {
			throw databaseFailure("connect to the record store", error);
		}
		this.logger.lifecycle("Database connection verified");
	}

	async onModuleDestroy(): Promise<void> {
		this.logger.lifecycle("Closing database pool");
		await this.pool.end();
	}
}
