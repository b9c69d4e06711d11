import {
	HealthModule,
	LifecycleModule,
	type RunMode,
	TelemetryModule,
	WorkerConfigModule,
} from "@helpdesk/worker-base";
import { type DynamicModule, Module } from "@nestjs/common";
import { DatabaseModule } from "./db/database.module.js";
import { MailboxModule } from "./mailbox/mailbox.module.js";
import { STATE_CONFIG, createStateConfig } from "./state/state.config.js";
import { WorkerModule } from "./worker/worker.module.js";

const ENV_FILE = ".env";

/**
 * The ingestion worker. Daemon mode also serves the health endpoints.
 */
@Module({})
export class AppModule {
	static forRoot(options: { runMode: RunMode }): DynamicModule {
		return {
			module: AppModule,
			imports: [
				// Core infrastructure
				WorkerConfigModule.forRoot({
					envFilePath: ENV_FILE,
					runMode: options.runMode,
				}),
				TelemetryModule,
				LifecycleModule,

				DatabaseModule,

				// Worker business logic
				WorkerModule,

				...(options.runMode === "daemon" ? [HealthModule] : []),
			],
		};
	}
}

/**
 * Just enough to talk to the mailbox, for `purge`
 */
@Module({
	imports: [
		WorkerConfigModule.forRoot({ envFilePath: ENV_FILE, runMode: "once" }),
		TelemetryModule,
		MailboxModule,
	],
})
export class MailboxAdminModule {}

/**
 * Configuration only, for `reset-state`; the stores are never loaded
 */
@Module({
	imports: [
		WorkerConfigModule.forRoot({ envFilePath: ENV_FILE, runMode: "once" }),
		TelemetryModule,
	],
	providers: [
		{
			provide: STATE_CONFIG,
			useFactory: () => createStateConfig(),
		},
	],
	exports: [STATE_CONFIG],
})
export class StateAdminModule {}
