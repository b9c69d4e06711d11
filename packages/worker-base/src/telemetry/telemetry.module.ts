import { Global, Module } from "@nestjs/common";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { EVENT_LOGGER, EventLogger } from "./events.js";
import { LOGGER, LoggerService } from "./logger.service.js";
import { TelemetryService } from "./telemetry.service.js";

@Global()
@Module({
	providers: [
		{
			provide: TelemetryService,
			useFactory: async (config: WorkerConfig) => {
				const service = new TelemetryService();
				await service.initialize(config);
				return service;
			},
			inject: [WORKER_CONFIG],
		},
		{
			provide: LOGGER,
			useFactory: (config: WorkerConfig) => new LoggerService(config),
			inject: [WORKER_CONFIG],
		},
		{
			provide: EVENT_LOGGER,
			useFactory: (logger: LoggerService, config: WorkerConfig) =>
				new EventLogger(logger, config),
			inject: [LOGGER, WORKER_CONFIG],
		},
	],
	exports: [TelemetryService, LOGGER, EVENT_LOGGER],
})
export class TelemetryModule {}
