import { Module } from "@nestjs/common";
import { POLLER_STATUS, type PollerStatusSource } from "../poller/poller.types.js";
import { EVENT_LOGGER, type EventLogger } from "../telemetry/events.js";
import { HealthController } from "./health.controller.js";
import {
	DATABASE_HEALTH,
	type DatabaseHealthCheck,
	HEALTH_SERVICE,
	HealthService,
} from "./health.service.js";

/**
 * Expects the application to provide POLLER_STATUS; DATABASE_HEALTH is
 * optional
 */
@Module({
	controllers: [HealthController],
	providers: [
		{
			provide: HEALTH_SERVICE,
			useFactory: (
				poller: PollerStatusSource,
				eventLogger: EventLogger,
				dbHealth?: DatabaseHealthCheck,
			) => new HealthService(poller, dbHealth, eventLogger),
			inject: [
				POLLER_STATUS,
				EVENT_LOGGER,
				{ token: DATABASE_HEALTH, optional: true },
			],
		},
	],
	exports: [HEALTH_SERVICE],
})
export class HealthModule {}
