import { LOGGER, type LoggerService } from "@helpdesk/worker-base";
import { Module } from "@nestjs/common";
import { BounceDetector, DEFAULT_BOUNCE_RULES } from "./bounce-detector.js";
import {
	EXTRACTION_CONFIG,
	type ExtractionConfig,
	createExtractionConfig,
} from "./extraction.config.js";
import { TicketExtractorService } from "./ticket-extractor.service.js";

@Module({
	providers: [
		{
			provide: EXTRACTION_CONFIG,
			useFactory: () => createExtractionConfig(),
		},
		{
			provide: BounceDetector,
			useFactory: () => new BounceDetector(DEFAULT_BOUNCE_RULES),
		},
		{
			provide: TicketExtractorService,
			useFactory: (
				config: ExtractionConfig,
				bounceDetector: BounceDetector,
				logger: LoggerService,
			) => new TicketExtractorService(config, bounceDetector, logger),
			inject: [EXTRACTION_CONFIG, BounceDetector, LOGGER],
		},
	],
	exports: [TicketExtractorService],
})
export class ExtractionModule {}
