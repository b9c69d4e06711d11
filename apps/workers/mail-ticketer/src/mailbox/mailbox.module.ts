import {
	LOGGER,
	type LoggerService,
	TelemetryService,
} from "@helpdesk/worker-base";
import { Module } from "@nestjs/common";
import { ExtractionModule } from "../extraction/extraction.module.js";
import { TicketExtractorService } from "../extraction/ticket-extractor.service.js";
import {
	MAILBOX_CONFIG,
	type MailboxConfig,
	createMailboxConfig,
} from "./mailbox.config.js";
import { MailboxPurgeService } from "./mailbox-purge.service.js";
import { MailboxService } from "./mailbox.service.js";
import {
	POP3_CONNECTOR,
	type Pop3Connector,
	connectPop3,
} from "./pop3.session.js";

@Module({
	imports: [ExtractionModule],
	providers: [
		{
			provide: MAILBOX_CONFIG,
			useFactory: () => createMailboxConfig(),
		},
		{
			provide: POP3_CONNECTOR,
			useValue: connectPop3,
		},
		{
			provide: MailboxService,
			useFactory: (
				config: MailboxConfig,
				connect: Pop3Connector,
				logger: LoggerService,
				telemetry: TelemetryService,
			) => new MailboxService(config, connect, logger, telemetry),
			inject: [MAILBOX_CONFIG, POP3_CONNECTOR, LOGGER, TelemetryService],
		},
		{
			provide: MailboxPurgeService,
			useFactory: (
				config: MailboxConfig,
				connect: Pop3Connector,
				extractor: TicketExtractorService,
				logger: LoggerService,
			) => new MailboxPurgeService(config, connect, extractor, logger),
			inject: [MAILBOX_CONFIG, POP3_CONNECTOR, TicketExtractorService, LOGGER],
		},
	],
	exports: [MailboxService, MailboxPurgeService],
})
export class MailboxModule {}
