import {
	EVENT_LOGGER,
	type EventLogger,
	LOGGER,
	LifecycleService,
	type LoggerService,
	POLLER_STATUS,
	TelemetryService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@helpdesk/worker-base";
import { Global, Module } from "@nestjs/common";
import { MemberRepository } from "../db/member.repository.js";
import { TicketRepository } from "../db/ticket.repository.js";
import { ExtractionModule } from "../extraction/extraction.module.js";
import { TicketExtractorService } from "../extraction/ticket-extractor.service.js";
import { MailboxModule } from "../mailbox/mailbox.module.js";
import { MailboxService } from "../mailbox/mailbox.service.js";
import { SeenMessageStore } from "../state/seen-message.store.js";
import { StateModule } from "../state/state.module.js";
import { TicketIdentityRegistry } from "../state/ticket-identity.registry.js";
import {
	ATTACHMENT_STORE,
	type AttachmentStore,
} from "../storage/attachment.store.js";
import { StorageModule } from "../storage/storage.module.js";
import { IngestionService } from "./ingestion.service.js";

/**
 * Global so HealthModule can read POLLER_STATUS
 */
@Global()
@Module({
	imports: [MailboxModule, ExtractionModule, StateModule, StorageModule],
	providers: [
		TicketRepository,
		MemberRepository,
		{
			provide: IngestionService,
			useFactory: (
				telemetry: TelemetryService,
				logger: LoggerService,
				events: EventLogger,
				config: WorkerConfig,
				lifecycle: LifecycleService,
				mailbox: MailboxService,
				seen: SeenMessageStore,
				extractor: TicketExtractorService,
				identities: TicketIdentityRegistry,
				members: MemberRepository,
				attachments: AttachmentStore,
				tickets: TicketRepository,
			) =>
				new IngestionService(
					telemetry,
					logger,
					events,
					config,
					{
						mailbox,
						seen,
						extractor,
						identities,
						members,
						attachments,
						tickets,
					},
					lifecycle,
				),
			inject: [
				TelemetryService,
				LOGGER,
				EVENT_LOGGER,
				WORKER_CONFIG,
				LifecycleService,
				MailboxService,
				SeenMessageStore,
				TicketExtractorService,
				TicketIdentityRegistry,
				MemberRepository,
				ATTACHMENT_STORE,
				TicketRepository,
			],
		},
		{
			provide: POLLER_STATUS,
			useExisting: IngestionService,
		},
	],
	exports: [IngestionService, POLLER_STATUS],
})
export class WorkerModule {}
