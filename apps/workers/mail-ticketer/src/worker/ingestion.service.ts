import type {
	AttachmentReference,
	CycleSummary,
	ExtractedTicket,
	IngestionOutcome,
	MailboxCandidate,
	MemberRecord,
	TicketRequester,
	TicketUpsert,
} from "@helpdesk/core-contracts";
import {
	BasePollerService,
	type EventLogger,
	type LifecycleService,
	type LoggerService,
	type TelemetryService,
	type WorkerConfig,
	classifyError,
	errorCode,
	isCycleScoped,
	toError,
} from "@helpdesk/worker-base";
import { Injectable } from "@nestjs/common";
import { renderBodyDocument } from "../extraction/body-renderer.js";
import { conversationKey } from "../extraction/conversation-key.js";
import type { TicketExtractorService } from "../extraction/ticket-extractor.service.js";
import type { SeenMessageStore } from "../state/seen-message.store.js";
import type { TicketIdentityRegistry } from "../state/ticket-identity.registry.js";
import type { AttachmentStore } from "../storage/attachment.store.js";
import {
	type CandidateSource,
	DEFAULT_CATEGORY,
	type MemberDirectory,
	REQUESTED_BY_MAX_LENGTH,
	type TicketRecordStore,
} from "./worker.types.js";

export interface IngestionDependencies {
	mailbox: CandidateSource;
	seen: SeenMessageStore;
	extractor: TicketExtractorService;
	identities: TicketIdentityRegistry;
	members: MemberDirectory;
	attachments: AttachmentStore;
	tickets: TicketRecordStore;
}

/**
 * Turns each unseen mailbox message into a new ticket or a follow-up.
 *
 * A message is marked seen only after its ticket, message row and
 * attachments are durable; anything that fails before that leaves it
 * unseen so the next cycle retries it.
 */
@Injectable()
export class IngestionService extends BasePollerService {
	constructor(
		telemetry: TelemetryService,
		logger: LoggerService,
		events: EventLogger,
		config: WorkerConfig,
		private readonly deps: IngestionDependencies,
		lifecycle?: LifecycleService,
	) {
		super(telemetry, logger, events, config, lifecycle);
	}

	protected async runCycle(cycle: number): Promise<CycleSummary> {
		const started = Date.now();
		const summary: CycleSummary = {
			fetched: 0,
			skipped: 0,
			sealed: 0,
			created: 0,
			failed: 0,
			duration_ms: 0,
		};

		for await (const candidate of this.deps.mailbox.listCandidates()) {
			if (this.isStopping()) {
				this.logger.lifecycle("Shutdown requested, ending cycle early", {
					cycle,
					unique_id: candidate.unique_id,
				});
				break;
			}

			summary.fetched += 1;
			const outcome = await this.processCandidate(candidate);

			switch (outcome.status) {
				case "skip":
					summary.skipped += 1;
					break;
				case "sealed":
					summary.sealed += 1;
					if (outcome.created) summary.created += 1;
					break;
				case "retry":
					summary.failed += 1;
					break;
			}
		}

		summary.duration_ms = Date.now() - started;
		return summary;
	}

	/**
	 * Run one candidate through the pipeline. Cycle-scoped failures
	 * (mailbox or database unreachable) are rethrown; anything else is
	 * reported as a retry outcome.
	 */
	async processCandidate(candidate: MailboxCandidate): Promise<IngestionOutcome> {
		const uniqueId = candidate.unique_id;

		if (this.deps.seen.has(uniqueId)) {
			this.telemetry.increment("messages.skipped", 1, { reason: "seen" });
			this.events.messageSkipped(uniqueId, "already seen");
			return { status: "skip", unique_id: uniqueId, reason: "already seen" };
		}

		const started = Date.now();
		try {
			const outcome = await this.telemetry.withSpan(
				"ingest.message",
				{ unique_id: uniqueId },
				() => this.ingest(candidate),
			);

			this.telemetry.increment("messages.sealed", 1, {
				created: String(outcome.created),
			});
			this.events.messageSealed(uniqueId, outcome.ticket_id, {
				created: outcome.created,
				attachmentCount: outcome.attachment_count,
				undelivered: outcome.undelivered,
				durationMs: Date.now() - started,
			});

			return outcome;
		} catch (error) {
			if (isCycleScoped(error)) {
				throw error;
			}

			const err = toError(error);
			const classification = classifyError(err);

			this.telemetry.increment("messages.failed", 1, {
				error_code: errorCode(err),
			});
			this.logger.operational("Message failed, will retry next cycle", {
				unique_id: uniqueId,
				message_number: candidate.message_number,
				error_code: errorCode(err),
				error_message: err.message,
				classification,
			});
			this.events.messageFailed(
				uniqueId,
				errorCode(err),
				err.message,
				classification,
			);

			return {
				status: "retry",
				unique_id: uniqueId,
				reason: err.message,
				error: err,
			};
		}
	}

	private async ingest(
		candidate: MailboxCandidate,
	): Promise<Extract<IngestionOutcome, { status: "sealed" }>> {
		const uniqueId = candidate.unique_id;
		const raw = await candidate.load();
		const ticket = await this.deps.extractor.extract(raw, uniqueId);

		if (ticket.parse_warnings.length > 0) {
			this.logger.warn("Message extracted with warnings", {
				unique_id: uniqueId,
				warnings: ticket.parse_warnings,
			});
		}

		const key = conversationKey({
			unique_id: uniqueId,
			sender: ticket.sender,
			subject: ticket.subject,
			undelivered: ticket.undelivered,
		});
		const { ticketId } = await this.deps.identities.resolveOrCreate(key);

		const member = await this.findMember(ticket);
		const attachments = await this.saveAttachments(ticketId, ticket);
		const inlineParts = new Map<string, string>();
		ticket.attachments.forEach((attachment, i) => {
			const stored = attachments[i];
			if (attachment.content_id && stored) {
				inlineParts.set(attachment.content_id, stored.stored_name);
			}
		});
		const bodyDocument = await this.deps.attachments.save(
			ticketId,
			`message-${candidate.message_number}.html`,
			Buffer.from(renderBodyDocument(ticket, member, inlineParts), "utf8"),
			"text/html",
		);

		const persisted = await this.deps.tickets.upsertTicket(
			this.toUpsert(ticketId, key, ticket, member, {
				attachments,
				bodyDocument,
			}),
		);
		// The record store knows whether the ticket is new, even on a retry
		const created = persisted.ticket_created;

		await this.deps.seen.markSeen(uniqueId);
		await this.deleteFromServer(candidate);

		this.logger.info(created ? "Ticket created" : "Follow-up added to ticket", {
			unique_id: uniqueId,
			ticket_id: ticketId,
			attachment_count: attachments.length,
			undelivered: ticket.undelivered,
		});

		return {
			status: "sealed",
			unique_id: uniqueId,
			ticket_id: ticketId,
			created,
			attachment_count: attachments.length,
			undelivered: ticket.undelivered,
		};
	}

	private async findMember(ticket: ExtractedTicket): Promise<MemberRecord | null> {
		if (ticket.undelivered) return null;

		if (ticket.membership_ref) {
			const byNumber = await this.deps.members.findByNumber(ticket.membership_ref);
			if (byNumber) return byNumber;
		}
		if (!ticket.sender) return null;

		return this.deps.members.findByEmail(ticket.sender);
	}

	private async saveAttachments(
		ticketId: string,
		ticket: ExtractedTicket,
	): Promise<AttachmentReference[]> {
		const references: AttachmentReference[] = [];
		for (const attachment of ticket.attachments) {
			references.push(
				await this.deps.attachments.save(
					ticketId,
					attachment.filename,
					attachment.content,
					attachment.content_type,
					attachment.original_filename,
				),
			);
		}
		return references;
	}

	/**
	 * The message is already sealed here; a failed DELE only means the
	 * server keeps a copy that will be skipped as seen
	 */
	private async deleteFromServer(candidate: MailboxCandidate): Promise<void> {
		try {
			await this.deps.mailbox.markProcessed(candidate);
		} catch (error) {
			this.logger.warn("Could not delete sealed message from server", {
				unique_id: candidate.unique_id,
				message_number: candidate.message_number,
				error_message: toError(error).message,
			});
		}
	}

	private toUpsert(
		ticketId: string,
		key: string,
		ticket: ExtractedTicket,
		member: MemberRecord | null,
		stored: {
			attachments: AttachmentReference[];
			bodyDocument: AttachmentReference;
		},
	): TicketUpsert {
		const message: TicketUpsert["message"] = {
			unique_id: ticket.unique_id,
			sender: ticket.sender,
			subject: ticket.subject,
			body: ticket.body,
			undelivered: ticket.undelivered,
			received_at: new Date().toISOString(),
			body_document: stored.bodyDocument,
		};
		if (ticket.message_id) message.message_id = ticket.message_id;
		if (ticket.sent_at) message.sent_at = ticket.sent_at;

		return {
			ticket_id: ticketId,
			conversation_key: key,
			requester: toRequester(ticket, member),
			subject: ticket.subject,
			body: ticket.body,
			undelivered: ticket.undelivered,
			category: DEFAULT_CATEGORY,
			status: "N",
			message,
			attachments: stored.attachments,
		};
	}
}

export function toRequester(
	ticket: Pick<ExtractedTicket, "sender" | "sender_name">,
	member: MemberRecord | null,
): TicketRequester {
	const localPart = ticket.sender.split("@")[0] ?? "";
	const requester: TicketRequester = {
		address: ticket.sender,
		requested_by: localPart.slice(0, REQUESTED_BY_MAX_LENGTH),
	};
	if (ticket.sender_name) requester.name = ticket.sender_name;
	if (member) {
		requester.member_no = member.member_no;
		if (member.tier) requester.tier = member.tier;
	}
	return requester;
}
