import type {
	AttachmentReference,
	MailboxCandidate,
	TicketUpsert,
} from "@helpdesk/core-contracts";
import {
	type EventLogger,
	type LifecycleService,
	type LoggerService,
	StorageError,
	type TelemetryService,
	TransportError,
} from "@helpdesk/worker-base";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
	createCandidate,
	createMember,
	createMockConfig,
	createMockEvents,
	createMockLogger,
	createMockTelemetry,
	rawMessage,
} from "../__tests__/fixtures.js";
import {
	MemoryMapBackend,
	MemorySetBackend,
} from "../__tests__/memory-backends.js";
import type { PersistedTicket } from "../db/ticket.repository.js";
import { BounceDetector } from "../extraction/bounce-detector.js";
import { createExtractionConfig } from "../extraction/extraction.config.js";
import { TicketExtractorService } from "../extraction/ticket-extractor.service.js";
import { SeenMessageStore } from "../state/seen-message.store.js";
import { TicketIdentityRegistry } from "../state/ticket-identity.registry.js";
import type { AttachmentStore } from "../storage/attachment.store.js";
import { IngestionService, toRequester } from "./ingestion.service.js";
import type {
	CandidateSource,
	MemberDirectory,
	TicketRecordStore,
} from "./worker.types.js";

const question = rawMessage([
	'From: "Alice Example" <alice@example.com>',
	"To: support@helpdesk.test",
	"Subject: Help: login broken",
	"Date: Tue, 01 Oct 2024 09:30:00 +0000",
	"Message-ID: <q1@example.com>",
	"Content-Type: text/plain; charset=utf-8",
	"",
	"I cannot log in.",
	"",
]);

const reply = rawMessage([
	"From: alice@example.com",
	"To: support@helpdesk.test",
	"Subject: Re: Help: login broken",
	"Date: Tue, 01 Oct 2024 10:00:00 +0000",
	"Content-Type: text/plain; charset=utf-8",
	"",
	"Still no luck.",
	"",
]);

const withReport = rawMessage([
	"From: bob@example.com",
	"To: support@helpdesk.test",
	"Subject: Printer jammed",
	"MIME-Version: 1.0",
	'Content-Type: multipart/mixed; boundary="b1"',
	"",
	"--b1",
	"Content-Type: text/plain; charset=utf-8",
	"",
	"See the attached report.",
	"",
	"--b1",
	'Content-Type: text/plain; name="report.txt"',
	'Content-Disposition: attachment; filename="report.txt"',
	"Content-Transfer-Encoding: base64",
	"",
	"aGVsbG8=",
	"--b1--",
	"",
]);

const withInlineImage = rawMessage([
	"From: carol@example.com",
	"To: support@helpdesk.test",
	"Subject: Error on checkout",
	"MIME-Version: 1.0",
	'Content-Type: multipart/related; boundary="r1"',
	"",
	"--r1",
	"Content-Type: text/html; charset=utf-8",
	"",
	'<html><body><img src="cid:img1@example.com"></body></html>',
	"",
	"--r1",
	'Content-Type: image/png; name="error.png"',
	'Content-Disposition: inline; filename="error.png"',
	"Content-ID: <img1@example.com>",
	"Content-Transfer-Encoding: base64",
	"",
	"iVBORw0KGgo=",
	"--r1--",
	"",
]);

const bounce = rawMessage([
	"From: Mail Delivery Subsystem <mailer-daemon@mx.example.net>",
	"To: support@helpdesk.test",
	"Subject: Delivery Status Notification (Failure)",
	"Content-Type: text/plain",
	"",
	"Your message could not be delivered.",
	"",
]);

class FakeMailbox implements CandidateSource {
	candidates: ReturnType<typeof createCandidate>[] = [];
	deleteAfterProcessing = false;
	deleteError: Error | null = null;
	readonly deleted: number[] = [];

	async *listCandidates(): AsyncGenerator<MailboxCandidate> {
		for (const candidate of this.candidates) {
			yield candidate;
		}
	}

	async markProcessed(candidate: MailboxCandidate): Promise<boolean> {
		if (!this.deleteAfterProcessing) return false;
		if (this.deleteError) throw this.deleteError;
		this.deleted.push(candidate.message_number);
		return true;
	}
}

class FakeAttachmentStore implements AttachmentStore {
	readonly saved: AttachmentReference[] = [];
	readonly failing = new Set<string>();
	private readonly bytes = new Map<string, Buffer>();

	async save(
		ticketId: string,
		filename: string,
		bytes: Buffer,
		contentType: string,
		originalFilename = filename,
	): Promise<AttachmentReference> {
		if (this.failing.has(filename)) {
			throw new StorageError(`Failed to write attachment ${filename}: disk full`);
		}

		const reference: AttachmentReference = {
			ticket_id: ticketId,
			stored_path: `memory://${ticketId}/${filename}`,
			stored_name: filename,
			original_filename: originalFilename,
			content_type: contentType,
			size_bytes: bytes.length,
			content_hash: "0".repeat(64),
		};
		this.bytes.set(reference.stored_path, bytes);
		this.saved.push(reference);
		return reference;
	}

	async read(reference: AttachmentReference): Promise<Buffer> {
		const stored = this.bytes.get(reference.stored_path);
		if (!stored) throw new StorageError(`Nothing stored at ${reference.stored_path}`);
		return stored;
	}
}

class FakeTicketStore implements TicketRecordStore {
	readonly upserts: TicketUpsert[] = [];
	private readonly numbers = new Map<string, number>();
	failure: Error | null = null;

	async upsertTicket(upsert: TicketUpsert): Promise<PersistedTicket> {
		if (this.failure) throw this.failure;
		this.upserts.push(upsert);
		const known = this.numbers.get(upsert.ticket_id);
		const ticketNo = known ?? this.numbers.size + 1;
		this.numbers.set(upsert.ticket_id, ticketNo);
		return {
			ticket_id: upsert.ticket_id,
			ticket_no: ticketNo,
			ticket_created: known === undefined,
			message_recorded: true,
			attachments_recorded: upsert.attachments.length,
		};
	}
}

describe("IngestionService", () => {
	let mailbox: FakeMailbox;
	let seenBackend: MemorySetBackend;
	let identityBackend: MemoryMapBackend;
	let seen: SeenMessageStore;
	let attachments: FakeAttachmentStore;
	let tickets: FakeTicketStore;
	let members: {
		findByNumber: Mock<MemberDirectory["findByNumber"]>;
		findByEmail: Mock<MemberDirectory["findByEmail"]>;
	};
	let logger: LoggerService;
	let telemetry: TelemetryService;
	let events: EventLogger;

	const createService = async (lifecycle?: LifecycleService) => {
		let minted = 0;
		const identities = new TicketIdentityRegistry(
			identityBackend,
			logger,
			() => `t-${++minted}`,
		);
		await seen.load();
		await identities.load();

		return new IngestionService(
			telemetry,
			logger,
			events,
			createMockConfig(),
			{
				mailbox,
				seen,
				extractor: new TicketExtractorService(
					createExtractionConfig({}),
					new BounceDetector(),
					logger,
				),
				identities,
				members,
				attachments,
				tickets,
			},
			lifecycle,
		);
	};

	beforeEach(() => {
		mailbox = new FakeMailbox();
		seenBackend = new MemorySetBackend();
		identityBackend = new MemoryMapBackend();
		logger = createMockLogger();
		telemetry = createMockTelemetry();
		events = createMockEvents();
		seen = new SeenMessageStore(seenBackend, logger);
		attachments = new FakeAttachmentStore();
		tickets = new FakeTicketStore();
		members = {
			findByNumber: vi.fn<MemberDirectory["findByNumber"]>(async () => null),
			findByEmail: vi.fn<MemberDirectory["findByEmail"]>(async () => null),
		};
	});

	describe("pollOnce", () => {
		it("should open a ticket and file the reply as a follow-up", async () => {
			mailbox.candidates = [
				createCandidate("u-100", 1, question),
				createCandidate("u-101", 2, reply),
			];
			const service = await createService();

			const result = await service.pollOnce();

			expect(result).toEqual({
				ok: true,
				cycle: 1,
				summary: {
					fetched: 2,
					skipped: 0,
					sealed: 2,
					created: 1,
					failed: 0,
					duration_ms: expect.any(Number),
				},
			});
			expect(
				tickets.upserts.map((u) => [u.ticket_id, u.message.unique_id]),
			).toEqual([
				["t-1", "u-100"],
				["t-1", "u-101"],
			]);
			expect(tickets.upserts[0]?.conversation_key).toBe(
				"alice@example.com|help: login broken",
			);
			expect([...seenBackend.ids]).toEqual(["u-100", "u-101"]);
		});

		it("should skip sealed messages on the next cycle without downloading them", async () => {
			const first = createCandidate("u-100", 1, question);
			const second = createCandidate("u-101", 2, reply);
			mailbox.candidates = [first, second];
			const service = await createService();

			await service.pollOnce();
			const again = await service.pollOnce();

			expect(again.ok && again.summary).toMatchObject({
				fetched: 2,
				skipped: 2,
				sealed: 0,
				created: 0,
			});
			expect(first.load).toHaveBeenCalledTimes(1);
			expect(second.load).toHaveBeenCalledTimes(1);
			expect(tickets.upserts).toHaveLength(2);
			expect(telemetry.increment).toHaveBeenCalledWith("messages.skipped", 1, {
				reason: "seen",
			});
		});

		it("should retry a message whose attachment could not be stored", async () => {
			mailbox.candidates = [createCandidate("u-102", 3, withReport)];
			attachments.failing.add("report.txt");
			const service = await createService();

			const failed = await service.pollOnce();

			expect(failed.ok && failed.summary).toMatchObject({ sealed: 0, failed: 1 });
			expect(seen.has("u-102")).toBe(false);
			expect(tickets.upserts).toHaveLength(0);
			expect(events.messageFailed).toHaveBeenCalledWith(
				"u-102",
				"STORAGE",
				"Failed to write attachment report.txt: disk full",
				"retryable",
			);

			attachments.failing.clear();
			const retried = await service.pollOnce();

			expect(retried.ok && retried.summary).toMatchObject({
				sealed: 1,
				created: 1,
				failed: 0,
			});
			expect(seen.has("u-102")).toBe(true);
			expect(tickets.upserts).toHaveLength(1);
			expect(tickets.upserts[0]?.ticket_id).toBe("t-1");
			expect(identityBackend.entries.size).toBe(1);
			expect(events.messageSealed).toHaveBeenCalledWith(
				"u-102",
				"t-1",
				expect.objectContaining({ created: true }),
			);
		});

		it("should store attachments and the rendered body under the ticket", async () => {
			mailbox.candidates = [createCandidate("u-102", 3, withReport)];
			const service = await createService();

			await service.pollOnce();

			expect(attachments.saved.map((a) => [a.stored_name, a.content_type])).toEqual([
				["report.txt", "text/plain"],
				["message-3.html", "text/html"],
			]);
			expect(attachments.saved[0]?.size_bytes).toBe(5);

			const upsert = tickets.upserts[0];
			expect(upsert?.attachments.map((a) => a.stored_path)).toEqual([
				"memory://t-1/report.txt",
			]);
			expect(upsert?.message.body_document?.stored_path).toBe(
				"memory://t-1/message-3.html",
			);
		});

		it("should store inline images and link them from the body document", async () => {
			mailbox.candidates = [createCandidate("u-103", 4, withInlineImage)];
			const service = await createService();

			await service.pollOnce();

			expect(attachments.saved.map((a) => a.stored_name)).toEqual([
				"error.png",
				"message-4.html",
			]);
			const [image, document] = attachments.saved;
			expect(tickets.upserts[0]?.attachments).toEqual([image]);
			if (!document) throw new Error("body document was not stored");
			const html = (await attachments.read(document)).toString("utf8");
			expect(html).toContain('<img src="error.png">');
			expect(html).not.toContain("cid:");
		});

		it("should leave a message unseen when the ticket cannot be recorded", async () => {
			mailbox.candidates = [createCandidate("u-100", 1, question)];
			tickets.failure = new StorageError(
				"Failed to upsert ticket t-1: value too long for type character varying(200)",
				"22001",
			);
			const service = await createService();

			const result = await service.pollOnce();

			expect(result.ok && result.summary).toMatchObject({ failed: 1 });
			expect(seen.has("u-100")).toBe(false);
			expect(logger.operational).toHaveBeenCalledWith(
				"Message failed, will retry next cycle",
				{
					unique_id: "u-100",
					message_number: 1,
					error_code: "22001",
					error_message:
						"Failed to upsert ticket t-1: value too long for type character varying(200)",
					classification: "retryable",
				},
			);
		});

		it("should abort the cycle when the mailbox stops answering", async () => {
			const stalled = createCandidate("u-101", 2, reply);
			stalled.load.mockRejectedValue(
				new TransportError("POP3 RETR 2 timed out after 30000ms", "TRANSPORT_TIMEOUT"),
			);
			mailbox.candidates = [createCandidate("u-100", 1, question), stalled];
			const service = await createService();

			const result = await service.pollOnce();

			expect(result.ok).toBe(false);
			expect(!result.ok && result.error.message).toBe(
				"POP3 RETR 2 timed out after 30000ms",
			);
			expect(seen.has("u-100")).toBe(true);
			expect(seen.has("u-101")).toBe(false);
			expect(events.cycleFailed).toHaveBeenCalledWith(
				1,
				"TRANSPORT_TIMEOUT",
				"POP3 RETR 2 timed out after 30000ms",
				expect.any(Number),
			);
			expect(service.getStatus().consecutiveFailures).toBe(1);
		});

		it("should stop between messages once shutdown begins", async () => {
			mailbox.candidates = [
				createCandidate("u-100", 1, question),
				createCandidate("u-101", 2, reply),
			];
			const lifecycle = {
				isShutdownInProgress: vi
					.fn<() => boolean>()
					.mockReturnValueOnce(false)
					.mockReturnValue(true),
				setCycleInProgress: vi.fn(),
			} as unknown as LifecycleService;
			const service = await createService(lifecycle);

			const result = await service.pollOnce();

			expect(result.ok && result.summary).toMatchObject({ fetched: 1, sealed: 1 });
			expect(seen.has("u-101")).toBe(false);
		});
	});

	describe("processCandidate", () => {
		it("should give every undelivered notice its own ticket", async () => {
			const service = await createService();

			const first = await service.processCandidate(
				createCandidate("u-200", 1, bounce),
			);
			const second = await service.processCandidate(
				createCandidate("u-201", 2, bounce),
			);

			expect(first).toMatchObject({ status: "sealed", ticket_id: "t-1", created: true });
			expect(second).toMatchObject({ status: "sealed", ticket_id: "t-2", created: true });
			expect(tickets.upserts.map((u) => u.conversation_key)).toEqual([
				"undelivered|#u-200",
				"undelivered|#u-201",
			]);
			expect(tickets.upserts[0]?.undelivered).toBe(true);
			expect(members.findByEmail).not.toHaveBeenCalled();
		});

		it("should thread a customer's mail that mentions bounced messages", async () => {
			const service = await createService();
			const mentions = (uniqueId: string, subject: string) =>
				createCandidate(
					uniqueId,
					1,
					rawMessage([
						"From: bob@example.com",
						"To: support@helpdesk.test",
						`Subject: ${subject}`,
						"Content-Type: text/plain; charset=utf-8",
						"",
						"My reset emails bounce back as undelivered.",
						"",
					]),
				);

			const first = await service.processCandidate(
				mentions("u-100", "Help: login broken"),
			);
			const second = await service.processCandidate(
				mentions("u-101", "Re: Help: login broken"),
			);

			expect(first).toMatchObject({ status: "sealed", ticket_id: "t-1" });
			expect(second).toMatchObject({ status: "sealed", ticket_id: "t-1" });
			expect(tickets.upserts.map((u) => [u.conversation_key, u.undelivered])).toEqual([
				["bob@example.com|help: login broken", false],
				["bob@example.com|help: login broken", false],
			]);
			expect(members.findByEmail).toHaveBeenCalledWith("bob@example.com");
		});

		it("should look members up by the quoted membership number first", async () => {
			members.findByNumber.mockResolvedValue(createMember());
			const service = await createService();

			await service.processCandidate(
				createCandidate(
					"u-300",
					1,
					rawMessage([
						"From: alice@example.com",
						"Subject: Card declined",
						"",
						"Membership No: AB12345",
						"",
					]),
				),
			);

			expect(members.findByNumber).toHaveBeenCalledWith("AB12345");
			expect(members.findByEmail).not.toHaveBeenCalled();
			expect(tickets.upserts[0]?.requester).toEqual({
				address: "alice@example.com",
				requested_by: "alice",
				member_no: "M-1001",
				tier: "Gold",
			});
		});

		it("should fill in the upsert from the extracted message", async () => {
			const service = await createService();

			await service.processCandidate(createCandidate("u-100", 1, question));

			expect(members.findByEmail).toHaveBeenCalledWith("alice@example.com");
			expect(tickets.upserts[0]).toMatchObject({
				ticket_id: "t-1",
				requester: {
					address: "alice@example.com",
					name: "Alice Example",
					requested_by: "alice",
				},
				subject: "Help: login broken",
				body: "I cannot log in.",
				undelivered: false,
				category: "General",
				status: "N",
				message: {
					unique_id: "u-100",
					message_id: "<q1@example.com>",
					sent_at: "2024-10-01T09:30:00.000Z",
				},
			});
			expect(events.messageSealed).toHaveBeenCalledWith("u-100", "t-1", {
				created: true,
				attachmentCount: 0,
				undelivered: false,
				durationMs: expect.any(Number),
			});
		});

		it("should delete sealed messages from the server when configured", async () => {
			mailbox.deleteAfterProcessing = true;
			const service = await createService();

			await service.processCandidate(createCandidate("u-100", 4, question));

			expect(mailbox.deleted).toEqual([4]);
		});

		it("should keep a sealed message sealed when the delete fails", async () => {
			mailbox.deleteAfterProcessing = true;
			mailbox.deleteError = new TransportError(
				"POP3 DELE rejected by server",
				"TRANSPORT_REJECTED",
			);
			const service = await createService();

			const outcome = await service.processCandidate(
				createCandidate("u-100", 4, question),
			);

			expect(outcome.status).toBe("sealed");
			expect(seen.has("u-100")).toBe(true);
			expect(logger.warn).toHaveBeenCalledWith(
				"Could not delete sealed message from server",
				{
					unique_id: "u-100",
					message_number: 4,
					error_message: "POP3 DELE rejected by server",
				},
			);
		});

		it("should not download a message it has already sealed", async () => {
			seenBackend.ids.add("u-100");
			const service = await createService();
			const candidate = createCandidate("u-100", 1, question);

			const outcome = await service.processCandidate(candidate);

			expect(outcome).toEqual({
				status: "skip",
				unique_id: "u-100",
				reason: "already seen",
			});
			expect(candidate.load).not.toHaveBeenCalled();
			expect(events.messageSkipped).toHaveBeenCalledWith("u-100", "already seen");
		});
	});
});

describe("toRequester", () => {
	it("should cut the requested-by label to 25 characters", () => {
		const requester = toRequester(
			{ sender: "a-very-long-local-part-that-exceeds@example.com" },
			null,
		);

		expect(requester).toEqual({
			address: "a-very-long-local-part-that-exceeds@example.com",
			requested_by: "a-very-long-local-part-th",
		});
	});

	it("should leave the tier out when the member has none", () => {
		const requester = toRequester(
			{ sender: "alice@example.com", sender_name: "Alice Example" },
			createMember({ tier: null }),
		);

		expect(requester).toEqual({
			address: "alice@example.com",
			name: "Alice Example",
			requested_by: "alice",
			member_no: "M-1001",
		});
	});
});
