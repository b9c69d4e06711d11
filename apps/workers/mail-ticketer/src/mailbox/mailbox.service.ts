import { createHash } from "node:crypto";
import type { MailboxCandidate } from "@helpdesk/core-contracts";
import {
	type LoggerService,
	type TelemetryService,
	TransportError,
	toError,
} from "@helpdesk/worker-base";
import { Injectable } from "@nestjs/common";
import type { MailboxConfig } from "./mailbox.config.js";
import type { Pop3Connection, Pop3Connector } from "./pop3.session.js";

/**
 * Stable id for a message the server lists without a UIDL
 */
export function surrogateUniqueId(raw: Buffer): string {
	return `sha256:${createHash("sha256").update(raw).digest("hex")}`;
}

@Injectable()
export class MailboxService {
	private session: Pop3Connection | null = null;

	constructor(
		private readonly config: MailboxConfig,
		private readonly connect: Pop3Connector,
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
	) {}

	/**
	 * Every message currently on the server, oldest first.
	 *
	 * One POP3 session spans the iteration; it is closed (committing any
	 * DELE issued through `markProcessed`) when the consumer finishes or
	 * stops early.
	 */
	async *listCandidates(): AsyncGenerator<MailboxCandidate> {
		if (this.session) {
			throw new TransportError("A mailbox session is already open");
		}

		const started = Date.now();
		const session = await this.connect(this.config);
		this.session = session;
		this.logger.lifecycle("Mailbox session opened", {
			host: this.config.host,
			duration_ms: Date.now() - started,
		});

		try {
			const uids = await session.uidl();
			const sizes = await session.list();
			const numbers = [...new Set([...sizes.keys(), ...uids.keys()])].sort(
				(a, b) => a - b,
			);

			this.telemetry.gauge("mailbox.messages", numbers.length);
			this.logger.debug("Mailbox listing received", {
				message_count: numbers.length,
				without_uidl: numbers.filter((n) => !uids.has(n)).length,
			});

			for (const messageNumber of numbers) {
				yield await this.toCandidate(
					session,
					messageNumber,
					uids.get(messageNumber),
					sizes.get(messageNumber),
				);
			}
		} finally {
			this.session = null;
			await this.close(session);
		}
	}

	/**
	 * Delete a sealed message when the mailbox is configured to.
	 * Only valid while `listCandidates` is being iterated.
	 */
	async markProcessed(candidate: MailboxCandidate): Promise<boolean> {
		if (!this.config.deleteAfterProcessing) {
			return false;
		}
		if (!this.session) {
			throw new TransportError(
				`No open mailbox session to delete message ${candidate.message_number}`,
			);
		}

		await this.session.dele(candidate.message_number);
		this.telemetry.increment("mailbox.deleted");
		return true;
	}

	private async toCandidate(
		session: Pop3Connection,
		messageNumber: number,
		uniqueId: string | undefined,
		sizeBytes: number | undefined,
	): Promise<MailboxCandidate> {
		let cached: Buffer | null = null;
		const load = async (): Promise<Buffer> => {
			cached ??= await session.retr(messageNumber);
			return cached;
		};

		let id = uniqueId;
		if (!id) {
			// Without a UIDL the content is the only stable identity
			id = surrogateUniqueId(await load());
			this.logger.warn("Message has no UIDL, using content hash", {
				message_number: messageNumber,
				unique_id: id,
			});
		}

		return {
			unique_id: id,
			message_number: messageNumber,
			...(sizeBytes !== undefined && { size_bytes: sizeBytes }),
			load,
		};
	}

	private async close(session: Pop3Connection): Promise<void> {
		try {
			await session.quit();
			this.logger.lifecycle("Mailbox session closed");
		} catch (error) {
			this.logger.warn("Mailbox session did not close cleanly", {
				error_message: toError(error).message,
			});
		}
	}
}
