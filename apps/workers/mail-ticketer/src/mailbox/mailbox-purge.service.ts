import type { ExtractedTicket } from "@helpdesk/core-contracts";
import {
	type LoggerService,
	TransportError,
	toError,
} from "@helpdesk/worker-base";
import { Injectable } from "@nestjs/common";
import type { TicketExtractorService } from "../extraction/ticket-extractor.service.js";
import type { MailboxConfig } from "./mailbox.config.js";
import type { Pop3Connection, Pop3Connector } from "./pop3.session.js";

export interface PurgeCriteria {
	/** Only messages whose Date header is strictly earlier */
	before?: Date;
	/** Case-insensitive substring of the sender address */
	fromContains?: string;
	/** Case-insensitive, matched against the decoded subject */
	subjectPattern?: string;
	/** true: only bounces; false: only non-bounces */
	undelivered?: boolean;
	/** Defaults to true */
	dryRun?: boolean;
}

export interface PurgeError {
	message_number: number;
	error_message: string;
}

export interface PurgeResult {
	checked: number;
	matched: number;
	deleted: number;
	dry_run: boolean;
	errors: PurgeError[];
}

/**
 * Whether an extracted message satisfies every given criterion
 */
export function matchesPurgeCriteria(
	ticket: Pick<ExtractedTicket, "sender" | "subject" | "undelivered" | "sent_at">,
	criteria: PurgeCriteria,
	subjectRegex?: RegExp,
): boolean {
	if (criteria.before) {
		if (!ticket.sent_at) return false;
		const sent = Date.parse(ticket.sent_at);
		if (Number.isNaN(sent) || sent >= criteria.before.getTime()) return false;
	}

	if (
		criteria.fromContains !== undefined &&
		!ticket.sender.includes(criteria.fromContains.toLowerCase())
	) {
		return false;
	}

	if (subjectRegex && !subjectRegex.test(ticket.subject)) {
		return false;
	}

	if (
		criteria.undelivered !== undefined &&
		ticket.undelivered !== criteria.undelivered
	) {
		return false;
	}

	return true;
}

/**
 * Bulk deletion of messages left on the server, for operators cleaning
 * up a mailbox that was not configured to delete after processing
 */
@Injectable()
export class MailboxPurgeService {
	constructor(
		private readonly config: MailboxConfig,
		private readonly connect: Pop3Connector,
		private readonly extractor: TicketExtractorService,
		private readonly logger: LoggerService,
	) {}

	async purge(criteria: PurgeCriteria): Promise<PurgeResult> {
		const dryRun = criteria.dryRun ?? true;
		const subjectRegex =
			criteria.subjectPattern !== undefined
				? new RegExp(criteria.subjectPattern, "i")
				: undefined;

		const result: PurgeResult = {
			checked: 0,
			matched: 0,
			deleted: 0,
			dry_run: dryRun,
			errors: [],
		};

		const session = await this.connect(this.config);
		try {
			const sizes = await session.list();
			const numbers = [...sizes.keys()].sort((a, b) => a - b);

			for (const messageNumber of numbers) {
				result.checked += 1;
				try {
					const matched = await this.examine(
						session,
						messageNumber,
						criteria,
						subjectRegex,
					);
					if (!matched) continue;

					result.matched += 1;
					if (!dryRun) {
						await session.dele(messageNumber);
						result.deleted += 1;
					}
				} catch (error) {
					// A dropped connection ends the purge; anything else is per message
					if (
						error instanceof TransportError &&
						error.code !== "TRANSPORT_REJECTED"
					) {
						throw error;
					}
					result.errors.push({
						message_number: messageNumber,
						error_message: toError(error).message,
					});
				}
			}
		} finally {
			// Deletions are committed by QUIT
			await session.quit();
		}

		this.logger.operational("Mailbox purge finished", {
			checked: result.checked,
			matched: result.matched,
			deleted: result.deleted,
			dry_run: dryRun,
			error_count: result.errors.length,
		});

		return result;
	}

	private async examine(
		session: Pop3Connection,
		messageNumber: number,
		criteria: PurgeCriteria,
		subjectRegex: RegExp | undefined,
	): Promise<boolean> {
		const raw = await session.retr(messageNumber);
		const ticket = await this.extractor.extract(raw, `purge-${messageNumber}`);
		const matched = matchesPurgeCriteria(ticket, criteria, subjectRegex);

		this.logger.debug("Purge candidate examined", {
			message_number: messageNumber,
			matched,
			undelivered: ticket.undelivered,
		});

		return matched;
	}
}
