import type {
	ExtractedAttachment,
	ExtractedTicket,
} from "@helpdesk/core-contracts";
import { type LoggerService, ParseError, toError } from "@helpdesk/worker-base";
import { Injectable } from "@nestjs/common";
import { type Attachment, type ParsedMail, simpleParser } from "mailparser";
import type { BounceDetector, BounceSignals } from "./bounce-detector.js";
import type { ExtractionConfig } from "./extraction.config.js";
import { sanitizeFilename } from "./filename.js";

/** Body text kept from a message that could not be parsed at all */
const UNPARSED_BODY_LIMIT = 64 * 1024;

@Injectable()
export class TicketExtractorService {
	constructor(
		private readonly config: ExtractionConfig,
		private readonly bounceDetector: BounceDetector,
		private readonly logger: LoggerService,
	) {}

	/**
	 * Parse a raw message into ticket fields. Never throws: what cannot be
	 * decoded is left empty and noted in `parse_warnings`.
	 */
	async extract(raw: Buffer, uniqueId: string): Promise<ExtractedTicket> {
		let parsed: ParsedMail;
		try {
			// Inline parts are stored as attachments, so cid: links stay links
			parsed = await simpleParser(raw, { keepCidLinks: true });
		} catch (error) {
			const warning = new ParseError(
				`Message could not be parsed: ${toError(error).message}`,
			);
			this.logger.warn("Falling back to raw message text", {
				unique_id: uniqueId,
				error_code: warning.code,
				error_message: warning.message,
			});
			return this.unparsed(raw, uniqueId, warning);
		}

		return this.fromParsed(parsed, uniqueId);
	}

	private fromParsed(parsed: ParsedMail, uniqueId: string): ExtractedTicket {
		const warnings: string[] = [];

		const from = parsed.from?.value[0];
		const sender = from?.address?.trim().toLowerCase() ?? "";
		const senderName = from?.name?.trim();
		if (!sender) warnings.push("missing or undecodable From header");

		const subject = parsed.subject?.trim() ?? "";
		const bodyHtml = typeof parsed.html === "string" ? parsed.html : undefined;
		const body = (parsed.text ?? "").trim();

		const attachments = this.collectAttachments(parsed.attachments, warnings);
		const verdict = this.bounceDetector.detect({
			sender,
			...(senderName && { senderName }),
			subject,
			...contentTypeSignals(parsed),
		});

		const ticket: ExtractedTicket = {
			unique_id: uniqueId,
			sender,
			subject,
			body,
			attachments,
			undelivered: verdict.undelivered,
			references: toList(parsed.references),
			parse_warnings: warnings,
		};

		if (senderName) ticket.sender_name = senderName;
		if (bodyHtml) ticket.body_html = bodyHtml;
		if (verdict.reason) ticket.undelivered_reason = verdict.reason;
		if (parsed.messageId) ticket.message_id = parsed.messageId;
		if (parsed.inReplyTo) ticket.in_reply_to = parsed.inReplyTo;
		if (parsed.date && !Number.isNaN(parsed.date.getTime())) {
			ticket.sent_at = parsed.date.toISOString();
		}

		const membershipRef = this.findMembershipRef(subject, body);
		if (membershipRef) ticket.membership_ref = membershipRef;

		return ticket;
	}

	private collectAttachments(
		parts: Attachment[],
		warnings: string[],
	): ExtractedAttachment[] {
		const attachments: ExtractedAttachment[] = [];

		for (const part of parts) {
			const position = attachments.length + 1;
			const original = part.filename?.trim() ?? "";
			const filename = sanitizeFilename(original, `attachment-${position}`);
			if (original && filename !== original) {
				warnings.push(`attachment ${position} renamed to "${filename}"`);
			}

			const attachment: ExtractedAttachment = {
				filename,
				original_filename: original || filename,
				content_type: part.contentType || "application/octet-stream",
				content: part.content,
				size_bytes: part.content.length,
			};
			// Inline parts are stored too; the body document links to them
			const contentId = part.cid?.trim();
			if (contentId) attachment.content_id = contentId;
			attachments.push(attachment);
		}

		return attachments;
	}

	private findMembershipRef(subject: string, body: string): string | undefined {
		for (const text of [subject, body]) {
			const ref = this.config.membershipPattern.exec(text)?.[1]?.trim();
			if (ref) return ref;
		}
		return undefined;
	}

	private unparsed(
		raw: Buffer,
		uniqueId: string,
		warning: ParseError,
	): ExtractedTicket {
		const body = raw.toString("latin1").slice(0, UNPARSED_BODY_LIMIT);

		// Without a sender or subject there is nothing to judge a bounce by
		return {
			unique_id: uniqueId,
			sender: "",
			subject: "",
			body,
			attachments: [],
			undelivered: false,
			references: [],
			parse_warnings: [warning.message],
		};
	}
}

function toList(value: string | string[] | undefined): string[] {
	if (!value) return [];
	return Array.isArray(value) ? value : [value];
}

function contentTypeSignals(
	parsed: ParsedMail,
): Pick<BounceSignals, "contentType" | "reportType"> {
	const header = parsed.headers.get("content-type");
	if (!header || typeof header !== "object" || !("params" in header)) {
		return {};
	}

	const reportType = header.params["report-type"];
	return {
		contentType: header.value.toLowerCase(),
		...(reportType && { reportType }),
	};
}
