/**
 * A message observed on the mail server during one fetch cycle.
 *
 * The raw bytes are loaded on demand so that already-seen messages are
 * skipped without being downloaded.
 */
export interface MailboxCandidate {
	/** Server-assigned unique id (POP3 UIDL), stable across sessions */
	unique_id: string;
	/** Message number within the current server session (1-based) */
	message_number: number;
	/** Size reported by LIST, when known */
	size_bytes?: number;
	/** Retrieve the full RFC822 message */
	load(): Promise<Buffer>;
}

/**
 * Attachment blob extracted from a message, before it is stored
 */
export interface ExtractedAttachment {
	/** Sanitized filename, safe to use as a path segment */
	filename: string;
	/** Filename as it appeared in the message, decoded */
	original_filename: string;
	content_type: string;
	content: Buffer;
	size_bytes: number;
	/** Content-ID without angle brackets, for parts the HTML body embeds */
	content_id?: string;
}

/**
 * Structured ticket fields parsed out of a raw message.
 *
 * Fields that could not be decoded are left empty rather than failing the
 * extraction; `parse_warnings` says what was lost.
 */
export interface ExtractedTicket {
	unique_id: string;
	/** Bare sender address, lower-cased; empty when unknown */
	sender: string;
	sender_name?: string;
	subject: string;
	/** Plain-text body (HTML bodies are reduced to text) */
	body: string;
	body_html?: string;
	attachments: ExtractedAttachment[];
	/** Membership number quoted in the subject or body */
	membership_ref?: string;
	undelivered: boolean;
	/** Name of the bounce rule that matched, when undelivered */
	undelivered_reason?: string;
	message_id?: string;
	in_reply_to?: string;
	references: string[];
	sent_at?: string;
	parse_warnings: string[];
}
