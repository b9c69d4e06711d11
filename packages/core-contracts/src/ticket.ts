/**
 * Ticket status codes as stored in the record store
 */
export type TicketStatus = "N" | "O" | "C";

/**
 * Member directory entry used to enrich the requester identity
 */
export interface MemberRecord {
	member_no: string;
	email: string;
	title: string | null;
	first_name: string | null;
	last_name: string | null;
	tier: string | null;
}

/**
 * Who raised the ticket
 */
export interface TicketRequester {
	address: string;
	name?: string;
	/** Local part of the address, used as the short requester label */
	requested_by: string;
	member_no?: string;
	tier?: string;
}

/**
 * Handle to attachment bytes held by the attachment store
 */
export interface AttachmentReference {
	ticket_id: string;
	/** Filesystem path or s3:// URI */
	stored_path: string;
	/** Name the bytes were stored under (after collision suffixing) */
	stored_name: string;
	original_filename: string;
	content_type: string;
	size_bytes: number;
	/** sha256 of the stored bytes, hex */
	content_hash: string;
}

/**
 * One ingested message in a ticket's history
 */
export interface TicketMessageEntry {
	unique_id: string;
	sender: string;
	subject: string;
	body: string;
	undelivered: boolean;
	message_id?: string;
	sent_at?: string;
	received_at: string;
	/** Reference to the rendered HTML body document */
	body_document?: AttachmentReference;
}

/**
 * Fields written by `upsertTicket`.
 *
 * The ticket id may have been minted by an earlier attempt that failed
 * before the ticket was written, so the record store inserts or updates
 * and reports which one happened.
 */
export interface TicketUpsert {
	ticket_id: string;
	conversation_key: string;
	requester: TicketRequester;
	subject: string;
	body: string;
	undelivered: boolean;
	category: string;
	status: TicketStatus;
	message: TicketMessageEntry;
	attachments: AttachmentReference[];
}

/**
 * Outcome of one message passing through the ingestion pipeline
 */
export type IngestionOutcome =
	| {
			status: "sealed";
			unique_id: string;
			ticket_id: string;
			created: boolean;
			attachment_count: number;
			undelivered: boolean;
	  }
	| { status: "skip"; unique_id: string; reason: string }
	| { status: "retry"; unique_id: string; reason: string; error: Error };

/**
 * Result of a full fetch cycle
 */
export interface CycleSummary {
	fetched: number;
	skipped: number;
	sealed: number;
	created: number;
	failed: number;
	duration_ms: number;
}
