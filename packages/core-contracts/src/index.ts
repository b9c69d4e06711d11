// Mail payloads
export type {
	MailboxCandidate,
	ExtractedAttachment,
	ExtractedTicket,
} from "./mail.js";

// Ticket records
export type {
	TicketStatus,
	MemberRecord,
	TicketRequester,
	AttachmentReference,
	TicketMessageEntry,
	TicketUpsert,
	IngestionOutcome,
	CycleSummary,
} from "./ticket.js";

// Contract versions
export { CONTRACT_VERSIONS } from "./versions.js";
export type { ContractName } from "./versions.js";
