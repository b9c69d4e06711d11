import type {
	MailboxCandidate,
	MemberRecord,
	TicketUpsert,
} from "@helpdesk/core-contracts";
import type { PersistedTicket } from "../db/ticket.repository.js";

/**
 * Where candidates come from; implemented by MailboxService
 */
export interface CandidateSource {
	listCandidates(): AsyncIterable<MailboxCandidate>;
	markProcessed(candidate: MailboxCandidate): Promise<boolean>;
}

/**
 * Membership directory reads; implemented by MemberRepository
 */
export interface MemberDirectory {
	findByNumber(memberNo: string): Promise<MemberRecord | null>;
	findByEmail(email: string): Promise<MemberRecord | null>;
}

/**
 * Ticket persistence; implemented by TicketRepository
 */
export interface TicketRecordStore {
	upsertTicket(upsert: TicketUpsert): Promise<PersistedTicket>;
}

/** Category assigned to every ticket raised from mail */
export const DEFAULT_CATEGORY = "General";

/** `requested_by` is a short label; longer local parts are cut */
export const REQUESTED_BY_MAX_LENGTH = 25;
