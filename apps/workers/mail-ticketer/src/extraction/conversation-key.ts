import { CONTRACT_VERSIONS } from "@helpdesk/core-contracts";

/** Version of the key derivation below; changing it splits existing threads */
export const CONVERSATION_KEY_VERSION = CONTRACT_VERSIONS.conversationKey;

const REPLY_PREFIX = /^\s*(?:re|fwd?|aw|sv|antw|wg)\s*(?:\[\d+\]|\(\d+\))?\s*:/i;

export interface ConversationKeyInput {
	unique_id: string;
	sender: string;
	subject: string;
	undelivered: boolean;
}

/**
 * Strip reply/forward prefixes, collapse whitespace and lower-case
 */
export function normalizeSubject(subject: string): string {
	let current = subject;
	let previous: string;
	do {
		previous = current;
		current = current.replace(REPLY_PREFIX, "");
	} while (current !== previous);

	return current.replace(/\s+/g, " ").trim().toLowerCase();
}

export function conversationKey(input: ConversationKeyInput): string {
	if (input.undelivered) {
		return `undelivered|#${input.unique_id}`;
	}

	const sender = input.sender.trim().toLowerCase();
	const subject = normalizeSubject(input.subject);

	return subject ? `${sender}|${subject}` : `${sender}|#${input.unique_id}`;
}
