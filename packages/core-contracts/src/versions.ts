/**
 * Contract versions.
 *
 * The conversation key version is part of every stored identity entry's
 * meaning: changing the normalization rules splits existing conversations
 * into new tickets, so a change requires a new version and a migration.
 */
export const CONTRACT_VERSIONS = {
	conversationKey: "v1",
	ticketRecord: "v1",
	stateFile: "v1",
} as const;

export type ContractName = keyof typeof CONTRACT_VERSIONS;
