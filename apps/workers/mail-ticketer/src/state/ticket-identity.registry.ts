import type { LoggerService } from "@helpdesk/worker-base";
import { Injectable, type OnModuleInit } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import type { DurableMapBackend } from "./state.backends.js";

export interface ResolvedTicket {
	ticketId: string;
	/** True when this call minted the id */
	created: boolean;
}

/**
 * Conversation key → ticket id. An id is assigned at most once per key.
 */
@Injectable()
export class TicketIdentityRegistry implements OnModuleInit {
	private readonly identities = new Map<string, string>();
	private loaded = false;

	constructor(
		private readonly backend: DurableMapBackend,
		private readonly logger: LoggerService,
		private readonly generateId: () => string = uuidv4,
	) {}

	async onModuleInit(): Promise<void> {
		await this.load();
	}

	async load(): Promise<void> {
		const entries = await this.backend.loadAll();
		this.identities.clear();
		for (const [key, ticketId] of entries) this.identities.set(key, ticketId);
		this.loaded = true;

		this.logger.lifecycle("Ticket identity registry loaded", {
			location: this.backend.location,
			entries: this.identities.size,
		});
	}

	async resolveOrCreate(conversationKey: string): Promise<ResolvedTicket> {
		if (!this.loaded) {
			throw new Error("Ticket identity registry used before load()");
		}

		const known = this.identities.get(conversationKey);
		if (known) {
			return { ticketId: known, created: false };
		}

		const candidate = this.generateId();
		const ticketId = await this.backend.putIfAbsent(conversationKey, candidate);
		this.identities.set(conversationKey, ticketId);

		return { ticketId, created: ticketId === candidate };
	}

	get size(): number {
		return this.identities.size;
	}

	async reset(): Promise<void> {
		await this.backend.clear();
		this.identities.clear();
		this.logger.warn("Ticket identity registry reset", {
			location: this.backend.location,
		});
	}
}
