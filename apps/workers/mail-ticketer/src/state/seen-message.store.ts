import type { LoggerService } from "@helpdesk/worker-base";
import { Injectable, type OnModuleInit } from "@nestjs/common";
import type { DurableSetBackend } from "./state.backends.js";

/**
 * Unique ids of messages whose processing was sealed.
 *
 * Held in memory after `load()`; `markSeen` resolves only once the id is
 * durable, so a crash can repeat work but never lose it.
 */
@Injectable()
export class SeenMessageStore implements OnModuleInit {
	private readonly seen = new Set<string>();
	private loaded = false;

	constructor(
		private readonly backend: DurableSetBackend,
		private readonly logger: LoggerService,
	) {}

	async onModuleInit(): Promise<void> {
		await this.load();
	}

	async load(): Promise<void> {
		const ids = await this.backend.loadAll();
		this.seen.clear();
		for (const id of ids) this.seen.add(id);
		this.loaded = true;

		this.logger.lifecycle("Seen-message store loaded", {
			location: this.backend.location,
			entries: this.seen.size,
		});
	}

	has(uniqueId: string): boolean {
		this.assertLoaded();
		return this.seen.has(uniqueId);
	}

	async markSeen(uniqueId: string): Promise<void> {
		this.assertLoaded();
		if (this.seen.has(uniqueId)) return;

		await this.backend.add(uniqueId);
		this.seen.add(uniqueId);
	}

	get size(): number {
		return this.seen.size;
	}

	/**
	 * Forget every id. Only for a deliberate operator reset.
	 */
	async reset(): Promise<void> {
		await this.backend.clear();
		this.seen.clear();
		this.logger.warn("Seen-message store reset", {
			location: this.backend.location,
		});
	}

	private assertLoaded(): void {
		if (!this.loaded) {
			throw new Error("Seen-message store used before load()");
		}
	}
}
