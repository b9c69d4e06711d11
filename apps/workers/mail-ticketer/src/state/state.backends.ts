import { join } from "node:path";
import { IdentityConflictError } from "@helpdesk/worker-base";
import type pg from "pg";
import { z } from "zod";
import { databaseFailure } from "../db/database.errors.js";
import { JsonStateFile } from "./json-state-file.js";

/**
 * Durable append-only set of unique ids
 */
export interface DurableSetBackend {
	readonly location: string;
	loadAll(): Promise<string[]>;
	/** Resolves once the id is durable */
	add(id: string): Promise<void>;
	clear(): Promise<void>;
}

/**
 * Durable key → value map whose entries are never overwritten
 */
export interface DurableMapBackend {
	readonly location: string;
	loadAll(): Promise<Map<string, string>>;
	/**
	 * Store `value` unless `key` already has one; resolves with the value
	 * that is stored afterwards (ours, or the earlier winner's)
	 */
	putIfAbsent(key: string, value: string): Promise<string>;
	clear(): Promise<void>;
}

export const SEEN_FILE = "seen_uidls.json";
export const IDENTITY_FILE = "ticket_identities.json";

const seenFileSchema = z.array(z.string());
const identityFileSchema = z.record(z.string(), z.string().min(1));

/**
 * `seen_uidls.json`: a sorted JSON array of unique ids
 */
export class FileSetBackend implements DurableSetBackend {
	private readonly file: JsonStateFile<string[]>;
	private members = new Set<string>();

	constructor(stateDir: string) {
		this.file = new JsonStateFile(join(stateDir, SEEN_FILE), seenFileSchema, () => []);
	}

	get location(): string {
		return this.file.path;
	}

	async loadAll(): Promise<string[]> {
		this.members = new Set(await this.file.read());
		return [...this.members];
	}

	async add(id: string): Promise<void> {
		if (this.members.has(id)) return;
		const next = new Set(this.members).add(id);
		await this.file.write([...next].sort());
		this.members = next;
	}

	async clear(): Promise<void> {
		await this.file.write([]);
		this.members = new Set();
	}
}

/**
 * `ticket_identities.json`: a JSON object of conversation key → ticket id
 */
export class FileMapBackend implements DurableMapBackend {
	private readonly file: JsonStateFile<Record<string, string>>;
	private entries = new Map<string, string>();

	constructor(stateDir: string) {
		this.file = new JsonStateFile(
			join(stateDir, IDENTITY_FILE),
			identityFileSchema,
			() => ({}),
		);
	}

	get location(): string {
		return this.file.path;
	}

	async loadAll(): Promise<Map<string, string>> {
		this.entries = new Map(Object.entries(await this.file.read()));
		return new Map(this.entries);
	}

	async putIfAbsent(key: string, value: string): Promise<string> {
		const existing = this.entries.get(key);
		if (existing) return existing;

		const next = new Map(this.entries).set(key, value);
		const sorted = [...next.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
		await this.file.write(Object.fromEntries(sorted));
		this.entries = next;
		return value;
	}

	async clear(): Promise<void> {
		await this.file.write({});
		this.entries = new Map();
	}
}

/**
 * `seen_message` table; safe to share between instances
 */
export class PgSetBackend implements DurableSetBackend {
	readonly location = "postgres:seen_message";

	constructor(private readonly pool: pg.Pool) {}

	async loadAll(): Promise<string[]> {
		try {
			const result = await this.pool.query<{ unique_id: string }>(
				"SELECT unique_id FROM seen_message",
			);
			return result.rows.map((row) => row.unique_id);
		} catch (error) {
			throw databaseFailure("load seen messages", error);
		}
	}

	async add(id: string): Promise<void> {
		try {
			await this.pool.query(
				`INSERT INTO seen_message (unique_id) VALUES ($1)
				 ON CONFLICT (unique_id) DO NOTHING`,
				[id],
			);
		} catch (error) {
			throw databaseFailure("mark message seen", error);
		}
	}

	async clear(): Promise<void> {
		try {
			await this.pool.query("TRUNCATE seen_message");
		} catch (error) {
			throw databaseFailure("reset seen messages", error);
		}
	}
}

/**
 * `ticket_identity` table. The insert-then-read makes concurrent
 * instances agree on one ticket id per conversation key.
 */
export class PgMapBackend implements DurableMapBackend {
	readonly location = "postgres:ticket_identity";

	constructor(private readonly pool: pg.Pool) {}

	async loadAll(): Promise<Map<string, string>> {
		try {
			const result = await this.pool.query<{
				conversation_key: string;
				ticket_id: string;
			}>("SELECT conversation_key, ticket_id FROM ticket_identity");
			return new Map(
				result.rows.map((row) => [row.conversation_key, row.ticket_id]),
			);
		} catch (error) {
			throw databaseFailure("load ticket identities", error);
		}
	}

	async putIfAbsent(key: string, value: string): Promise<string> {
		let winner: string | undefined;
		try {
			await this.pool.query(
				`INSERT INTO ticket_identity (conversation_key, ticket_id) VALUES ($1, $2)
				 ON CONFLICT (conversation_key) DO NOTHING`,
				[key, value],
			);
			const result = await this.pool.query<{ ticket_id: string }>(
				"SELECT ticket_id FROM ticket_identity WHERE conversation_key = $1",
				[key],
			);
			winner = result.rows[0]?.ticket_id;
		} catch (error) {
			throw databaseFailure("record ticket identity", error);
		}

		if (!winner) {
			throw new IdentityConflictError(key);
		}
		return winner;
	}

	async clear(): Promise<void> {
		try {
			await this.pool.query("TRUNCATE ticket_identity");
		} catch (error) {
			throw databaseFailure("reset ticket identities", error);
		}
	}
}
