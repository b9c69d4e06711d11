import type { TicketUpsert } from "@helpdesk/core-contracts";
import { LOGGER, type LoggerService, toError } from "@helpdesk/worker-base";
import { Inject, Injectable } from "@nestjs/common";
import type pg from "pg";
import { databaseFailure } from "./database.errors.js";
import { DB_POOL } from "./database.module.js";

export interface PersistedTicket {
	ticket_id: string;
	ticket_no: number;
	/** True when this write inserted the ticket row */
	ticket_created: boolean;
	/** False when the ticket-message row already existed */
	message_recorded: boolean;
	attachments_recorded: number;
}

@Injectable()
export class TicketRepository {
	constructor(
		@Inject(DB_POOL) private readonly pool: pg.Pool,
		@Inject(LOGGER) private readonly logger: LoggerService,
	) {}

	/**
	 * Write the ticket, its message row and its attachment rows in one
	 * transaction. Re-running with the same message is a no-op apart from
	 * refreshing the ticket's latest body.
	 */
	async upsertTicket(upsert: TicketUpsert): Promise<PersistedTicket> {
		let client: pg.PoolClient;
		try {
			client = await this.pool.connect();
		} catch (error) {
			throw databaseFailure("open a record store transaction", error);
		}

		try {
			await client.query("BEGIN");
			const persisted = await this.write(client, upsert);
			await client.query("COMMIT");

			this.logger.debug("Ticket upserted", {
				ticket_id: persisted.ticket_id,
				ticket_no: persisted.ticket_no,
				ticket_created: persisted.ticket_created,
				unique_id: upsert.message.unique_id,
				message_recorded: persisted.message_recorded,
			});

			return persisted;
		} catch (error) {
			await this.rollback(client, error);
			throw databaseFailure(`upsert ticket ${upsert.ticket_id}`, error);
		} finally {
			client.release();
		}
	}

	private async write(
		client: pg.PoolClient,
		upsert: TicketUpsert,
	): Promise<PersistedTicket> {
		const { requester, message } = upsert;
		const receivedAt = message.received_at;

		const ticket = await client.query<{ ticket_no: number; inserted: boolean }>(
			`INSERT INTO ticket (
        ticket_id, conversation_key, requester_address, requester_name,
        requested_by, member_no, member_tier, subject, body, undelivered,
        category, status, created_at, last_message_at, updated_at
      ) VALUES (
        $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $13, NOW()
      )
      ON CONFLICT (ticket_id)
      DO UPDATE SET
        body = EXCLUDED.body,
        undelivered = ticket.undelivered OR EXCLUDED.undelivered,
        last_message_at = GREATEST(ticket.last_message_at, EXCLUDED.last_message_at),
        updated_at = NOW()
      RETURNING ticket_no, (xmax = 0) AS inserted`,
			[
				upsert.ticket_id,
				upsert.conversation_key,
				requester.address,
				requester.name ?? null,
				requester.requested_by,
				requester.member_no ?? null,
				requester.tier ?? null,
				upsert.subject,
				upsert.body,
				upsert.undelivered,
				upsert.category,
				upsert.status,
				receivedAt,
			],
		);

		const row = ticket.rows[0];
		if (!row) {
			throw new Error(`Upsert of ticket ${upsert.ticket_id} returned no row`);
		}

		const messageRow = await client.query(
			`INSERT INTO ticket_message (
        unique_id, ticket_id, sender, subject, body, undelivered,
        message_id, sent_at, received_at, body_path
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      ON CONFLICT (unique_id) DO NOTHING`,
			[
				message.unique_id,
				upsert.ticket_id,
				message.sender,
				message.subject,
				message.body,
				message.undelivered,
				message.message_id ?? null,
				message.sent_at ?? null,
				receivedAt,
				message.body_document?.stored_path ?? null,
			],
		);

		let attachmentsRecorded = 0;
		for (const attachment of upsert.attachments) {
			const row = await client.query(
				`INSERT INTO ticket_attachment (
          unique_id, ticket_id, stored_path, stored_name, original_filename,
          content_type, size_bytes, content_hash
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (unique_id, stored_path) DO NOTHING`,
				[
					message.unique_id,
					upsert.ticket_id,
					attachment.stored_path,
					attachment.stored_name,
					attachment.original_filename,
					attachment.content_type,
					attachment.size_bytes,
					attachment.content_hash,
				],
			);
			attachmentsRecorded += row.rowCount ?? 0;
		}

		return {
			ticket_id: upsert.ticket_id,
			ticket_no: row.ticket_no,
			ticket_created: row.inserted,
			message_recorded: (messageRow.rowCount ?? 0) > 0,
			attachments_recorded: attachmentsRecorded,
		};
	}

	private async rollback(client: pg.PoolClient, cause: unknown): Promise<void> {
		try {
			await client.query("ROLLBACK");
		} catch (error) {
			this.logger.warn("Rollback failed", {
				error_message: toError(error).message,
				cause_message: toError(cause).message,
			});
		}
	}
}
