import type { MemberRecord } from "@helpdesk/core-contracts";
import { Inject, Injectable } from "@nestjs/common";
import type pg from "pg";
import { databaseFailure } from "./database.errors.js";
import { DB_POOL } from "./database.module.js";

const MEMBER_COLUMNS = "member_no, email, title, first_name, last_name, tier";

@Injectable()
export class MemberRepository {
	constructor(@Inject(DB_POOL) private readonly pool: pg.Pool) {}

	async findByNumber(memberNo: string): Promise<MemberRecord | null> {
		try {
			const result = await this.pool.query<MemberRecord>(
				`SELECT ${MEMBER_COLUMNS} FROM member WHERE member_no = $1`,
				[memberNo],
			);
			return result.rows[0] ?? null;
		} catch (error) {
			throw databaseFailure(`look up member ${memberNo}`, error);
		}
	}

	async findByEmail(email: string): Promise<MemberRecord | null> {
		try {
			const result = await this.pool.query<MemberRecord>(
				`SELECT ${MEMBER_COLUMNS}
         FROM member
         WHERE lower(email) = lower($1)
         ORDER BY member_no
         LIMIT 1`,
				[email],
			);
			return result.rows[0] ?? null;
		} catch (error) {
			throw databaseFailure("look up member by email", error);
		}
	}
}
