import type { MemberRecord } from "@helpdesk/core-contracts";
import { TransportError } from "@helpdesk/worker-base";
import type pg from "pg";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { createMember } from "../__tests__/fixtures.js";
import { MemberRepository } from "./member.repository.js";

type QueryFn = (
	sql: string,
	params: unknown[],
) => Promise<{ rows: MemberRecord[] }>;

describe("MemberRepository", () => {
	let query: Mock<QueryFn>;
	let repository: MemberRepository;

	beforeEach(() => {
		query = vi.fn<QueryFn>();
		repository = new MemberRepository({ query } as unknown as pg.Pool);
	});

	it("should find a member by number", async () => {
		query.mockResolvedValue({ rows: [createMember()] });

		expect(await repository.findByNumber("M-1001")).toEqual(createMember());
		expect(query).toHaveBeenCalledWith(
			"SELECT member_no, email, title, first_name, last_name, tier FROM member WHERE member_no = $1",
			["M-1001"],
		);
	});

	it("should match email addresses case-insensitively", async () => {
		query.mockResolvedValue({ rows: [] });

		expect(await repository.findByEmail("Alice@Example.com")).toBeNull();
		expect(query).toHaveBeenCalledWith(
			expect.stringContaining("WHERE lower(email) = lower($1)"),
			["Alice@Example.com"],
		);
	});

	it("should map connection failures", async () => {
		query.mockRejectedValue(new Error("Connection terminated unexpectedly"));

		await expect(repository.findByEmail("alice@example.com")).rejects.toBeInstanceOf(
			TransportError,
		);
	});
});
