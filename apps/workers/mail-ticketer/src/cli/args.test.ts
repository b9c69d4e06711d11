import { describe, expect, it } from "vitest";
import { UsageError, parseCommand } from "./args.js";

describe("parseCommand", () => {
	it("should poll continuously when no command is given", () => {
		expect(parseCommand([])).toEqual({ name: "run" });
	});

	it("should accept a single cycle", () => {
		expect(parseCommand(["once"])).toEqual({ name: "once" });
	});

	it("should make purge a dry run unless executed", () => {
		expect(parseCommand(["purge"])).toEqual({
			name: "purge",
			criteria: { dryRun: true },
		});
		expect(parseCommand(["purge", "--execute"])).toEqual({
			name: "purge",
			criteria: { dryRun: false },
		});
	});

	it("should collect purge criteria", () => {
		expect(
			parseCommand([
				"purge",
				"--before",
				"2024-01-01T00:00:00Z",
				"--from",
				"mailer-daemon",
				"--subject",
				"^undelivered",
				"--undelivered",
			]),
		).toEqual({
			name: "purge",
			criteria: {
				dryRun: true,
				before: new Date("2024-01-01T00:00:00Z"),
				fromContains: "mailer-daemon",
				subjectPattern: "^undelivered",
				undelivered: true,
			},
		});
		expect(parseCommand(["purge", "--delivered"])).toEqual({
			name: "purge",
			criteria: { dryRun: true, undelivered: false },
		});
	});

	it("should require confirmation to reset state", () => {
		expect(parseCommand(["reset-state"])).toEqual({
			name: "reset-state",
			confirmed: false,
		});
		expect(parseCommand(["reset-state", "--confirm"])).toEqual({
			name: "reset-state",
			confirmed: true,
		});
	});

	it.each([
		[["bogus"], "Unknown command: bogus"],
		[["once", "twice"], "Unexpected argument: twice"],
		[["purge", "--before", "yesterday"], "--before is not a valid date: yesterday"],
		[["purge", "--subject", "("], "--subject is not a valid pattern: ("],
		[
			["purge", "--undelivered", "--delivered"],
			"--undelivered and --delivered are mutually exclusive",
		],
	])("should reject %j", (argv, message) => {
		expect(() => parseCommand(argv)).toThrow(new UsageError(message));
	});

	it("should reject options it does not know", () => {
		expect(() => parseCommand(["--verbose"])).toThrow(UsageError);
	});
});
