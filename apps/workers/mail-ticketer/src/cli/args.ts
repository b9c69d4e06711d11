import { parseArgs } from "node:util";
import type { PurgeCriteria } from "../mailbox/mailbox-purge.service.js";

export type Command =
	| { name: "run" }
	| { name: "once" }
	| { name: "purge"; criteria: PurgeCriteria }
	| { name: "reset-state"; confirmed: boolean };

export class UsageError extends Error {
	override readonly name = "UsageError";
}

export const USAGE = `Usage: mail-ticketer <command> [options]

Commands:
  run                      Poll the mailbox until stopped (default)
  once                     Run a single fetch cycle and exit
  purge [options]          Delete matching messages from the server
      --before <ISO date>  Date header strictly earlier than this instant
      --from <text>        Sender address contains this text
      --subject <regex>    Subject matches this pattern (case-insensitive)
      --undelivered        Only bounces
      --delivered          Only non-bounces
      --execute            Delete for real (default is a dry run)
  reset-state --confirm    Forget every seen message and ticket identity
`;

const COMMANDS = ["run", "once", "purge", "reset-state"] as const;

function isCommandName(value: string): value is Command["name"] {
	return COMMANDS.some((command) => command === value);
}

/**
 * Parse command-line arguments (without the node and script paths)
 */
export function parseCommand(argv: string[]): Command {
	let parsed: ReturnType<typeof parseCliArgs>;
	try {
		parsed = parseCliArgs(argv);
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}

	const { values, positionals } = parsed;
	if (positionals.length > 1) {
		throw new UsageError(`Unexpected argument: ${positionals[1]}`);
	}

	const name = positionals[0] ?? "run";
	if (!isCommandName(name)) {
		throw new UsageError(`Unknown command: ${name}`);
	}

	switch (name) {
		case "run":
		case "once":
			return { name };
		case "reset-state":
			return { name, confirmed: values.confirm === true };
		case "purge":
			return { name, criteria: toPurgeCriteria(values) };
	}
}

function parseCliArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			before: { type: "string" },
			from: { type: "string" },
			subject: { type: "string" },
			undelivered: { type: "boolean" },
			delivered: { type: "boolean" },
			execute: { type: "boolean" },
			confirm: { type: "boolean" },
		},
	});
}

function toPurgeCriteria(
	values: ReturnType<typeof parseCliArgs>["values"],
): PurgeCriteria {
	const criteria: PurgeCriteria = { dryRun: values.execute !== true };

	if (values.before !== undefined) {
		const before = new Date(values.before);
		if (Number.isNaN(before.getTime())) {
			throw new UsageError(`--before is not a valid date: ${values.before}`);
		}
		criteria.before = before;
	}

	if (values.from !== undefined) {
		criteria.fromContains = values.from;
	}

	if (values.subject !== undefined) {
		try {
			new RegExp(values.subject, "i");
		} catch {
			throw new UsageError(`--subject is not a valid pattern: ${values.subject}`);
		}
		criteria.subjectPattern = values.subject;
	}

	if (values.undelivered && values.delivered) {
		throw new UsageError("--undelivered and --delivered are mutually exclusive");
	}
	if (values.undelivered) criteria.undelivered = true;
	if (values.delivered) criteria.undelivered = false;

	return criteria;
}
