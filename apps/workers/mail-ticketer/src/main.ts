import "reflect-metadata";
import {
	LOGGER,
	type LoggerService,
	WORKER_CONFIG,
	type WorkerConfig,
} from "@helpdesk/worker-base";
import { NestFactory } from "@nestjs/core";
import {
	AppModule,
	MailboxAdminModule,
	StateAdminModule,
} from "./app.module.js";
import { type Command, USAGE, UsageError, parseCommand } from "./cli/args.js";
import {
	MailboxPurgeService,
	type PurgeCriteria,
} from "./mailbox/mailbox-purge.service.js";
import { STATE_CONFIG, type StateConfig } from "./state/state.config.js";
import { resetDurableState } from "./state/state.reset.js";
import { IngestionService } from "./worker/ingestion.service.js";

async function runDaemon(): Promise<void> {
	const app = await NestFactory.create(
		AppModule.forRoot({ runMode: "daemon" }),
		{ bufferLogs: true },
	);

	// Use our custom logger
	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);
	app.enableShutdownHooks();

	const config = app.get<WorkerConfig>(WORKER_CONFIG);

	// listen() initializes the app, which runs the first fetch cycle
	await app.listen(config.healthPort);
	logger.info(`Health endpoints available on port ${config.healthPort}`);
}

async function runOnce(): Promise<number> {
	const app = await NestFactory.createApplicationContext(
		AppModule.forRoot({ runMode: "once" }),
		{ bufferLogs: true },
	);
	app.useLogger(app.get<LoggerService>(LOGGER));
	app.enableShutdownHooks();

	const result = await app.get(IngestionService).pollOnce();
	await app.close();

	return result.ok ? 0 : 1;
}

async function runPurge(criteria: PurgeCriteria): Promise<number> {
	const app = await NestFactory.createApplicationContext(MailboxAdminModule, {
		bufferLogs: true,
	});
	app.useLogger(app.get<LoggerService>(LOGGER));

	try {
		const result = await app.get(MailboxPurgeService).purge(criteria);
		process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
		return result.errors.length > 0 ? 1 : 0;
	} finally {
		await app.close();
	}
}

async function runResetState(confirmed: boolean): Promise<number> {
	if (!confirmed) {
		process.stderr.write(
			"reset-state forgets every processed message; re-run with --confirm\n",
		);
		return 1;
	}

	const app = await NestFactory.createApplicationContext(StateAdminModule, {
		bufferLogs: true,
	});
	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);

	try {
		const locations = await resetDurableState(
			app.get<StateConfig>(STATE_CONFIG),
			app.get<WorkerConfig>(WORKER_CONFIG),
			logger,
		);
		logger.lifecycle("Durable state reset", { locations });
		return 0;
	} finally {
		await app.close();
	}
}

async function main(command: Command): Promise<number | undefined> {
	switch (command.name) {
		case "run":
			await runDaemon();
			// The poll loop keeps the process alive
			return undefined;
		case "once":
			return runOnce();
		case "purge":
			return runPurge(command.criteria);
		case "reset-state":
			return runResetState(command.confirmed);
	}
}

let command: Command;
try {
	command = parseCommand(process.argv.slice(2));
} catch (error) {
	if (!(error instanceof UsageError)) throw error;
	process.stderr.write(`${error.message}\n\n${USAGE}`);
	process.exit(1);
}

main(command)
	.then((exitCode) => {
		if (exitCode !== undefined) process.exit(exitCode);
	})
	.catch((error: unknown) => {
		console.error("Failed to start application:", error);
		process.exit(1);
	});
