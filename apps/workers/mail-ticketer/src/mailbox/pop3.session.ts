import { type Socket, connect as connectTcp } from "node:net";
import { connect as connectTls } from "node:tls";
import { TransportError } from "@helpdesk/worker-base";
import type { MailboxConfig } from "./mailbox.config.js";

/**
 * Commands the mailbox needs from a POP3 connection
 */
export interface Pop3Connection {
	/** Message number → unique id */
	uidl(): Promise<Map<number, string>>;
	/** Message number → size in octets */
	list(): Promise<Map<number, number>>;
	retr(messageNumber: number): Promise<Buffer>;
	dele(messageNumber: number): Promise<void>;
	/** Ends the session; pending deletions are committed here */
	quit(): Promise<void>;
}

export type Pop3Connector = (config: MailboxConfig) => Promise<Pop3Connection>;

export const POP3_CONNECTOR = "POP3_CONNECTOR";

const CRLF = Buffer.from("\r\n");
/** End of a multi-line response: a line holding a single dot */
const TERMINATOR = Buffer.from("\r\n.\r\n");
const DOT = 0x2e;

const LISTING_LINE = /^\s*(\d+)\s+(\S+)\s*$/;

/**
 * Message number → value from the lines of a UIDL or LIST response
 */
export function parseListing(text: string): Map<number, string> {
	const listing = new Map<number, string>();
	for (const line of text.split(/\r?\n/)) {
		const match = LISTING_LINE.exec(line);
		if (match?.[1] && match[2]) {
			listing.set(Number(match[1]), match[2]);
		}
	}
	return listing;
}

/**
 * Undo dot-stuffing: a line starting with "." had one extra "." prepended
 */
export function unstuff(body: Buffer): Buffer {
	const lines: Buffer[] = [];
	let start = 0;
	while (start < body.length) {
		const eol = body.indexOf(CRLF, start);
		const end = eol === -1 ? body.length : eol + CRLF.length;
		const line = body.subarray(start, end);
		lines.push(line[0] === DOT ? line.subarray(1) : line);
		start = end;
	}
	return Buffer.concat(lines);
}

interface PendingResponse {
	command: string;
	multiline: boolean;
	resolve: (body: Buffer) => void;
	reject: (error: TransportError) => void;
	timer: NodeJS.Timeout;
}

/**
 * One POP3 session over a plain or TLS socket.
 *
 * Responses are kept as bytes end to end, so RETR returns the message
 * octets exactly as the server sent them. Every command is bounded by the
 * configured timeout. A timeout or socket failure destroys the socket and
 * surfaces as TransportError, so the caller aborts the whole cycle.
 */
export class Pop3Session implements Pop3Connection {
	private buffer: Buffer = Buffer.alloc(0);
	private pending: PendingResponse | null = null;
	private closed = false;

	private constructor(
		private readonly socket: Socket,
		private readonly timeoutMs: number,
	) {
		socket.on("data", (chunk: Buffer) => {
			this.buffer = Buffer.concat([this.buffer, chunk]);
			this.drain();
		});
		socket.on("error", (error: Error) => {
			this.abort(`failed: ${error.message}`, "TRANSPORT", error);
		});
		socket.on("close", () => {
			this.abort("failed: connection closed by server", "TRANSPORT");
		});
	}

	static async open(config: MailboxConfig): Promise<Pop3Session> {
		const socket = config.tls
			? connectTls({ host: config.host, port: config.port, servername: config.host })
			: connectTcp({ host: config.host, port: config.port });
		const session = new Pop3Session(socket, config.timeoutMs);

		try {
			// Greeting
			await session.request("CONNECT", null);
			await session.request("LOGIN", `USER ${config.user}`);
			await session.request("LOGIN", `PASS ${config.password}`);
		} catch (error) {
			// Nothing to commit before login; dropping the socket releases any lock
			session.destroy();
			throw error;
		}

		return session;
	}

	async uidl(): Promise<Map<number, string>> {
		const body = await this.request("UIDL", "UIDL", true);
		return parseListing(body.toString("latin1"));
	}

	async list(): Promise<Map<number, number>> {
		const body = await this.request("LIST", "LIST", true);
		const sizes = new Map<number, number>();
		for (const [messageNumber, size] of parseListing(body.toString("latin1"))) {
			const octets = Number(size);
			if (Number.isFinite(octets)) sizes.set(messageNumber, octets);
		}
		return sizes;
	}

	retr(messageNumber: number): Promise<Buffer> {
		return this.request("RETR", `RETR ${messageNumber}`, true);
	}

	async dele(messageNumber: number): Promise<void> {
		await this.request("DELE", `DELE ${messageNumber}`);
	}

	async quit(): Promise<void> {
		if (this.closed) return;
		try {
			await this.request("QUIT", "QUIT");
		} finally {
			this.destroy();
		}
	}

	/**
	 * Send one command (or none, for the greeting) and wait for its response.
	 * Resolves with the body of a multi-line response, empty otherwise.
	 */
	private request(
		command: string,
		line: string | null,
		multiline = false,
	): Promise<Buffer> {
		if (this.closed) {
			return Promise.reject(
				new TransportError(`POP3 ${command} issued on a closed session`),
			);
		}
		if (this.pending) {
			return Promise.reject(
				new TransportError(
					`POP3 ${command} issued while ${this.pending.command} is pending`,
					"TRANSPORT_STATE",
				),
			);
		}

		const response = new Promise<Buffer>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.abort(`timed out after ${this.timeoutMs}ms`, "TRANSPORT_TIMEOUT");
			}, this.timeoutMs);
			this.pending = { command, multiline, resolve, reject, timer };
		});

		if (line !== null) {
			this.socket.write(`${line}\r\n`);
		}
		this.drain();

		return response;
	}

	/**
	 * Complete the pending command once its whole response is buffered
	 */
	private drain(): void {
		const pending = this.pending;
		if (!pending) return;

		const statusEnd = this.buffer.indexOf(CRLF);
		if (statusEnd === -1) return;
		const status = this.buffer.subarray(0, statusEnd).toString("latin1");

		if (status.startsWith("-ERR")) {
			this.buffer = this.buffer.subarray(statusEnd + CRLF.length);
			this.settle(pending);
			pending.reject(
				new TransportError(
					`POP3 ${pending.command} rejected by server: ${status.trim()}`,
					"TRANSPORT_REJECTED",
				),
			);
			return;
		}
		if (!status.startsWith("+OK")) {
			this.abort(`got an unexpected response: ${status.trim()}`, "TRANSPORT_PROTOCOL");
			return;
		}

		let body: Buffer = Buffer.alloc(0);
		let consumed = statusEnd + CRLF.length;
		if (pending.multiline) {
			// Searching from the status line's CRLF also finds an empty body
			const end = this.buffer.indexOf(TERMINATOR, statusEnd);
			if (end === -1) return;
			body = unstuff(this.buffer.subarray(statusEnd + CRLF.length, end + CRLF.length));
			consumed = end + TERMINATOR.length;
		}

		this.buffer = this.buffer.subarray(consumed);
		this.settle(pending);
		pending.resolve(body);
	}

	private settle(pending: PendingResponse): void {
		clearTimeout(pending.timer);
		this.pending = null;
	}

	/**
	 * Fail the pending command, if any, and drop the connection
	 */
	private abort(reason: string, code: string, cause?: unknown): void {
		const pending = this.pending;
		this.destroy();
		if (!pending) return;

		this.settle(pending);
		pending.reject(
			new TransportError(`POP3 ${pending.command} ${reason}`, code, { cause }),
		);
	}

	private destroy(): void {
		this.closed = true;
		this.buffer = Buffer.alloc(0);
		this.socket.destroy();
	}
}

export const connectPop3: Pop3Connector = (config) => Pop3Session.open(config);
