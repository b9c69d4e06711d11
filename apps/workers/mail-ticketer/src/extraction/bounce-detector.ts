/**
 * What a bounce rule gets to look at
 */
export interface BounceSignals {
	/** Bare sender address, lower-cased */
	sender: string;
	senderName?: string;
	subject: string;
	/** Top-level MIME type, lower-cased */
	contentType?: string;
	/** `report-type` parameter of a multipart/report message */
	reportType?: string;
}

export interface BounceRule {
	readonly name: string;
	matches(signals: BounceSignals): boolean;
}

export interface BounceVerdict {
	undelivered: boolean;
	/** Name of the first rule that matched */
	reason?: string;
}

/**
 * Matches on the sender's local part or display name
 */
export class SenderBounceRule implements BounceRule {
	constructor(
		readonly name: string,
		private readonly localPart: RegExp,
		private readonly displayName?: RegExp,
	) {}

	matches(signals: BounceSignals): boolean {
		const local = signals.sender.split("@")[0] ?? "";
		if (this.localPart.test(local)) return true;
		return Boolean(
			this.displayName && signals.senderName && this.displayName.test(signals.senderName),
		);
	}
}

/**
 * Matches when the subject contains a needle (case-insensitive). Bodies are
 * not scanned: customers quote these words in ordinary mail.
 */
export class NeedleBounceRule implements BounceRule {
	private readonly needle: string;

	constructor(
		readonly name: string,
		needle: string,
	) {
		this.needle = needle.toLowerCase();
	}

	matches(signals: BounceSignals): boolean {
		return signals.subject.toLowerCase().includes(this.needle);
	}
}

/**
 * RFC 3464 delivery status notifications
 */
export class DeliveryReportRule implements BounceRule {
	readonly name = "delivery-status-report";

	matches(signals: BounceSignals): boolean {
		return (
			signals.contentType === "multipart/report" &&
			signals.reportType?.toLowerCase() === "delivery-status"
		);
	}
}

export const DEFAULT_BOUNCE_RULES: readonly BounceRule[] = [
	new SenderBounceRule("sender:mailer-daemon", /^mailer-daemon$/i),
	new SenderBounceRule("sender:postmaster", /^postmaster$/i),
	new SenderBounceRule(
		"sender:mail-delivery-subsystem",
		/^mail-delivery-subsystem$/i,
		/mail delivery subsystem/i,
	),
	new DeliveryReportRule(),
	new NeedleBounceRule("subject:undelivered", "undelivered"),
	new NeedleBounceRule("subject:return-to-sender", "return to sender"),
	new NeedleBounceRule("subject:mail-delivery-failed", "mail delivery failed"),
	new NeedleBounceRule(
		"subject:delivery-status-notification",
		"delivery status notification",
	),
	new NeedleBounceRule("subject:mailer-daemon", "mailer-daemon"),
	new NeedleBounceRule("subject:bounce", "bounce"),
];

/**
 * Flags undelivered mail by running an explicit list of rules in order
 */
export class BounceDetector {
	constructor(private readonly rules: readonly BounceRule[] = DEFAULT_BOUNCE_RULES) {}

	detect(signals: BounceSignals): BounceVerdict {
		const rule = this.rules.find((r) => r.matches(signals));
		return rule ? { undelivered: true, reason: rule.name } : { undelivered: false };
	}
}
