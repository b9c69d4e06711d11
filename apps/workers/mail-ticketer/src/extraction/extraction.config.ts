import { parseEnv } from "@helpdesk/worker-base";
import { z } from "zod";

export const EXTRACTION_CONFIG = "EXTRACTION_CONFIG";

/**
 * `Membership No: AB12345`, `member number 00123456`, `member #X-991`
 */
export const DEFAULT_MEMBERSHIP_REF_PATTERN =
	"\\bmember(?:ship)?\\s*(?:no\\.?|number|num|#)\\s*[:#]?\\s*([A-Za-z0-9][A-Za-z0-9-]{3,19})\\b";

const isValidPattern = (source: string) => {
	try {
		new RegExp(source, "i");
		return true;
	} catch {
		return false;
	}
};

const extractionEnvSchema = z.object({
	MEMBERSHIP_REF_PATTERN: z
		.string()
		.min(1)
		.default(DEFAULT_MEMBERSHIP_REF_PATTERN)
		.refine(isValidPattern, { message: "must be a valid regular expression" }),
});

export interface ExtractionConfig {
	/** Capture group 1 is the membership number */
	membershipPattern: RegExp;
}

export function createExtractionConfig(
	env: Record<string, string | undefined> = process.env,
): ExtractionConfig {
	const parsed = parseEnv(extractionEnvSchema, env, "extraction");
	return { membershipPattern: new RegExp(parsed.MEMBERSHIP_REF_PATTERN, "i") };
}
