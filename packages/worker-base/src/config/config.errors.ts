export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class ConfigValidationError extends ConfigError {
	constructor(
		message: string,
		public readonly errors: Array<{ path: string; message: string }>,
	) {
		super(
			`${message}: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`,
		);
		this.name = "ConfigValidationError";
	}
}
