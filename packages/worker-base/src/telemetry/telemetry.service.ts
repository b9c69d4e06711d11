import { Injectable } from "@nestjs/common";
import type { Span, Tracer } from "dd-trace";
import type { WorkerConfig } from "../config/config.module.js";

const METRIC_PREFIX = "helpdesk";

@Injectable()
export class TelemetryService {
	private tracer: Tracer | null = null;
	private baseTags: Record<string, string> = {};

	async initialize(config: WorkerConfig): Promise<void> {
		this.baseTags = {
			env: config.env,
			service: config.service,
			version: config.version,
			team: config.team,
			domain: config.domain,
			stage: config.stage,
		};

		if (!config.tracingEnabled) {
			return;
		}

		try {
			const ddTrace = await import("dd-trace");
			this.tracer = ddTrace.default.init({
				service: config.service,
				version: config.version,
				env: config.env,
				logInjection: true,
				runtimeMetrics: true,
			});
		} catch {
			// dd-trace may not be loadable in every environment
			console.warn("dd-trace not available, tracing disabled");
		}
	}

	/**
	 * Base tags for metrics (low cardinality only)
	 */
	getMetricTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.increment(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.gauge(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.tracer?.dogstatsd.histogram(
			`${METRIC_PREFIX}.${name}`,
			durationMs,
			this.getMetricTags(tags),
		);
	}

	/**
	 * Run `fn` inside a traced span; runs it untraced when tracing is off
	 */
	async withSpan<T>(
		name: string,
		tags: Record<string, string>,
		fn: () => Promise<T>,
	): Promise<T> {
		if (!this.tracer) {
			return fn();
		}

		return this.tracer.trace(name, { tags }, async (span?: Span) => {
			try {
				return await fn();
			} catch (error) {
				span?.setTag("error", true);
				if (error instanceof Error) {
					span?.setTag("error.message", error.message);
				}
				throw error;
			}
		});
	}
}
