// Config module
export {
	WorkerConfigModule,
	WORKER_CONFIG,
	loadWorkerConfig,
	parseEnv,
} from "./config/config.module.js";
export type {
	RunMode,
	WorkerConfig,
	WorkerConfigOptions,
	WorkerEnv,
} from "./config/config.module.js";
export { ConfigError, ConfigValidationError } from "./config/config.errors.js";

// Telemetry module
export { TelemetryModule } from "./telemetry/telemetry.module.js";
export { TelemetryService } from "./telemetry/telemetry.service.js";
export {
	LoggerService,
	LOGGER,
	redactObject,
} from "./telemetry/logger.service.js";
export type {
	LogContext,
	TieredLogContext,
} from "./telemetry/logger.service.js";
export { EventLogger, EVENT_LOGGER } from "./telemetry/events.js";
export {
	LogTier,
	type LoggingConfig,
	shouldForwardLog,
	PRODUCTION_LOGGING_CONFIG,
	LOCAL_LOGGING_CONFIG,
} from "./telemetry/log-tier.js";
export type {
	HelpdeskEvent,
	ServiceTags,
	BaseEvent,
	PollerLifecycleEvent,
	PollerStartedEvent,
	PollerShutdownInitiatedEvent,
	PollerShutdownCompletedEvent,
	CycleCompletedEvent,
	CycleFailedEvent,
	MessageEvent,
	MessageSealedEvent,
	MessageSkippedEvent,
	MessageFailedEvent,
	HealthChangedEvent,
	EventName,
} from "./telemetry/events.types.js";

// Health module
export { HealthModule } from "./health/health.module.js";
export { HealthController } from "./health/health.controller.js";
export {
	HealthService,
	HEALTH_SERVICE,
	DATABASE_HEALTH,
} from "./health/health.service.js";
export type {
	DatabaseHealthCheck,
	HealthResponse,
	HealthState,
} from "./health/health.service.js";

// Lifecycle module
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
export { LifecycleService } from "./lifecycle/lifecycle.service.js";
export type { ShutdownSignal } from "./lifecycle/lifecycle.service.js";

// Errors
export {
	WorkerError,
	TransportError,
	ParseError,
	StorageError,
	IdentityConflictError,
	StateCorruptError,
	classifyError,
	isCycleScoped,
	errorCode,
	systemErrorCode,
	toError,
} from "./errors/error-classifier.js";
export type {
	ErrorClassification,
	ErrorScope,
} from "./errors/error-classifier.js";

// Base poller service
export { BasePollerService } from "./poller/base-poller.service.js";
export { POLLER_STATUS } from "./poller/poller.types.js";
export type {
	CycleResult,
	PollerStatus,
	PollerStatusSource,
} from "./poller/poller.types.js";
