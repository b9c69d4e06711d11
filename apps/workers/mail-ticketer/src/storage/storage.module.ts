import { LOGGER, type LoggerService } from "@helpdesk/worker-base";
import { Module } from "@nestjs/common";
import {
	ATTACHMENT_STORE,
	type AttachmentStore,
	FilesystemAttachmentStore,
} from "./attachment.store.js";
import { S3AttachmentStore } from "./s3-attachment.store.js";
import {
	STORAGE_CONFIG,
	type StorageConfig,
	createStorageConfig,
} from "./storage.config.js";

export function createAttachmentStore(
	config: StorageConfig,
	logger: LoggerService,
): AttachmentStore {
	return config.backend === "s3"
		? new S3AttachmentStore(config, logger)
		: new FilesystemAttachmentStore(config.rootDir, config.timeoutMs, logger);
}

@Module({
	providers: [
		{
			provide: STORAGE_CONFIG,
			useFactory: () => createStorageConfig(),
		},
		{
			provide: ATTACHMENT_STORE,
			useFactory: (config: StorageConfig, logger: LoggerService) =>
				createAttachmentStore(config, logger),
			inject: [STORAGE_CONFIG, LOGGER],
		},
	],
	exports: [ATTACHMENT_STORE],
})
export class StorageModule {}
