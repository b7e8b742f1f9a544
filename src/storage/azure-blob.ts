import { BlobServiceClient } from "@azure/storage-blob";

import type { StorageConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logRunEvent, type JsonObject, type RunLogger } from "../core/logger.js";

import type { BlobUploader } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type BlobTransport = {
  uploadText(container: string, blobName: string, content: string): Promise<void>;
};

export type AzureBlobUploaderOptions = {
  container: string;
  transport: BlobTransport;
  logger?: RunLogger;
};

// =============================================================================
// ADAPTER
// =============================================================================

export class AzureBlobUploader implements BlobUploader {
  private readonly container: string;
  private readonly transport: BlobTransport;
  private readonly logger?: RunLogger;

  constructor(options: AzureBlobUploaderOptions) {
    this.container = options.container;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  static fromConfig(cfg: StorageConfig, logger?: RunLogger): AzureBlobUploader {
    return new AzureBlobUploader({
      container: cfg.container,
      transport: createTransport(cfg.connection_string),
      logger,
    });
  }

  async upload(content: string, folderPath: string, filename: string): Promise<boolean> {
    const blobName = buildBlobName(folderPath, filename);
    try {
      await this.transport.uploadText(this.container, blobName, content);
      this.log("storage.upload", { container: this.container, blob: blobName });
      return true;
    } catch (err) {
      this.log("storage.upload_error", {
        container: this.container,
        blob: blobName,
        message: formatErrorMessage(err),
      });
      return false;
    }
  }

  private log(type: string, fields: JsonObject): void {
    if (!this.logger) return;
    logRunEvent(this.logger, type, fields);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function buildBlobName(folderPath: string, filename: string): string {
  const folder = folderPath.replace(/^\/+|\/+$/g, "");
  return folder ? `${folder}/${filename}` : filename;
}

function createTransport(connectionString: string): BlobTransport {
  const service = BlobServiceClient.fromConnectionString(connectionString);

  return {
    uploadText: async (container, blobName, content) => {
      const blob = service.getContainerClient(container).getBlockBlobClient(blobName);
      await blob.upload(content, Buffer.byteLength(content), {
        blobHTTPHeaders: { blobContentType: "text/csv" },
      });
    },
  };
}
