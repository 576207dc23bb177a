import { BlobServiceClient, type ContainerClient, RestError } from '@azure/storage-blob';
import { logger } from './logger';

/**
 * Named text payloads in cloud storage. Every write replaces the whole blob.
 */
export interface BlobStore {
  /** Returns the blob's text, or null when no blob has that name. */
  readText(name: string): Promise<string | null>;
  writeText(name: string, content: string): Promise<void>;
}

export class AzureBlobStore implements BlobStore {
  constructor(private readonly container: ContainerClient) {}

  static fromConnectionString(connectionString: string, containerName: string): AzureBlobStore {
    const service = BlobServiceClient.fromConnectionString(connectionString);
    return new AzureBlobStore(service.getContainerClient(containerName));
  }

  async readText(name: string): Promise<string | null> {
    const context = { blob: name, container: this.container.containerName };
    logger.time(`read:${name}`);
    try {
      const buffer = await this.container.getBlobClient(name).downloadToBuffer();
      return buffer.toString('utf-8');
    } catch (error) {
      if (error instanceof RestError && error.statusCode === 404) {
        logger.debug('storage', 'Blob not found', context);
        return null;
      }
      throw error;
    } finally {
      logger.timeEnd(`read:${name}`, 'storage', 'Blob read', context);
    }
  }

  async writeText(name: string, content: string): Promise<void> {
    const context = { blob: name, container: this.container.containerName };
    logger.time(`write:${name}`);
    // Block blob uploads overwrite an existing blob of the same name
    await this.container.getBlockBlobClient(name).upload(content, Buffer.byteLength(content), {
      blobHTTPHeaders: { blobContentType: 'text/csv; charset=utf-8' },
    });
    logger.timeEnd(`write:${name}`, 'storage', 'Blob written', context);
  }
}
