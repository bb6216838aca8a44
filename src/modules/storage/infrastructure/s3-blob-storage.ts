import { Logger } from '@nestjs/common';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3ServiceException,
  type DeleteObjectCommandOutput,
  type GetObjectCommandOutput,
  type HeadObjectCommandOutput,
  type PutObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { StorageError } from '../../../common/errors/domain.errors';
import { joinUrl, type IBlobStorage } from '../domain/blob-storage.interface';

/**
 * The subset of `S3Client` this backend sends; `S3Client` satisfies it.
 */
export interface ObjectStoreClient {
  send(command: PutObjectCommand): Promise<PutObjectCommandOutput>;
  send(command: HeadObjectCommand): Promise<HeadObjectCommandOutput>;
  send(command: DeleteObjectCommand): Promise<DeleteObjectCommandOutput>;
  send(command: GetObjectCommand): Promise<GetObjectCommandOutput>;
}

export interface S3BlobStorageOptions {
  client: ObjectStoreClient;
  bucket: string;
  prefix: string;
  publicBaseUrl: string;
}

const isMissingObject = (error: unknown) =>
  error instanceof S3ServiceException &&
  (error.name === 'NotFound' ||
    error.name === 'NoSuchKey' ||
    error.$metadata.httpStatusCode === 404);

export class S3BlobStorage implements IBlobStorage {
  private readonly logger = new Logger(S3BlobStorage.name);

  constructor(private readonly options: S3BlobStorageOptions) {}

  async write(path: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.options.client.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: this.keyFor(path),
          Body: body,
          ContentType: contentType,
        }),
      );
    } catch (error) {
      this.logger.error(
        `Failed to upload object ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new StorageError('write', path, error);
    }
  }

  async delete(path: string): Promise<boolean> {
    const key = this.keyFor(path);
    try {
      // DeleteObject succeeds for missing keys, so existence is checked first
      await this.options.client.send(
        new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }),
      );
    } catch (error) {
      if (isMissingObject(error)) {
        return false;
      }
      throw new StorageError('delete', path, error);
    }

    try {
      await this.options.client.send(
        new DeleteObjectCommand({ Bucket: this.options.bucket, Key: key }),
      );
      return true;
    } catch (error) {
      throw new StorageError('delete', path, error);
    }
  }

  async read(path: string): Promise<Buffer | null> {
    try {
      const response = await this.options.client.send(
        new GetObjectCommand({ Bucket: this.options.bucket, Key: this.keyFor(path) }),
      );
      if (!response.Body) {
        return Buffer.alloc(0);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      throw new StorageError('read', path, error);
    }
  }

  urlFor(path: string): string {
    return joinUrl(this.options.publicBaseUrl, this.keyFor(path));
  }

  private keyFor(path: string) {
    return this.options.prefix ? `${this.options.prefix.replace(/\/+$/, '')}/${path}` : path;
  }
}
