import fs from 'node:fs';
import path from 'node:path';
import {
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import { UploadError, errorMessage } from '../errors.js';

export type ArtifactMetadata = {
  userId: string;
  cameraId: string;
  checksum?: string | null;
};

export type StoredArtifact = {
  url: string;
  key: string;
};

export interface ArtifactStore {
  /**
   * Uploads the file under a key derived from `idempotencyKey` and resolves with its
   * object key and remote URL. Repeated calls with the same key resolve to the same object.
   */
  upload(localPath: string, idempotencyKey: string, metadata: ArtifactMetadata): Promise<StoredArtifact>;
}

export type S3ArtifactStoreOptions = {
  bucket: string;
  region: string;
  endpoint?: string;
  prefix?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle?: boolean;
  publicUrlBase?: string;
  client?: S3Client;
};

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.mkv': 'video/x-matroska',
  '.mov': 'video/quicktime'
};

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.$metadata.httpStatusCode === 404 || error.name === 'NotFound' || error.name === 'NoSuchKey';
  }
  return false;
}

export class S3ArtifactStore implements ArtifactStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly region: string;
  private readonly endpoint?: string;
  private readonly prefix: string;
  private readonly publicUrlBase?: string;

  constructor(options: S3ArtifactStoreOptions) {
    this.bucket = options.bucket;
    this.region = options.region;
    this.endpoint = options.endpoint?.replace(/\/+$/, '') || undefined;
    this.prefix = (options.prefix ?? '').replace(/^\/+|\/+$/g, '');
    this.publicUrlBase = options.publicUrlBase?.replace(/\/+$/, '') || undefined;
    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        endpoint: this.endpoint,
        forcePathStyle: options.forcePathStyle ?? false,
        credentials:
          options.accessKeyId && options.secretAccessKey
            ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
            : undefined
      });
  }

  objectKey(idempotencyKey: string, metadata: ArtifactMetadata, localPath: string): string {
    const extension = path.extname(localPath) || '.mp4';
    const segments = [
      this.prefix,
      sanitizeSegment(metadata.userId),
      `${sanitizeSegment(idempotencyKey)}${extension}`
    ].filter(segment => segment.length > 0);
    return segments.join('/');
  }

  objectUrl(key: string): string {
    if (this.publicUrlBase) {
      return `${this.publicUrlBase}/${key}`;
    }
    if (this.endpoint) {
      return `${this.endpoint}/${this.bucket}/${key}`;
    }
    return `https://${this.bucket}.s3.${this.region}.amazonaws.com/${key}`;
  }

  async upload(localPath: string, idempotencyKey: string, metadata: ArtifactMetadata): Promise<StoredArtifact> {
    const key = this.objectKey(idempotencyKey, metadata, localPath);

    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      if (head.Metadata?.['booking-id'] === idempotencyKey) {
        return { url: this.objectUrl(key), key };
      }
    } catch (error) {
      if (!isNotFound(error)) {
        throw new UploadError(`Failed to inspect ${key}: ${errorMessage(error)}`, 'store-unavailable', {
          cause: error
        });
      }
    }

    let size: number;
    try {
      size = (await fs.promises.stat(localPath)).size;
    } catch (error) {
      throw new UploadError(`Artifact ${localPath} is not readable`, 'artifact-missing', { cause: error });
    }

    const body = fs.createReadStream(localPath);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentLength: size,
          ContentType: CONTENT_TYPES[path.extname(localPath).toLowerCase()] ?? 'application/octet-stream',
          Metadata: {
            'booking-id': idempotencyKey,
            'camera-id': metadata.cameraId,
            'user-id': metadata.userId,
            ...(metadata.checksum ? { 'content-md5-hex': metadata.checksum } : {})
          }
        })
      );
    } catch (error) {
      throw new UploadError(`Failed to upload ${key}: ${errorMessage(error)}`, 'put-failed', {
        cause: error
      });
    } finally {
      body.destroy();
    }

    return { url: this.objectUrl(key), key };
  }
}
