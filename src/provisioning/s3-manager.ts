import {
  S3Client,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectsCommand
} from '@aws-sdk/client-s3';
import { readFileSync } from 'fs';
import { ObjectStore } from './types';
import { toProviderError } from './errors';

// DeleteObjects accepts at most this many keys per request
const DELETE_BATCH_LIMIT = 1000;

export interface S3ManagerOptions {
  region?: string;
  profile?: string;
}

export class S3Manager implements ObjectStore {
  private client: S3Client;
  private region: string;

  constructor(options: S3ManagerOptions = {}) {
    this.region = options.region || 'us-east-1';
    this.client = new S3Client({
      region: this.region,
      ...(options.profile ? { profile: options.profile } : {})
    });
  }

  async upload(bucketName: string, key: string, localPath: string): Promise<{ etag?: string }> {
    try {
      const fileContent = readFileSync(localPath);

      const result = await this.client.send(new PutObjectCommand({
        Bucket: bucketName,
        Key: key,
        Body: fileContent,
        ContentType: this.getContentType(localPath)
      }));

      return { etag: result.ETag };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async listKeys(bucketName: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const result = await this.client.send(new ListObjectsV2Command({
          Bucket: bucketName,
          ContinuationToken: continuationToken
        }));

        for (const object of result.Contents ?? []) {
          if (object.Key) {
            keys.push(object.Key);
          }
        }

        continuationToken = result.IsTruncated ? result.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      const providerError = toProviderError(error);
      if (providerError.code === 'NoSuchBucket') {
        return [];
      }
      throw providerError;
    }

    return keys;
  }

  async deleteKeys(bucketName: string, keys: string[]): Promise<void> {
    for (let start = 0; start < keys.length; start += DELETE_BATCH_LIMIT) {
      const batch = keys.slice(start, start + DELETE_BATCH_LIMIT);

      let failures: string[];
      try {
        const result = await this.client.send(new DeleteObjectsCommand({
          Bucket: bucketName,
          Delete: {
            Objects: batch.map(key => ({ Key: key })),
            Quiet: true
          }
        }));
        failures = (result.Errors ?? []).map(entry => `${entry.Key}: ${entry.Code} ${entry.Message}`);
      } catch (error) {
        throw toProviderError(error);
      }

      if (failures.length > 0) {
        throw new Error(`Failed to delete ${failures.length} object(s) from ${bucketName}: ${failures.join('; ')}`);
      }
    }
  }

  objectUrl(bucketName: string, key: string): string {
    const path = key.split('/').map(segment => encodeURIComponent(segment)).join('/');
    return `https://${bucketName}.s3.${this.region}.amazonaws.com/${path}`;
  }

  private getContentType(filePath: string): string {
    const ext = filePath.split('.').pop()?.toLowerCase();

    const contentTypes: { [key: string]: string } = {
      'yaml': 'application/x-yaml',
      'yml': 'application/x-yaml',
      'json': 'application/json',
      'template': 'text/plain',
      'txt': 'text/plain',
      'zip': 'application/zip',
      'jar': 'application/java-archive'
    };

    return contentTypes[ext || ''] || 'application/octet-stream';
  }
}
