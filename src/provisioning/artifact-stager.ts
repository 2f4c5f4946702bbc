import { existsSync, statSync } from 'fs';
import { Result, StagedArtifact, UploadJob } from '../types';
import { Logger, silentLogger } from '../logging';
import { ObjectStore } from './types';
import { errorMessage, provisioningError } from './errors';

/**
 * Uploads local files (templates, code bundles) into a bucket. Never
 * inspects stack state and never retries.
 */
export class ArtifactStager {
  constructor(
    private readonly store: ObjectStore,
    private readonly logger: Logger = silentLogger
  ) {}

  async stage(job: UploadJob): Promise<Result<StagedArtifact>> {
    const { localPath, bucketName, key } = job;

    if (!existsSync(localPath) || !statSync(localPath).isFile()) {
      return {
        ok: false,
        error: provisioningError('UPLOAD_FAILED', `Local file not found: ${localPath}`, {
          details: { bucket: bucketName, key },
          remediation: `Create ${localPath} or point the configuration at an existing file`
        })
      };
    }

    this.logger.info(`Uploading ${key} to ${bucketName} bucket...`);

    try {
      const { etag } = await this.store.upload(bucketName, key, localPath);
      return {
        ok: true,
        value: {
          bucket: bucketName,
          key,
          url: this.store.objectUrl(bucketName, key),
          etag
        }
      };
    } catch (error) {
      return {
        ok: false,
        error: provisioningError('UPLOAD_FAILED', `Failed to upload ${localPath} to ${bucketName}/${key}: ${errorMessage(error)}`, {
          details: { bucket: bucketName, key }
        })
      };
    }
  }
}
