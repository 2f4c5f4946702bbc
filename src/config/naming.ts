import { ChainConfig } from '../types';

/**
 * Inputs every derived name is built from
 */
export interface NamingConfig {
  projectName: string;
  /** Appended after the project name, e.g. dev or prod */
  environment?: string;
  region: string;
}

/**
 * Names of every resource the chain creates
 */
export interface ResourceNames {
  buckets: {
    bootstrap: string;
    artifacts: string;
  };
  stacks: {
    bootstrap: string;
    build: string;
    deploy: string;
  };
}

/**
 * Derives deterministic resource names so that a teardown run finds exactly
 * what a provision run created. Explicit names in the configuration win.
 */
export class ResourceNamingService {
  private readonly maxStackNameLength = 128;
  private readonly maxS3BucketNameLength = 63;

  generateResourceNames(config: ChainConfig): ResourceNames {
    const namingConfig: NamingConfig = {
      projectName: config.project.name,
      environment: config.project.environment,
      region: config.aws.region
    };

    return {
      buckets: {
        bootstrap: config.buckets.bootstrap || this.generateBucketName(namingConfig, 'bootstrap'),
        artifacts: config.buckets.artifacts || this.generateBucketName(namingConfig, 'artifacts')
      },
      stacks: {
        bootstrap: config.stacks.bootstrap || this.generateStackName(namingConfig, 'bootstrap-bucket'),
        build: config.stacks.build || this.generateStackName(namingConfig, 'artifact-bucket'),
        deploy: config.stacks.deploy || this.generateStackName(namingConfig, 'function')
      }
    };
  }

  /**
   * S3 bucket names are global; the region keeps names from two regions apart
   */
  generateBucketName(config: NamingConfig, role: string): string {
    const parts = [config.projectName, config.environment, role, config.region].filter(Boolean);
    const name = this.sanitizeName(parts.join('-')).toLowerCase();
    return this.validateAndTruncate(name, this.maxS3BucketNameLength);
  }

  generateStackName(config: NamingConfig, role: string): string {
    const parts = [config.projectName, config.environment, role].filter(Boolean);
    const name = this.sanitizeName(parts.join('-'));
    return this.validateAndTruncate(name, this.maxStackNameLength);
  }

  /**
   * Hyphenate anything outside [a-zA-Z0-9-], collapse hyphen runs and make
   * sure the result starts with a letter.
   */
  private sanitizeName(name: string): string {
    const cleaned = name
      .replace(/[^a-zA-Z0-9-]+/g, '-')
      .replace(/-{2,}/g, '-')
      .replace(/^-|-$/g, '');

    if (!cleaned) {
      return 'chain';
    }
    return /^[a-zA-Z]/.test(cleaned) ? cleaned : `chain-${cleaned}`;
  }

  /**
   * Names over the limit keep their head plus a digest of the whole name, so
   * two long names sharing a prefix stay distinct.
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const digest = this.digest(name);
    const head = name.slice(0, maxLength - digest.length - 1).replace(/-+$/, '');
    return `${head}-${digest}`;
  }

  // 32-bit string hash in base 36, at most six characters
  private digest(input: string): string {
    let hash = 0;
    for (const char of input) {
      hash = (Math.imul(hash, 31) + char.charCodeAt(0)) | 0;
    }
    return Math.abs(hash).toString(36).slice(0, 6);
  }
}

export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
