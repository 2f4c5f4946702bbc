import { existsSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { ChainConfig, ChainSettings, PollBudget, PollSettings } from '../types';
import { createNamingService } from './naming';

/**
 * Directory holding the templates shipped with the package. Found by walking up
 * to the package root, which sits two levels above the sources and three above
 * the build output.
 */
export function bundledTemplateDir(from: string = __dirname): string {
  let dir = from;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) {
      return resolve(from, '../../cloudformation');
    }
    dir = parent;
  }
  return join(dir, 'cloudformation');
}

function toBudget(settings: PollSettings): PollBudget {
  return {
    delaySeconds: settings.delay_seconds,
    maxAttempts: settings.max_attempts
  };
}

/**
 * Turn a validated configuration into the settings the orchestrator runs with.
 * Relative artifact paths resolve against `baseDir`; templates the configuration
 * leaves out come from the package.
 */
export function resolveSettings(config: ChainConfig, baseDir: string = process.cwd()): ChainSettings {
  const names = createNamingService().generateResourceNames(config);
  const { bucket_template: bucketTemplate, function_template: functionTemplate } = config.artifacts;
  const templateDir = bundledTemplateDir();

  return {
    region: config.aws.region,
    profile: config.aws.profile,
    buckets: names.buckets,
    stacks: names.stacks,
    files: {
      bucketTemplate: bucketTemplate
        ? resolve(baseDir, bucketTemplate)
        : join(templateDir, 'artifact-bucket.yaml'),
      functionTemplate: functionTemplate
        ? resolve(baseDir, functionTemplate)
        : join(templateDir, 'function-api.yaml'),
      functionCode: resolve(baseDir, config.artifacts.function_code)
    },
    function: { ...config.function },
    polling: {
      storage: toBudget(config.polling.storage),
      deploy: toBudget(config.polling.deploy)
    },
    tags: {
      Project: config.project.name,
      ...(config.project.environment ? { Environment: config.project.environment } : {}),
      ...config.tags
    }
  };
}

/**
 * Object key a staged file is stored under: its file name.
 */
export function artifactKey(localPath: string): string {
  return basename(localPath);
}
