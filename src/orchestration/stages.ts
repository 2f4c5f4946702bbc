import { ChainSettings, Result, StagedArtifact } from '../types';
import { ArtifactStager, StackLifecycleManager, provisioningError } from '../provisioning';
import { TemplateEngine } from '../templates';
import { artifactKey } from '../config/settings';
import { ArtifactRole, StageContext, StageDescriptor } from './types';

export interface StageDependencies {
  settings: ChainSettings;
  stacks: StackLifecycleManager;
  stager: ArtifactStager;
  templates: TemplateEngine;
}

const OK: Result<void> = { ok: true, value: undefined };

/**
 * The three links of the chain, in creation order:
 *
 *   bootstrap  bucket from an inline template, then stage the artifact bucket template into it
 *   build      artifact bucket from the staged template, then stage the function template into it
 *   deploy     stage the code bundle, then function + REST API from the staged template
 */
export function createProvisioningStages(deps: StageDependencies): StageDescriptor[] {
  const { settings, stacks, stager, templates } = deps;
  const context: StageContext = { staged: {} };

  const uploads = {
    bucketTemplate: {
      localPath: settings.files.bucketTemplate,
      bucketName: settings.buckets.bootstrap,
      key: artifactKey(settings.files.bucketTemplate)
    },
    functionTemplate: {
      localPath: settings.files.functionTemplate,
      bucketName: settings.buckets.artifacts,
      key: artifactKey(settings.files.functionTemplate)
    },
    functionCode: {
      localPath: settings.files.functionCode,
      bucketName: settings.buckets.artifacts,
      key: artifactKey(settings.files.functionCode)
    }
  };

  const stage = async (role: ArtifactRole): Promise<Result<StagedArtifact>> => {
    const result = await stager.stage(uploads[role]);
    if (result.ok) {
      context.staged[role] = result.value;
    }
    return result;
  };

  const stagedUrl = (role: ArtifactRole): Result<string> => {
    const artifact = context.staged[role];
    if (!artifact) {
      return {
        ok: false,
        error: provisioningError('STAGE_FAILED', `Template ${uploads[role].key} has not been staged yet`)
      };
    }
    return { ok: true, value: artifact.url };
  };

  return [
    {
      name: 'bootstrap',
      dependsOn: null,
      stackName: settings.stacks.bootstrap,
      bucketName: settings.buckets.bootstrap,
      pollBudget: settings.polling.storage,
      templateOrigin: 'inline template body',
      uploads: [uploads.bucketTemplate],
      async run() {
        const body = await templates.renderBootstrapTemplate({
          bucketName: settings.buckets.bootstrap,
          tags: settings.tags
        });

        const created = await stacks.create({
          stackName: settings.stacks.bootstrap,
          template: { kind: 'body', body },
          tags: settings.tags
        }, settings.polling.storage);
        if (!created.ok) {
          return created;
        }

        const staged = await stage('bucketTemplate');
        return staged.ok ? OK : staged;
      }
    },
    {
      name: 'build',
      dependsOn: 'bootstrap',
      stackName: settings.stacks.build,
      bucketName: settings.buckets.artifacts,
      pollBudget: settings.polling.storage,
      templateOrigin: `${settings.buckets.bootstrap}/${uploads.bucketTemplate.key}`,
      uploads: [uploads.functionTemplate],
      async run() {
        const url = stagedUrl('bucketTemplate');
        if (!url.ok) {
          return url;
        }

        const created = await stacks.create({
          stackName: settings.stacks.build,
          template: { kind: 'url', url: url.value },
          parameters: { BucketName: settings.buckets.artifacts },
          tags: settings.tags
        }, settings.polling.storage);
        if (!created.ok) {
          return created;
        }

        const staged = await stage('functionTemplate');
        return staged.ok ? OK : staged;
      }
    },
    {
      name: 'deploy',
      dependsOn: 'build',
      stackName: settings.stacks.deploy,
      bucketName: null,
      pollBudget: settings.polling.deploy,
      templateOrigin: `${settings.buckets.artifacts}/${uploads.functionTemplate.key}`,
      uploads: [uploads.functionCode],
      async run() {
        const code = await stage('functionCode');
        if (!code.ok) {
          return code;
        }

        const url = stagedUrl('functionTemplate');
        if (!url.ok) {
          return url;
        }

        // The template creates an IAM role, which CloudFormation refuses without this acknowledgement
        const created = await stacks.create({
          stackName: settings.stacks.deploy,
          template: { kind: 'url', url: url.value },
          capabilities: ['CAPABILITY_IAM'],
          parameters: {
            CodeBucket: code.value.bucket,
            CodeKey: code.value.key,
            Handler: settings.function.handler,
            Runtime: settings.function.runtime
          },
          tags: settings.tags
        }, settings.polling.deploy);
        return created.ok ? OK : created;
      }
    }
  ];
}
