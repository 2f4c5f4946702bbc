import { ProvisioningError, StageName } from '../types';
import { Logger, silentLogger } from '../logging';
import { errorMessage, provisioningError } from '../provisioning';
import { PipelineOutcome, StageDescriptor } from './types';

/**
 * Ordered stage list. Construction rejects a list in which a stage depends
 * on a stage that does not run before it, so `run` can never start a stage
 * whose predecessor has not completed.
 */
export class Pipeline {
  private readonly stages: readonly StageDescriptor[];

  constructor(stages: StageDescriptor[], private readonly logger: Logger = silentLogger) {
    Pipeline.assertOrdered(stages);
    this.stages = [...stages];
  }

  static assertOrdered(stages: StageDescriptor[]): void {
    const seen = new Set<StageName>();

    stages.forEach((stage, index) => {
      if (seen.has(stage.name)) {
        throw new Error(`Duplicate stage in pipeline: ${stage.name}`);
      }
      if (index === 0 && stage.dependsOn !== null) {
        throw new Error(`First stage ${stage.name} cannot depend on ${stage.dependsOn}`);
      }
      if (index > 0 && (stage.dependsOn === null || !seen.has(stage.dependsOn))) {
        throw new Error(`Stage ${stage.name} must depend on a stage that runs before it`);
      }
      seen.add(stage.name);
    });
  }

  list(): readonly StageDescriptor[] {
    return this.stages;
  }

  /**
   * Stages in the order their stacks must be deleted.
   */
  teardownOrder(): StageDescriptor[] {
    return [...this.stages].reverse();
  }

  async run(): Promise<PipelineOutcome> {
    const completed: StageName[] = [];

    for (const [index, stage] of this.stages.entries()) {
      this.logger.debug(`Starting stage ${stage.name} (${stage.stackName})`);

      let failure: ProvisioningError | undefined;
      try {
        const result = await stage.run();
        failure = result.ok ? undefined : result.error;
      } catch (error) {
        failure = provisioningError('STAGE_FAILED', `Unexpected error: ${errorMessage(error)}`, {
          stage: stage.name,
          stackName: stage.stackName
        });
      }

      if (failure) {
        const error = failure.code === 'STAGE_FAILED'
          ? failure
          : provisioningError('STAGE_FAILED', `Stage ${stage.name} failed: ${failure.message}`, {
            stage: stage.name,
            stackName: stage.stackName,
            cause: failure,
            remediation: failure.remediation ?? 'Run with --delete to remove the partially created stacks'
          });

        return {
          completed,
          failed: { stage: stage.name, stackName: stage.stackName, error },
          skipped: this.stages.slice(index + 1).map(skipped => skipped.name)
        };
      }

      completed.push(stage.name);
    }

    return { completed, skipped: [] };
  }
}
