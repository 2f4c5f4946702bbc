import { ProvisioningError, StageFailure } from '../types';
import { Logger, silentLogger } from '../logging';
import { ObjectStore, StackLifecycleManager, errorMessage, provisioningError } from '../provisioning';
import { Pipeline } from './pipeline';
import { StageDescriptor, TeardownOutcome } from './types';

/**
 * Removes the chain: every bucket is emptied first (a stack owning a
 * non-empty bucket cannot be deleted), then stacks are deleted in reverse
 * creation order, stopping at the first failure.
 */
export class TeardownOrchestrator {
  constructor(
    private readonly pipeline: Pipeline,
    private readonly stacks: StackLifecycleManager,
    private readonly store: ObjectStore,
    private readonly logger: Logger = silentLogger
  ) {}

  async run(): Promise<TeardownOutcome> {
    const order = this.pipeline.teardownOrder();
    const outcome: TeardownOutcome = {
      emptied: [],
      deleted: [],
      untouched: order.map(stage => stage.name)
    };

    this.logger.info('Emptying all buckets...');
    for (const stage of this.pipeline.list()) {
      if (!stage.bucketName) {
        continue;
      }

      const emptied = await this.emptyBucket(stage.bucketName);
      if (typeof emptied !== 'number') {
        outcome.failed = this.failure(stage, emptied);
        return outcome;
      }
      outcome.emptied.push({ bucket: stage.bucketName, removed: emptied });
    }

    for (const stage of order) {
      outcome.untouched = outcome.untouched.filter(name => name !== stage.name);

      const result = await this.stacks.delete(stage.stackName, stage.pollBudget);
      if (!result.ok) {
        outcome.failed = this.failure(stage, result.error);
        return outcome;
      }
      outcome.deleted.push(stage.name);
    }

    return outcome;
  }

  /**
   * Resolves to the number of objects removed, or the error that stopped it.
   */
  private async emptyBucket(bucketName: string): Promise<number | ProvisioningError> {
    try {
      const keys = await this.store.listKeys(bucketName);
      if (keys.length === 0) {
        this.logger.debug(`Bucket ${bucketName} is already empty`);
        return 0;
      }

      await this.store.deleteKeys(bucketName, keys);

      const remaining = await this.store.listKeys(bucketName);
      if (remaining.length > 0) {
        return provisioningError('EMPTY_FAILED', `Bucket ${bucketName} still holds ${remaining.length} object(s) after emptying`, {
          details: { bucket: bucketName, remaining: remaining.slice(0, 10) }
        });
      }

      this.logger.debug(`Removed ${keys.length} object(s) from ${bucketName}`);
      return keys.length;
    } catch (error) {
      return provisioningError('EMPTY_FAILED', `Failed to empty bucket ${bucketName}: ${errorMessage(error)}`, {
        details: { bucket: bucketName }
      });
    }
  }

  private failure(stage: StageDescriptor, cause: ProvisioningError): StageFailure {
    return {
      stage: stage.name,
      stackName: stage.stackName,
      error: provisioningError('TEARDOWN_FAILED', `Teardown stopped at ${stage.name} stack ${stage.stackName}: ${cause.message}`, {
        stage: stage.name,
        stackName: stage.stackName,
        cause,
        remediation: 'Resolve the failure in the CloudFormation console, then run with --delete again'
      })
    };
  }
}
