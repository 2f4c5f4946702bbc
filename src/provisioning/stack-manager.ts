import { PollBudget, ProvisioningError, Result, StackHandle, StackState } from '../types';
import { Logger, silentLogger } from '../logging';
import { CreateStackRequest, OrchestrationService } from './types';
import { Poller, PollOutcome } from './poller';
import { classifyCreateStatus, classifyDeleteStatus } from './stack-status';
import { STACK_ALREADY_EXISTS, errorMessage, isProviderError, provisioningError, toProviderError } from './errors';

const IN_FLIGHT: ReadonlySet<StackState> = new Set<StackState>(['creating', 'deleting']);

/**
 * Owns every stack state transition:
 *
 *   absent -> creating -> created | create_failed
 *   created -> deleting -> deleted | delete_failed
 *
 * Nothing is rolled back; a failed stack stays as the provider left it.
 */
export class StackLifecycleManager {
  private readonly stacks = new Map<string, StackHandle>();

  constructor(
    private readonly service: OrchestrationService,
    private readonly poller: Poller = new Poller(),
    private readonly logger: Logger = silentLogger
  ) {}

  handle(stackName: string): StackHandle {
    const handle = this.stacks.get(stackName);
    return handle ? { ...handle } : { stackName, state: 'absent' };
  }

  handles(): StackHandle[] {
    return Array.from(this.stacks.values(), handle => ({ ...handle }));
  }

  async create(request: CreateStackRequest, budget: PollBudget): Promise<Result<StackHandle>> {
    const { stackName } = request;
    const current = this.handle(stackName);

    if (IN_FLIGHT.has(current.state)) {
      return this.fail(provisioningError('ALREADY_EXISTS', `Stack ${stackName} is already ${current.state}`, {
        stackName
      }));
    }

    this.logger.info(`Creating CloudFormation stack: ${stackName}...`);

    let stackId: string | undefined;
    try {
      const response = await this.service.createStack(request);
      stackId = response.stackId;
    } catch (error) {
      if (isProviderError(error) && error.code === STACK_ALREADY_EXISTS) {
        return this.fail(provisioningError('ALREADY_EXISTS', error.message, {
          stackName,
          remediation: `Delete the existing ${stackName} stack (run with --delete) or choose another stack name`
        }));
      }
      const providerError = toProviderError(error);
      this.transition(stackName, 'create_failed', { statusReason: providerError.message });
      return this.fail(provisioningError('CREATE_FAILED', providerError.message, {
        stackName,
        details: { providerCode: providerError.code, cause: 'rejected' }
      }));
    }

    this.transition(stackName, 'creating', { stackId });

    const outcome = await this.poller.wait(
      stackName,
      async name => classifyCreateStatus(name, await this.service.describeStack(name)),
      budget
    );

    if (outcome.status === 'ready') {
      this.logger.debug(`Stack ${stackName} created after ${outcome.attempts} poll(s)`);
      return { ok: true, value: this.transition(stackName, 'created') };
    }

    this.transition(stackName, 'create_failed', { statusReason: this.outcomeReason(outcome) });
    if (outcome.status === 'timeout') {
      return this.fail(provisioningError('TIMEOUT', this.timeoutMessage(stackName, 'creation', budget, outcome), {
        stackName,
        details: { attempts: outcome.attempts, lastStatus: outcome.lastDetail },
        remediation: 'Check the stack events in the CloudFormation console, then run with --delete to clean up'
      }));
    }
    return this.fail(provisioningError('CREATE_FAILED', outcome.reason, {
      stackName,
      details: { attempts: outcome.attempts, cause: 'terminal-failure' },
      remediation: 'Check the stack events in the CloudFormation console, then run with --delete to clean up'
    }));
  }

  async delete(stackName: string, budget: PollBudget): Promise<Result<StackHandle>> {
    this.logger.info(`Deleting CloudFormation stack: ${stackName}...`);

    try {
      await this.service.deleteStack(stackName);
    } catch (error) {
      const message = errorMessage(error);
      this.transition(stackName, 'delete_failed', { statusReason: message });
      return this.fail(provisioningError('DELETE_FAILED', message, {
        stackName,
        details: { cause: 'rejected' }
      }));
    }

    this.transition(stackName, 'deleting');

    const outcome = await this.poller.wait(
      stackName,
      async name => classifyDeleteStatus(await this.service.describeStack(name)),
      budget
    );

    if (outcome.status === 'ready') {
      return { ok: true, value: this.transition(stackName, 'deleted') };
    }

    const message = outcome.status === 'timeout'
      ? this.timeoutMessage(stackName, 'deletion', budget, outcome)
      : outcome.reason;
    this.transition(stackName, 'delete_failed', { statusReason: message });
    return this.fail(provisioningError('DELETE_FAILED', message, {
      stackName,
      details: { attempts: outcome.attempts, cause: outcome.status }
    }));
  }

  private transition(
    stackName: string,
    state: StackState,
    extra: Partial<Pick<StackHandle, 'stackId' | 'statusReason'>> = {}
  ): StackHandle {
    const previous = this.stacks.get(stackName);
    const next: StackHandle = {
      stackName,
      state,
      stackId: extra.stackId ?? previous?.stackId,
      statusReason: extra.statusReason
    };
    this.stacks.set(stackName, next);
    return { ...next };
  }

  private outcomeReason(outcome: PollOutcome): string | undefined {
    switch (outcome.status) {
      case 'terminal-failure':
        return outcome.reason;
      case 'timeout':
        return `Timed out after ${outcome.attempts} attempts`;
      default:
        return undefined;
    }
  }

  private timeoutMessage(
    stackName: string,
    operation: 'creation' | 'deletion',
    budget: PollBudget,
    outcome: { attempts: number; lastDetail?: string }
  ): string {
    const last = outcome.lastDetail ? ` (last status ${outcome.lastDetail})` : '';
    return `Stack ${stackName} ${operation} did not complete after ${outcome.attempts} attempts ` +
      `at ${budget.delaySeconds}s intervals${last}`;
  }

  private fail(error: ProvisioningError): Result<StackHandle> {
    this.logger.error(error.message);
    return { ok: false, error };
  }
}
