import { PollBudget } from '../types';
import { errorMessage } from './errors';

export type PollObservation =
  | { state: 'ready' }
  | { state: 'pending'; detail?: string }
  | { state: 'failed'; reason: string };

export type PollOutcome =
  | { status: 'ready'; attempts: number }
  | { status: 'terminal-failure'; attempts: number; reason: string }
  | { status: 'timeout'; attempts: number; lastDetail?: string };

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Bounded wait-until-condition loop shared by every stage.
 *
 * Probes once immediately, then sleeps `delaySeconds` between probes for at
 * most `maxAttempts` probes. A probe that throws ends the wait as a terminal
 * failure.
 */
export class Poller {
  constructor(private readonly sleep: Sleep = defaultSleep) {}

  async wait(
    resourceId: string,
    probe: (resourceId: string) => Promise<PollObservation>,
    budget: PollBudget
  ): Promise<PollOutcome> {
    const maxAttempts = Math.max(1, budget.maxAttempts);
    let lastDetail: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let observation: PollObservation;
      try {
        observation = await probe(resourceId);
      } catch (error) {
        return { status: 'terminal-failure', attempts: attempt, reason: errorMessage(error) };
      }

      if (observation.state === 'ready') {
        return { status: 'ready', attempts: attempt };
      }
      if (observation.state === 'failed') {
        return { status: 'terminal-failure', attempts: attempt, reason: observation.reason };
      }

      lastDetail = observation.detail;
      if (attempt < maxAttempts) {
        await this.sleep(budget.delaySeconds * 1000);
      }
    }

    return { status: 'timeout', attempts: maxAttempts, lastDetail };
  }
}
