// Plain-text rendering of run reports, shared by the CLI and library callers
import { DeploymentSummary, ProvisioningReport, StackHandle, StageFailure, TeardownReport } from './types';
import { PlannedStage } from './orchestration';
import { describeError } from './provisioning';

function formatStacks(stacks: StackHandle[]): string[] {
  return stacks.map(stack => `  ${stack.stackName}: ${stack.state}`);
}

function formatFailure(failure: StageFailure): string[] {
  const lines = [`Failed stage: ${failure.stage} (${failure.stackName})`];
  lines.push(...describeError(failure.error).map(line => `  ${line}`));
  if (failure.error.remediation) {
    lines.push(`  Hint: ${failure.error.remediation}`);
  }
  return lines;
}

export function formatProvisioningReport(report: ProvisioningReport): string[] {
  const lines = [
    `Completed stages: ${report.completed.length > 0 ? report.completed.join(', ') : 'none'}`
  ];
  if (report.failed) {
    lines.push(...formatFailure(report.failed));
  }
  if (report.skipped.length > 0) {
    lines.push(`Skipped stages: ${report.skipped.join(', ')}`);
  }
  lines.push('Stacks:', ...formatStacks(report.stacks));
  lines.push(`Run ${report.metadata.runId} took ${report.metadata.duration ?? 0}ms`);
  return lines;
}

export function formatTeardownReport(report: TeardownReport): string[] {
  const lines = report.emptied.map(entry => `Emptied ${entry.bucket}: ${entry.removed} object(s) removed`);
  lines.push(`Deleted stacks: ${report.deleted.length > 0 ? report.deleted.join(', ') : 'none'}`);
  if (report.failed) {
    lines.push(...formatFailure(report.failed));
  }
  if (report.untouched.length > 0) {
    lines.push(`Untouched stages: ${report.untouched.join(', ')}`);
  }
  lines.push('Stacks:', ...formatStacks(report.stacks));
  lines.push(`Run ${report.metadata.runId} took ${report.metadata.duration ?? 0}ms`);
  return lines;
}

export function formatPlan(plan: PlannedStage[]): string[] {
  const lines: string[] = [];
  plan.forEach((stage, index) => {
    const after = stage.dependsOn ? ` (after ${stage.dependsOn})` : '';
    lines.push(`${index + 1}. ${stage.stage}${after}: stack ${stage.stackName} from ${stage.template}`);
    for (const upload of stage.uploads) {
      lines.push(`   upload ${upload.localPath} -> s3://${upload.bucketName}/${upload.key}`);
    }
  });
  return lines;
}

export function formatDeploymentSummary(summary: DeploymentSummary): string[] {
  const lines = [
    `REST API: ${summary.restApi.name ?? summary.restApi.id} (${summary.restApi.id})`,
    `Resource: ${summary.resource.path ?? '/'} [${summary.resource.methods.join(', ')}]`,
    `Method: ${summary.method.httpMethod} auth=${summary.method.authorizationType ?? 'unknown'} integration=${summary.method.integrationType ?? 'unknown'}`,
    `Deployment: ${summary.deployment.id}`,
    `Stages: ${summary.stages.map(stage => stage.name).join(', ') || 'none'}`,
    `Function: ${summary.function.name} (${summary.function.runtime ?? 'unknown runtime'}, ${summary.function.state ?? 'unknown state'})`
  ];
  for (const endpoint of summary.endpoints) {
    lines.push(`Endpoint: ${endpoint.url}`);
  }
  return lines;
}
