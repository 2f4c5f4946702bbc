import { v4 as uuidv4 } from 'uuid';
import {
  ChainSettings,
  DeploymentSummary,
  ProvisioningReport,
  Result,
  RunMetadata,
  TeardownReport
} from '../types';
import { Logger, createConsoleLogger } from '../logging';
import {
  APIGatewayManager,
  ArtifactStager,
  CloudFormationManager,
  LambdaManager,
  Poller,
  S3Manager,
  StackLifecycleManager
} from '../provisioning';
import { TemplateEngine } from '../templates';
import { Pipeline } from './pipeline';
import { createProvisioningStages } from './stages';
import { TeardownOrchestrator } from './teardown';
import { DeploymentInspector } from './inspection';
import { ChainServices, PlannedStage } from './types';

export class ChainOrchestrator {
  private readonly logger: Logger;
  private readonly stacks: StackLifecycleManager;
  private readonly pipeline: Pipeline;
  private readonly teardownOrchestrator: TeardownOrchestrator;
  private readonly inspector: DeploymentInspector;

  constructor(private readonly settings: ChainSettings, services: ChainServices) {
    this.logger = services.logger ?? createConsoleLogger();
    this.stacks = new StackLifecycleManager(services.orchestration, new Poller(services.sleep), this.logger);

    this.pipeline = new Pipeline(createProvisioningStages({
      settings,
      stacks: this.stacks,
      stager: new ArtifactStager(services.objectStore, this.logger),
      templates: new TemplateEngine()
    }), this.logger);

    this.teardownOrchestrator = new TeardownOrchestrator(this.pipeline, this.stacks, services.objectStore, this.logger);
    this.inspector = new DeploymentInspector(services.orchestration, services.gateway, services.functions, settings.region);
  }

  /**
   * Create the three stacks in dependency order. Stops at the first failing
   * stage and leaves what was created in place; the report says exactly which
   * stages completed.
   */
  async provision(): Promise<ProvisioningReport> {
    const metadata = this.startRun();
    const startTime = Date.now();

    const outcome = await this.pipeline.run();
    metadata.duration = Date.now() - startTime;

    return {
      success: !outcome.failed,
      completed: outcome.completed,
      failed: outcome.failed,
      skipped: outcome.skipped,
      stacks: this.stackHandles(),
      metadata
    };
  }

  async teardown(): Promise<TeardownReport> {
    const metadata = this.startRun();
    const startTime = Date.now();

    const outcome = await this.teardownOrchestrator.run();
    metadata.duration = Date.now() - startTime;

    return {
      success: !outcome.failed,
      emptied: outcome.emptied,
      deleted: outcome.deleted,
      failed: outcome.failed,
      untouched: outcome.untouched,
      stacks: this.stackHandles(),
      metadata
    };
  }

  async inspect(): Promise<Result<DeploymentSummary>> {
    return this.inspector.inspect(this.settings.stacks.deploy);
  }

  plan(): PlannedStage[] {
    return this.pipeline.list().map(stage => ({
      stage: stage.name,
      dependsOn: stage.dependsOn,
      stackName: stage.stackName,
      template: stage.templateOrigin,
      uploads: stage.uploads
    }));
  }

  /**
   * Stack names in the order teardown deletes them
   */
  teardownOrder(): string[] {
    return this.pipeline.teardownOrder().map(stage => stage.stackName);
  }

  private stackHandles() {
    return this.pipeline.list().map(stage => this.stacks.handle(stage.stackName));
  }

  private startRun(): RunMetadata {
    return {
      runId: uuidv4(),
      timestamp: new Date(),
      region: this.settings.region
    };
  }
}

/**
 * AWS-backed services for the configured region and profile
 */
export function createAwsServices(settings: ChainSettings, logger?: Logger): ChainServices {
  const options = { region: settings.region, profile: settings.profile };
  return {
    orchestration: new CloudFormationManager(options),
    objectStore: new S3Manager(options),
    gateway: new APIGatewayManager(options),
    functions: new LambdaManager(options),
    logger
  };
}
