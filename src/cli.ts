#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import * as packageJson from '../package.json';
import { ChainConfigLoader, loadDefaultConfig, resolveSettings } from './config';
import { ChainOrchestrator, createAwsServices } from './orchestration';
import { Logger } from './logging';
import {
  formatDeploymentSummary,
  formatPlan,
  formatProvisioningReport,
  formatTeardownReport
} from './reporting';

interface RunOptions {
  delete?: boolean;
  config?: string;
  region?: string;
  profile?: string;
  verbose?: boolean;
  dryRun?: boolean;
  inspect: boolean;
}

interface InitOptions {
  output: string;
  project: string;
  force?: boolean;
}

type Spinner = ReturnType<typeof ora>;

function createSpinnerLogger(spinner: Spinner, verbose: boolean): Logger {
  const persist = (symbol: string, text: string) => {
    const current = spinner.text;
    spinner.stopAndPersist({ symbol, text });
    spinner.start(current);
  };

  return {
    debug: message => {
      if (verbose) {
        persist(chalk.gray('·'), chalk.gray(message));
      }
    },
    info: message => {
      persist(chalk.cyan('›'), message);
      spinner.text = message;
    },
    warn: message => persist(chalk.yellow('⚠'), chalk.yellow(message)),
    error: message => persist(chalk.red('✖'), chalk.red(message))
  };
}

function print(lines: string[]): void {
  lines.forEach(line => console.log(line));
}

const program = new Command();

program
  .name('stack-chain')
  .description('Create or delete the bootstrap bucket, artifact bucket and function stacks with CloudFormation')
  .version(packageJson.version)
  .option('-d, --delete', 'delete the CloudFormation stacks and their resources')
  .option('-c, --config <path>', 'path to configuration file (default: stack-chain.yml if present)')
  .option('-r, --region <region>', 'AWS region, overriding the configuration')
  .option('-p, --profile <profile>', 'AWS credentials profile, overriding the configuration')
  .option('-v, --verbose', 'enable verbose logging')
  .option('--dry-run', 'show the stages that would run without calling AWS')
  .option('--no-inspect', 'skip the summary of the deployed API after provisioning')
  .action(async () => {
    const options = program.opts<RunOptions>();
    const spinner = ora('Loading configuration...').start();

    try {
      const overrides = { aws: { region: options.region, profile: options.profile } };
      const config = options.config
        ? await new ChainConfigLoader().load(resolve(options.config), overrides)
        : await loadDefaultConfig(overrides);
      const baseDir = options.config ? dirname(resolve(options.config)) : process.cwd();
      const settings = resolveSettings(config, baseDir);

      const logger = createSpinnerLogger(spinner, Boolean(options.verbose));
      const orchestrator = new ChainOrchestrator(settings, createAwsServices(settings, logger));

      if (options.dryRun) {
        spinner.succeed(`Dry run for region ${settings.region}`);
        console.log(chalk.blue('\n📋 Provisioning plan:'));
        print(formatPlan(orchestrator.plan()));
        console.log(chalk.blue('\n🗑️  Teardown order:'));
        console.log(`   ${orchestrator.teardownOrder().join(' -> ')}`);
        return;
      }

      if (options.delete) {
        spinner.text = 'Deleting CloudFormation stacks...';
        const report = await orchestrator.teardown();

        if (report.success) {
          spinner.succeed('All stacks deleted');
          print(formatTeardownReport(report));
          return;
        }

        spinner.fail('Teardown failed');
        console.log(chalk.red('\n❌ Teardown report:'));
        print(formatTeardownReport(report));
        process.exit(1);
      }

      spinner.text = 'Provisioning CloudFormation stacks...';
      const report = await orchestrator.provision();

      if (!report.success) {
        spinner.fail('Provisioning failed');
        console.log(chalk.red('\n❌ Provisioning report:'));
        print(formatProvisioningReport(report));
        process.exit(1);
      }

      spinner.succeed('All stacks created');
      print(formatProvisioningReport(report));

      if (options.inspect) {
        const summary = await orchestrator.inspect();
        if (summary.ok) {
          console.log(chalk.green('\n✅ Deployed API:'));
          print(formatDeploymentSummary(summary.value));
        } else {
          console.warn(chalk.yellow(`\n⚠️  ${summary.error.message}`));
        }
      }
    } catch (error) {
      spinner.fail('stack-chain failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      if (options.verbose) {
        console.error(error);
      }
      process.exit(1);
    }
  });

program
  .command('init')
  .description('Write a starter configuration file')
  .option('-o, --output <path>', 'output configuration file path', 'stack-chain.yml')
  .option('-n, --project <name>', 'project name used to derive resource names', 'stack-chain')
  .option('-f, --force', 'overwrite an existing file')
  .action((options: InitOptions) => {
    const spinner = ora('Writing configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists (use --force to overwrite)`);
      }

      // Validate the project name before writing it out
      const config = new ChainConfigLoader().fromDefaults({ project: { name: options.project } });

      const yamlContent = `# stack-chain configuration
# Generated on ${new Date().toISOString()}

project:
  name: ${config.project.name}
  # environment: dev  # Appended to derived resource names

aws:
  region: \${AWS_REGION:-${config.aws.region}}
  # profile: default  # Uncomment to use a specific AWS profile

# Derived from the project name and region when omitted
# buckets:
#   bootstrap: ${config.project.name}-bootstrap-${config.aws.region}
#   artifacts: ${config.project.name}-artifacts-${config.aws.region}
# stacks:
#   bootstrap: ${config.project.name}-bootstrap-bucket
#   build: ${config.project.name}-artifact-bucket
#   deploy: ${config.project.name}-function

artifacts:
  # bucket_template: ./cloudformation/artifact-bucket.yaml  # Defaults to the bundled template
  # function_template: ./cloudformation/function-api.yaml  # Defaults to the bundled template
  function_code: ${config.artifacts.function_code}

function:
  handler: ${config.function.handler}
  runtime: ${config.function.runtime}

polling:
  storage:
    delay_seconds: ${config.polling.storage.delay_seconds}
    max_attempts: ${config.polling.storage.max_attempts}
  deploy:
    delay_seconds: ${config.polling.deploy.delay_seconds}
    max_attempts: ${config.polling.deploy.max_attempts}

tags:
  Project: ${config.project.name}
`;

      writeFileSync(options.output, yamlContent);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log(`1. Zip your function code into ${config.artifacts.function_code}`);
      console.log('2. Ensure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('stack-chain')} (and ${chalk.cyan('stack-chain --delete')} to remove everything)`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
