#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createConfigLoader } from './config';
import { BuildCancelledError } from './errors';
import { createLogger } from './logging/logger';
import { BuildOrchestrator } from './orchestration';
import { STEP_NAMES } from './steps';
import { BuildResult } from './types';

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

function printResult(result: BuildResult): void {
  if (result.success) {
    console.log(chalk.green('\n✅ Build Results:'));
    if (result.artifact?.imageId !== undefined) {
      console.log(`📦 Snapshot: ${result.artifact.imageName} (${chalk.cyan(String(result.artifact.imageId))})`);
    } else {
      console.log('📦 No snapshot created (skip_snapshot)');
    }
    if (result.artifact?.server) {
      const server = result.artifact.server;
      console.log(`🖥️  Kept server: ${server.name} (${server.id}) ${server.publicIPv4 ?? server.publicIPv6 ?? ''}`);
    }
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\n❌ Errors:'));
    result.errors.forEach(error => {
      console.log(`  ${error.code}${error.step ? ` [${error.step}]` : ''}: ${error.message}`);
      if (error.remediation) {
        console.log(chalk.yellow(`  💡 ${error.remediation}`));
      }
    });
  }

  if (result.metadata.duration !== undefined) {
    console.log(chalk.gray(`\n⏱️  Build took ${result.metadata.duration}ms`));
  }
  console.log(chalk.gray(`🆔 Build ID: ${result.metadata.buildId}`));
}

const program = new Command();

program
  .name('hcloud-image-builder')
  .description('Build Hetzner Cloud snapshot images from a disposable server')
  .version(readVersion());

program
  .command('build')
  .description('Create a server, provision it and capture a snapshot')
  .option('-c, --config <path>', 'Path to configuration file', 'image.yml')
  .addOption(new Option('--halt-after <step>', 'Stop after a step and clean up').choices(STEP_NAMES))
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { config: string; haltAfter?: string; verbose?: boolean }) => {
    const spinner = ora('Loading configuration...').start();
    const controller = new AbortController();
    const onInterrupt = () => {
      spinner.text = 'Interrupted, cleaning up...';
      controller.abort(new BuildCancelledError('Interrupted by operator'));
    };

    try {
      const config = await createConfigLoader().load(join(process.cwd(), options.config));
      if (options.haltAfter) {
        config.halt_after = options.haltAfter;
      }

      const logger = createLogger({
        redact: [config.token],
        verbose: options.verbose,
        sink: (level, line) => {
          spinner.clear();
          if (level === 'error') console.error(line);
          else console.log(line);
          spinner.render();
        }
      });

      const orchestrator = new BuildOrchestrator(config, { logger });
      process.once('SIGINT', onInterrupt);

      const result = await orchestrator.build({
        signal: controller.signal,
        onEvent: event => {
          if (event.type === 'step-start') {
            spinner.text = `[${event.index + 1}/${event.total}] ${event.step}`;
          } else if (event.type === 'cleanup-start') {
            spinner.text = `Cleaning up ${event.step}`;
          }
        }
      });

      if (result.success) {
        spinner.succeed('Build completed successfully!');
      } else {
        spinner.fail('Build failed');
      }
      printResult(result);
      if (!result.success) {
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Build failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      if (options.verbose) {
        console.error(error);
      }
      process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

program
  .command('validate')
  .description('Validate a configuration file')
  .option('-c, --config <path>', 'Path to configuration file', 'image.yml')
  .action(async (options: { config: string }) => {
    const spinner = ora('Validating configuration...').start();

    try {
      const config = await createConfigLoader().load(join(process.cwd(), options.config));
      spinner.succeed(`Configuration is valid (${config.server_type} in ${config.location})`);
    } catch (error) {
      spinner.fail('Configuration is invalid');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program
  .command('init')
  .description('Write a starter configuration file')
  .option('-n, --name <name>', 'Snapshot name', 'my-image')
  .option('-o, --output <path>', 'Output configuration file path', 'image.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { name: string; output: string; force?: boolean }) => {
    const spinner = ora('Initializing configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists (use --force to overwrite)`);
      }

      const yamlContent = `# Image builder configuration
# Generated on ${new Date().toISOString()}

# token: read from HCLOUD_TOKEN when left out
location: nbg1
server_type: cx22
image: ubuntu-24.04
# image_filter:
#   with_selector: ["role=base"]
#   most_recent: true

snapshot_name: ${options.name}
snapshot_labels:
  app: ${options.name}

# user_data_file: ./cloud-init.yml
# rescue: linux64
keep_server: false
skip_snapshot: false

communicator:
  type: ssh
  username: root
  timeout: 300000
`;

      writeFileSync(options.output, yamlContent);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file');
      console.log('2. Export HCLOUD_TOKEN with a read/write API token');
      console.log(`3. Run: ${chalk.cyan('hcloud-image-builder build')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
