#!/usr/bin/env node

/**
 * Command line entry point
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { ConfigManager } from '../system/config';
import { EnvLoader } from '../system/config/env';
import { ConfigurationError, describeError, toError } from '../system/error-handling';
import { createModuleLogger, setLogLevel } from '../system/logging/logger';
import { DeliverySystem } from '../system/system';
import { ExitCode, exitCodeForError, exitCodeForOutcome } from './exit-codes';
import { printHealth, printRunReport, printSubscriberStats, printSystemStats } from './output';

const logger = createModuleLogger('cli');

interface GlobalOptions {
  config?: string;
}

const program = new Command();

program
  .name('daily-problems')
  .description('Deliver one coding problem with a worked solution to every subscriber, every day')
  .version('1.0.0')
  .option('-c, --config <path>', 'YAML configuration file (default: $DELIVERY_CONFIG or ./config/delivery.yaml)');

/**
 * Load configuration once, failing fast on anything but missing credentials
 */
function loadConfig(): ConfigManager {
  EnvLoader.initialize();
  const { config } = program.opts<GlobalOptions>();
  const manager = new ConfigManager({ configPath: config ?? process.env.DELIVERY_CONFIG });
  setLogLevel(manager.getConfig().logLevel);
  return manager;
}

/**
 * Run a one-shot command against a fresh system and exit with its code
 */
async function runCommand(command: (system: DeliverySystem) => Promise<ExitCode>): Promise<void> {
  let system: DeliverySystem | null = null;
  let code: ExitCode;
  try {
    const configManager = loadConfig();
    configManager.assertValid();
    system = new DeliverySystem({ configManager });
    code = await command(system);
  } catch (error) {
    code = reportFailure(error);
  }

  if (system) {
    await system.shutdown().catch((error: unknown) => logger.warn('Shutdown incomplete', { error: describeError(error) }, 'shutdown'));
  }
  process.exit(code);
}

async function bootScheduledSystem(): Promise<DeliverySystem> {
  const configManager = loadConfig();
  configManager.assertValid({ generation: true, email: true });
  const system = new DeliverySystem({ configManager });
  try {
    await system.initialize();
  } catch (error) {
    await system.shutdown();
    throw error;
  }
  return system;
}

function reportFailure(error: unknown): ExitCode {
  const code = exitCodeForError(error);
  if (error instanceof ConfigurationError) {
    console.error(chalk.red('✗ Configuration error:'));
    for (const problem of error.problems.length > 0 ? error.problems : [error.message]) {
      console.error(chalk.red(`  - ${problem}`));
    }
  } else {
    console.error(chalk.red(`✗ ${describeError(error)}`));
  }
  return code;
}

program
  .command('init-data')
  .description('Load a problem catalog document into the database')
  .option('-f, --file <path>', 'catalog JSON document (default: catalog.file from configuration)')
  .action(async (options: { file?: string }) => {
    await runCommand(async system => {
      const file = options.file ?? system.config.catalog.file;
      console.log(chalk.blue(`Loading catalog from ${file}...`));
      const result = await system.loadCatalog(file);
      console.log(chalk.green(`✓ ${result.inserted} inserted, ${result.updated} updated, ${result.total} problems in catalog`));
      return ExitCode.SUCCESS;
    });
  });

program
  .command('run-once')
  .description('Trigger one delivery run now and wait for it')
  .action(async () => {
    await runCommand(async system => {
      await system.initialize();
      const scheduler = system.createScheduler();

      const cancel = (): void => {
        console.log(chalk.yellow('\nCancelling run...'));
        scheduler.stop().catch((error: unknown) => logger.error('Cancel failed', toError(error), undefined, 'run-once'));
      };
      process.once('SIGINT', cancel);
      process.once('SIGTERM', cancel);

      const outcome = await scheduler.triggerNow();
      process.removeListener('SIGINT', cancel);
      process.removeListener('SIGTERM', cancel);

      switch (outcome.status) {
        case 'completed':
          printRunReport(outcome.report);
          break;
        case 'skipped':
          console.log(chalk.yellow(`Run skipped: ${outcome.reason}`));
          break;
        case 'failed':
          reportFailure(outcome.error);
          break;
      }
      return exitCodeForOutcome(outcome);
    });
  });

program
  .command('scheduler')
  .description('Start the daily delivery loop')
  .action(async () => {
    const running = await bootScheduledSystem().catch((error: unknown) => process.exit(reportFailure(error)));
    const scheduler = running.createScheduler();
    scheduler.on('runCompleted', printRunReport);
    scheduler.on('runSkipped', (trigger: string, reason: string) => {
      console.log(chalk.yellow(`Trigger (${trigger}) skipped: ${reason}`));
    });
    scheduler.on('runFailed', (error: Error) => {
      console.error(chalk.red(`✗ Run failed: ${describeError(error)}`));
    });

    let stopping = false;
    const shutdown = (signal: string): void => {
      if (stopping) {
        return;
      }
      stopping = true;
      console.log(chalk.yellow(`\n${signal} received, stopping scheduler...`));
      scheduler.stop()
        .then(() => running.shutdown())
        .then(() => process.exit(ExitCode.SUCCESS))
        .catch((error: unknown) => {
          console.error(chalk.red(`✗ Shutdown failed: ${describeError(error)}`));
          process.exit(ExitCode.SYSTEMIC_FAILURE);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    scheduler.start();
    const next = scheduler.getNextFireTime();
    console.log(chalk.green(`✓ Scheduler running, next delivery at ${next ? next.toISOString() : 'unknown'}`));
  });

program
  .command('test')
  .description('Check storage, the generation endpoint and SMTP without writing anything')
  .action(async () => {
    await runCommand(async system => {
      const health = await system.getHealth();
      printHealth(health);
      return health.healthy ? ExitCode.SUCCESS : ExitCode.UNHEALTHY;
    });
  });

program
  .command('show-config')
  .description('Print the effective configuration with secrets redacted')
  .action(() => {
    let code: ExitCode = ExitCode.SUCCESS;
    try {
      const configManager = loadConfig();
      console.log(chalk.blue(`Configuration file: ${configManager.getConfigPath()}`));
      console.log(JSON.stringify(configManager.getRedactedConfig(), null, 2));

      const problems = configManager.validate({ generation: true, email: true });
      if (problems.length > 0) {
        console.log(chalk.yellow('\nNot ready for delivery runs:'));
        problems.forEach(problem => console.log(chalk.yellow(`  - ${problem}`)));
        code = configManager.validate().length > 0 ? ExitCode.CONFIGURATION_ERROR : ExitCode.SUCCESS;
      }
    } catch (error) {
      code = reportFailure(error);
    }
    process.exit(code);
  });

program
  .command('subscribe <email>')
  .description('Subscribe an address, or reactivate and update an existing one')
  .option('-l, --language <language>', 'solution language', 'python')
  .option('-d, --difficulty <difficulty>', 'easy, medium, hard or any', 'any')
  .action(async (email: string, options: { language: string; difficulty: string }) => {
    await runCommand(async system => {
      await system.initialize();
      const result = await system.getSubscriptionService().subscribe(email, options.language, options.difficulty);
      const { subscriber } = result;
      console.log(chalk.green(`✓ ${subscriber.identity} ${result.status} (${subscriber.language}, ${subscriber.difficulty})`));
      if (!result.notified) {
        console.log(chalk.yellow('  Welcome message not sent'));
      }
      return ExitCode.SUCCESS;
    });
  });

program
  .command('unsubscribe <email>')
  .description('Stop deliveries to an address; its history is kept')
  .action(async (email: string) => {
    await runCommand(async system => {
      await system.initialize();
      const changed = await system.getSubscriptionService().unsubscribe(email);
      console.log(changed ? chalk.green(`✓ ${email} unsubscribed`) : chalk.yellow(`${email} has no active subscription`));
      return ExitCode.SUCCESS;
    });
  });

program
  .command('preferences <email>')
  .description('Change the language or difficulty of a subscriber')
  .option('-l, --language <language>', 'solution language')
  .option('-d, --difficulty <difficulty>', 'easy, medium, hard or any')
  .action(async (email: string, options: { language?: string; difficulty?: string }) => {
    await runCommand(async system => {
      await system.initialize();
      const subscriber = await system.getSubscriptionService().updatePreferences(email, options);
      console.log(chalk.green(`✓ ${subscriber.identity} now gets ${subscriber.difficulty} problems in ${subscriber.language}`));
      return ExitCode.SUCCESS;
    });
  });

program
  .command('stats [email]')
  .description('Delivery statistics for one subscriber, or for the whole system')
  .action(async (email: string | undefined) => {
    await runCommand(async system => {
      await system.initialize();
      const service = system.getSubscriptionService();
      if (email) {
        printSubscriberStats(await service.getSubscriberStats(email));
      } else {
        printSystemStats(await service.getSystemStats());
      }
      return ExitCode.SUCCESS;
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.exit(reportFailure(error));
});
