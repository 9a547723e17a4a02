/**
 * Command line entry point
 *
 *   grow-control validate [--config <path>]
 *   grow-control simulate [--config <path>] [--ticks <n>]
 */

import * as readline from 'node:readline';

import chalk from 'chalk';
import { program } from 'commander';

import { ConfigInvalidError, describeError } from '$types';
import type { GrowConfig } from '$types';
import { createSimulatedGreenhouse } from '@hardware/simulated';
import { createFetchPost } from '@logging';
import { formatStatus } from '@system/control';
import { createNodeTimer, nowMs } from '@utils/time';
import type { ValidationError, ValidationWarning } from '@validation';
import { checkConfigDocument, loadConfig, loadEnvironmentFile, readConfigFile } from './config-loader';
import { createLogging, initialize } from './init';
import { applyOperatorCommand, parseOperatorCommand } from './operator';

const DEFAULT_CONFIG_PATH = 'config/grow.json';

function printIssues(errors: readonly ValidationError[], warnings: readonly ValidationWarning[]): void {
  for (const error of errors) {
    console.error(chalk.red('  ✗ [' + error.field + '] ' + error.message));
  }
  for (const warning of warnings) {
    console.warn(chalk.yellow('  ! [' + warning.field + '] ' + warning.message));
  }
}

function parseTickCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error('--ticks must be a positive integer (got "' + value + '")');
  }
  return n;
}

// ═══════════════════════════════════════════════════════════════
// VALIDATE
// ═══════════════════════════════════════════════════════════════

async function validateCommand(options: { config: string }): Promise<void> {
  loadEnvironmentFile();
  const document = await readConfigFile(options.config);
  const checked = checkConfigDocument(document, process.env);

  printIssues(checked.result.errors, checked.result.warnings);
  if (!checked.result.valid) {
    console.error(chalk.red.bold('✗ ' + options.config + ': ' + checked.result.errors.length + ' error(s)'));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green('✓ ' + options.config + ' is valid') +
    chalk.gray(' (' + checked.config.SENSORS.length + ' sensors, ' + checked.config.ACTUATORS.length + ' actuators, ' +
    checked.config.RULES.length + ' rules, ' + checked.config.BUTTONS.length + ' buttons)'));
}

// ═══════════════════════════════════════════════════════════════
// SIMULATE
// ═══════════════════════════════════════════════════════════════

async function simulateCommand(options: { config: string; ticks?: number }): Promise<void> {
  loadEnvironmentFile();
  const loaded = await loadConfig(options.config, process.env);
  printIssues([], loaded.warnings);
  const config: GrowConfig = loaded.config;

  const timerApi = createNodeTimer();
  const deps = {
    timerApi: timerApi,
    clock: nowMs,
    consoleApi: console,
    httpPost: createFetchPost()
  };
  const logging = createLogging(config, deps);

  const bench = createSimulatedGreenhouse({ clock: nowMs, logger: logging.logger });
  const controller = initialize(config, {
    sensors: bench.sensors(config.SENSORS),
    sink: bench.sink,
    estop: bench.estop,
    override: bench.override,
    presence: bench.presence
  }, deps, logging);

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  let watchdog: NodeJS.Timeout | null = null;
  let stopping: Promise<void> | null = null;

  function shutdown(): Promise<void> {
    if (stopping === null) {
      if (watchdog !== null) {
        clearInterval(watchdog);
        watchdog = null;
      }
      rl.close();
      stopping = controller.shutdown().then(function() {
        for (const line of formatStatus(controller.loop.getStatus())) {
          console.log(line);
        }
      });
    }
    return stopping;
  }

  function stopOnFailure(promise: Promise<void>): void {
    promise.catch(function(err: unknown) {
      console.error(chalk.red('Shutdown failed: ' + describeError(err)));
      process.exitCode = 1;
    });
  }

  rl.on('line', function(line: string) {
    const command = parseOperatorCommand(line);
    if (command === null) {
      return;
    }
    const reply = applyOperatorCommand(command, {
      inputs: controller.components.inputs,
      estop: bench.estop,
      override: bench.override,
      presence: bench.presence,
      status: function() { return formatStatus(controller.loop.getStatus()); }
    }, nowMs());
    for (const text of reply.lines) {
      console.log(chalk.magenta('» ') + text);
    }
    if (reply.quit) {
      stopOnFailure(shutdown());
    }
  });

  // End of input ends the run, unless a tick count decides when to stop
  rl.on('close', function() {
    if (options.ticks === undefined) {
      stopOnFailure(shutdown());
    }
  });

  process.once('SIGINT', function() { stopOnFailure(shutdown()); });
  process.once('SIGTERM', function() { stopOnFailure(shutdown()); });

  const limit = options.ticks;
  if (limit !== undefined) {
    // Node timers, not the controller's unref'd ones: this one keeps the process alive
    watchdog = setInterval(function() {
      if (controller.loop.getStatus().loop.tickCount >= limit) {
        stopOnFailure(shutdown());
      }
    }, config.TICK_PERIOD_MS);
  }

  console.log(chalk.gray('Simulated bench ready. Type help for commands.'));
  controller.start();
}

// ═══════════════════════════════════════════════════════════════
// PROGRAM
// ═══════════════════════════════════════════════════════════════

function reportFailure(err: unknown): void {
  if (err instanceof ConfigInvalidError) {
    console.error(chalk.red.bold('Configuration refused:'));
    printIssues(err.issues, []);
  } else {
    console.error(chalk.red(describeError(err)));
  }
  process.exitCode = 1;
}

program
  .name('grow-control')
  .description('Control loop for an enclosed growing environment');

program
  .command('validate')
  .description('Parse and validate a configuration file')
  .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_PATH)
  .action(function(options: { config: string }) {
    return validateCommand(options).catch(reportFailure);
  });

program
  .command('simulate')
  .description('Run the control loop against a simulated greenhouse; operator commands are read from stdin')
  .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_PATH)
  .option('-n, --ticks <n>', 'stop after n ticks', parseTickCount)
  .action(function(options: { config: string; ticks?: number }) {
    return simulateCommand(options).catch(reportFailure);
  });

program.parseAsync(process.argv).catch(reportFailure);
