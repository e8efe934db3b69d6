/**
 * @fileoverview session-indicator CLI command definitions
 *
 * Commands for trying the status line outside a host: a scripted demo,
 * event log replay, configuration inspection and the shortcut help.
 *
 * @module cli
 */

import { once } from 'node:events';
import { readFileSync } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { resolveIndicatorConfig } from './config/indicator-config.js';
import { EMERGENCY_EXIT_CODE } from './config/limits.js';
import { buildDemoSession } from './demo.js';
import { KEYBOARD_SHORTCUTS } from './escalation.js';
import { parseEventLog, playEvents, type EventRecord, type Playback } from './replay.js';
import { SessionIndicator } from './session-indicator.js';
import { getErrorMessage } from './types.js';

const program = new Command();

program
  .name('session-indicator')
  .description('Live terminal status line for agent sessions')
  .version('0.1.0');

/**
 * Read a JSON configuration file. The result is validated later by
 * resolveIndicatorConfig().
 */
function loadConfigFile(path: string | undefined): Record<string, unknown> {
  if (!path) return {};
  const content = readFileSync(path, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Play records through a fresh indicator with Ctrl+C escalation enabled,
 * and wait for the final status line.
 */
async function runSession(
  records: readonly EventRecord[],
  config: Record<string, unknown>,
  speed: number
): Promise<void> {
  let playback: Playback | null = null;

  const indicator = new SessionIndicator({ ...config, handle_interrupts: true }, {
    onAbort: () => {
      playback?.cancel();
      indicator.onEvent('session:error', { error: 'Aborted by user' });
    },
    onExit: () => {
      playback?.cancel();
      indicator.dispose();
      console.error(chalk.red('\n✗ Emergency exit'));
      process.exit(EMERGENCY_EXIT_CODE);
    },
  });

  if (!indicator.rendering) {
    console.log(chalk.yellow('Status line disabled (not a TTY, TERM=dumb or AMPLIFIER_NO_STATUS set)'));
  }

  const stopped = once(indicator, 'renderStopped');
  playback = playEvents(indicator, records, { speed });
  await playback.done;

  if (indicator.rendering && indicator.tracker.terminal) {
    // The loop flushes the final line on its next tick
    await Promise.race([stopped, sleep(indicator.config.updateIntervalMs * 2 + 50)]);
  }

  const final = indicator.snapshot();
  indicator.dispose();
  if (!indicator.rendering) {
    console.log(`Session ${final.activity}: ${final.tokensIn} in / ${final.tokensOut} out, ${final.turnCount} turns`);
  }
}

// ============ Demo Command ============

program
  .command('demo')
  .description('Run a scripted session through the status line')
  .option('-s, --stuck', 'Stall long enough to trigger the stuck warning')
  .option('-c, --config <file>', 'JSON configuration file')
  .action(async (options: { stuck?: boolean; config?: string }) => {
    try {
      const config = loadConfigFile(options.config);
      if (options.stuck && config.stuck_threshold === undefined) {
        config.stuck_threshold = 5;
      }
      const resolved = resolveIndicatorConfig(config, process.env, () => {});
      const stallMs = options.stuck ? resolved.stuckThresholdMs + 3000 : 0;
      console.log(chalk.bold('Session indicator demo') + chalk.gray('  (Ctrl+C to cancel, x2 abort, x3 exit)'));
      await runSession(buildDemoSession({ stallMs }), config, 1);
    } catch (err) {
      console.error(chalk.red(`✗ Demo failed: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

// ============ Replay Command ============

program
  .command('replay <file>')
  .description('Replay a JSON-lines event log through the status line')
  .option('--speed <n>', 'Playback speed multiplier', '1')
  .option('-c, --config <file>', 'JSON configuration file')
  .action(async (file: string, options: { speed: string; config?: string }) => {
    try {
      const speed = Number(options.speed);
      if (!Number.isFinite(speed) || speed <= 0) {
        throw new Error(`Invalid speed: ${options.speed}`);
      }
      const { records, skippedLines } = parseEventLog(readFileSync(file, 'utf-8'));
      if (skippedLines.length > 0) {
        console.log(chalk.yellow(`Skipped unparseable lines: ${skippedLines.join(', ')}`));
      }
      if (records.length === 0) {
        console.log(chalk.yellow('No events to replay'));
        return;
      }
      console.log(chalk.gray(`Replaying ${records.length} events from ${file}`));
      await runSession(records, loadConfigFile(options.config), speed);
    } catch (err) {
      console.error(chalk.red(`✗ Replay failed: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

// ============ Info Commands ============

program
  .command('config')
  .description('Show the resolved configuration')
  .option('-c, --config <file>', 'JSON configuration file')
  .action((options: { config?: string }) => {
    try {
      const resolved = resolveIndicatorConfig(loadConfigFile(options.config));
      console.log(chalk.bold('\nResolved configuration:'));
      for (const [key, value] of Object.entries(resolved)) {
        console.log(`  ${chalk.cyan(key.padEnd(20))} ${String(value)}`);
      }
      console.log('');
    } catch (err) {
      console.error(chalk.red(`✗ Failed to load configuration: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

program
  .command('shortcuts')
  .description('Show the Ctrl+C escalation shortcuts')
  .action(() => {
    console.log(KEYBOARD_SHORTCUTS);
  });

export { program };
