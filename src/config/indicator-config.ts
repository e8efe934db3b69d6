/**
 * @fileoverview Session indicator configuration
 *
 * Raw configuration uses the host's snake_case keys and seconds:
 *
 * ```yaml
 * config:
 *   position: bottom        # bottom | inline
 *   show_tokens: true
 *   show_elapsed: true
 *   update_interval: 0.1    # seconds between redraws
 *   stuck_threshold: 60     # seconds idle before the stuck warning
 *   enable_unstick_hint: true
 * ```
 *
 * {@link resolveIndicatorConfig} validates it, converts to milliseconds and
 * applies the environment (`NO_COLOR`, `AMPLIFIER_NO_STATUS`). The result is
 * frozen; nothing re-reads configuration after startup.
 *
 * Invalid values never stop the indicator from mounting: each bad key falls
 * back to its default with a warning.
 *
 * @module config/indicator-config
 */

import { z } from 'zod';
import { MAX_UPDATE_INTERVAL_SECONDS } from './limits.js';
import { DEFAULT_SPINNER, SPINNER_NAMES, type SpinnerName } from '../spinner.js';
import type { StatusPosition } from '../terminal.js';

export const IndicatorConfigSchema = z.object({
  position: z.enum(['bottom', 'inline']).default('bottom')
    .describe('Where the status line is drawn'),
  show_tokens: z.boolean().default(true)
    .describe('Show input/output token counts'),
  show_elapsed: z.boolean().default(true)
    .describe('Show elapsed session time'),
  update_interval: z.number().positive().max(MAX_UPDATE_INTERVAL_SECONDS).default(0.1)
    .describe('Seconds between redraws'),
  stuck_threshold: z.number().nonnegative().finite().default(60)
    .describe('Seconds without activity before the session counts as stuck'),
  critical_threshold: z.number().nonnegative().finite().default(180)
    .describe('Seconds without activity before the stuck warning turns red'),
  enable_unstick_hint: z.boolean().default(true)
    .describe('Show the Ctrl+C hint in the stuck warning'),
  spinner: z.enum(SPINNER_NAMES).default(DEFAULT_SPINNER)
    .describe('Spinner frame set'),
  handle_interrupts: z.boolean().default(false)
    .describe('Install a SIGINT handler that drives Ctrl+C escalation'),
  debug: z.boolean().default(false)
    .describe('Print component debug logs to stderr'),
});

export type IndicatorConfigInput = z.input<typeof IndicatorConfigSchema>;
export type IndicatorConfig = z.output<typeof IndicatorConfigSchema>;

/** Configuration after validation, unit conversion and environment overrides */
export interface ResolvedIndicatorConfig {
  readonly position: StatusPosition;
  readonly showTokens: boolean;
  readonly showElapsed: boolean;
  readonly updateIntervalMs: number;
  readonly stuckThresholdMs: number;
  readonly criticalThresholdMs: number;
  readonly unstickHint: boolean;
  readonly spinner: SpinnerName;
  readonly handleInterrupts: boolean;
  readonly debug: boolean;
  /** False when NO_COLOR is present */
  readonly colorsEnabled: boolean;
  /** False when AMPLIFIER_NO_STATUS is present */
  readonly statusEnabled: boolean;
}

export interface ConfigIssue {
  key: string;
  message: string;
}

/**
 * Validate raw configuration. Keys that fail validation are dropped and
 * reported, so their defaults apply.
 */
export function parseIndicatorConfig(raw: unknown): { config: IndicatorConfig; issues: ConfigIssue[] } {
  const isObject = raw !== null && typeof raw === 'object' && !Array.isArray(raw);
  const input: Record<string, unknown> = isObject ? Object.fromEntries(Object.entries(raw)) : {};
  const issues: ConfigIssue[] = [];

  if (raw !== undefined && raw !== null && !isObject) {
    issues.push({ key: '(root)', message: 'configuration must be an object' });
  }

  const first = IndicatorConfigSchema.safeParse(input);
  if (first.success) {
    return { config: first.data, issues };
  }

  for (const issue of first.error.issues) {
    const key = String(issue.path[0] ?? '(root)');
    issues.push({ key, message: issue.message });
    delete input[key];
  }

  return { config: IndicatorConfigSchema.parse(input), issues };
}

/**
 * Resolve configuration for the indicator.
 *
 * @param raw - Host configuration (snake_case keys, seconds)
 * @param env - Environment variables
 * @param onIssue - Called for every ignored key
 */
export function resolveIndicatorConfig(
  raw: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
  onIssue: (issue: ConfigIssue) => void = (issue) =>
    console.warn(`[session-indicator] Ignoring invalid option "${issue.key}": ${issue.message}`)
): ResolvedIndicatorConfig {
  const { config, issues } = parseIndicatorConfig(raw);
  for (const issue of issues) {
    onIssue(issue);
  }

  return Object.freeze({
    position: config.position,
    showTokens: config.show_tokens,
    showElapsed: config.show_elapsed,
    updateIntervalMs: Math.max(1, Math.round(config.update_interval * 1000)),
    stuckThresholdMs: Math.round(config.stuck_threshold * 1000),
    criticalThresholdMs: Math.round(config.critical_threshold * 1000),
    unstickHint: config.enable_unstick_hint,
    spinner: config.spinner,
    handleInterrupts: config.handle_interrupts,
    debug: config.debug,
    colorsEnabled: env.NO_COLOR === undefined,
    statusEnabled: env.AMPLIFIER_NO_STATUS === undefined,
  });
}
