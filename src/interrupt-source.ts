/**
 * @fileoverview Interrupt pulse source
 *
 * Bridges a signal-delivery API (SIGINT on `process` by default) to the
 * {@link EscalationStateMachine}. The machine itself never sees signals, only
 * pulses, so it can be driven by a key handler or a test just as well.
 *
 * While installed, the listener replaces Node's default SIGINT behaviour
 * (exit); restoring happens on {@link InterruptSource.uninstall}.
 *
 * @module interrupt-source
 */

import type { EscalationStateMachine } from './escalation.js';

/** Anything that delivers SIGINT-style events */
export interface SignalTarget {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export class InterruptSource {
  private readonly machine: EscalationStateMachine;
  private readonly target: SignalTarget;
  private installed = false;
  private readonly handler = (): void => {
    this.machine.pulse();
  };

  constructor(machine: EscalationStateMachine, target: SignalTarget = process) {
    this.machine = machine;
    this.target = target;
  }

  /** Start forwarding SIGINT as pulses. Safe to call repeatedly. */
  install(): void {
    if (this.installed) return;
    this.target.on('SIGINT', this.handler);
    this.installed = true;
  }

  /** Stop forwarding. Safe to call when not installed. */
  uninstall(): void {
    if (!this.installed) return;
    this.target.off('SIGINT', this.handler);
    this.installed = false;
  }

  get isInstalled(): boolean {
    return this.installed;
  }
}
