/**
 * @fileoverview Global test setup for session-indicator tests
 *
 * Provides:
 * - Restoration of real timers after tests that fake them
 * - Restoration of console spies
 *
 * Tests never install handlers on the real process: SIGINT is simulated
 * through plain EventEmitter signal targets.
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
