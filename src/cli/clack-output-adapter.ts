/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for interactive
 * terminals, plain console for CI and piped output.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`✓ ${message}`);
    },

    error(message: string): void {
      console.log(`✗ ${message}`);
    },

    warn(message: string): void {
      console.log(`⚠ ${message}`);
    },
  };
}
