// core/loops.ts: Iteration bound over admin- and caller-supplied collections

import { ConfigurationError, PolicyError } from './errors.js';

export function ensureMaxLoops(limit: number, len: number): void {
  if (len > limit) {
    throw new PolicyError('MaxLoopsLimitExceeded', `Loop count ${len} exceeds the limit of ${limit}`, {
      limit: String(limit),
      requiredLoops: String(len),
    });
  }
}

/**
 * The limit may only be raised
 */
export function validateNewMaxLoopsLimit(current: number, next: number): void {
  if (!Number.isInteger(next) || next <= current) {
    throw new ConfigurationError(
      'InvalidMaxLoopsLimit',
      `Invalid maxLoopsLimit ${next}: must be an integer greater than ${current}`,
      { current: String(current), next: String(next) }
    );
  }
}
