/**
 * Execution orchestration and coordination
 */

export { executeWithArgs, type MainDeps, type MainResult } from './execution.ts';
export {
  delayBeforePass,
  type PassFailure,
  type RepeatPassesOptions,
  type RetryPolicy,
  repeatPasses,
} from './retry.ts';
