export {
  DEFAULT_BALANCE_MAX_POLLS,
  DEFAULT_BALANCE_INTERVAL_MS,
  type BalanceCondition,
  type WaitForBalanceOptions,
  type ObservedBalance,
  atLeast,
  nonZero,
  waitForBalance,
} from './wait-for-balance.js';
