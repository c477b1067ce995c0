export {
  EnvConfigError,
  integerVar,
  loadEnvConfig,
  stringVar,
  urlVar
} from './envConfig';
export type {
  EnvSource,
  IntegerVarOptions,
  LoadEnvConfigOptions,
  StringVarOptions
} from './envConfig';
export { computeExponentialBackoff, retryWithBackoff } from './retries/backoff';
export type { BackoffOptions, RetryAttemptInfo, RetryOptions } from './retries/backoff';
