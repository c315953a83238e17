export {
  DEFAULT_RETRY_POLICY,
  RetryController,
  type RetryControllerOptions,
  type RetryInfo,
  type RetryPolicy,
  type RetryRunOptions,
} from './retry-controller.js';
