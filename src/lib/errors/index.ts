/**
 * Error Handling Module
 */

export {
  MalformedDiffError,
  ProviderError,
  HostError,
  ConfigError,
  getErrorMessage,
  type ProviderErrorKind,
  type ProviderErrorOptions,
  type HostErrorKind,
} from "./errors.js";

export {
  matchErrorPattern,
  getStatusCode,
  getRetryAfterMs,
  parseRetryAfter,
  classifyProviderError,
  classifyHostError,
  type ErrorPattern,
  type ErrorType,
} from "./error-registry.js";
