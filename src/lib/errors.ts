// Error taxonomy for the matching engine.
// InputError aborts a request before scoring; ProviderUnavailable is caught per job and
// degraded to a fallback sub-score; ConfigurationError is raised when config is loaded.

export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
  }
}

export class ProviderUnavailable extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderUnavailable';
  }
}

export class EmbeddingUnavailable extends ProviderUnavailable {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingUnavailable';
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isRetryableUpstreamError(error: unknown): boolean {
  if (error instanceof ProviderUnavailable) {
    return error.cause !== undefined && isRetryableUpstreamError(error.cause);
  }
  const status =
    error && typeof error === 'object' && 'status' in error && typeof error.status === 'number'
      ? error.status
      : null;
  if (status && [502, 503, 504].includes(status)) return true;
  const msg = error instanceof Error ? error.message : String(error ?? '');
  return /502|503|504|bad gateway|gateway timeout|service unavailable/i.test(msg);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
