// errors.ts - Error types that abort a run, and message helpers

/**
 * Raised before any collection work when the monitor cannot be configured.
 * Entry points treat it as fatal.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(missing.length > 0 ? `${message}: ${[...missing].sort().join(', ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
