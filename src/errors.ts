// ============================================================================
// FILE: src/errors.ts
// PURPOSE: Error classes that cross module boundaries
// ============================================================================

/**
 * ConfigurationError - A required input is missing or unusable
 *
 * Raised for missing repositories, manifests and skeletons, or invalid
 * settings. These abort the run; data-quality problems never do.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * BackendError - The text-generation backend answered with a failure
 */
export class BackendError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'BackendError';
  }
}
