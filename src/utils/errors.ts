/**
 * Error types for the biography research pipeline.
 *
 * Setup-time failures (configuration, secrets, session creation) are thrown
 * to the caller. Failures during a workflow run never surface as these; the
 * driver logs them and reports an absent result instead.
 */

export class BiographyResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BiographyResearchError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A required setting or credential is missing or invalid
 */
export class ConfigurationError extends BiographyResearchError {
  public readonly configKey?: string;
  public readonly helpUrl?: string;

  constructor(message: string, configKey?: string, helpUrl?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.helpUrl = helpUrl;
  }
}

/**
 * Secret Manager returned no payload for the requested version
 */
export class SecretNotFoundError extends BiographyResearchError {
  public readonly secretPath: string;

  constructor(secretPath: string) {
    super(`Secret ${secretPath} has no payload`);
    this.name = 'SecretNotFoundError';
    this.secretPath = secretPath;
  }
}

export class SessionSetupError extends BiographyResearchError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SessionSetupError';
  }
}

/**
 * researchPerson() was called on a flow whose initialize() never completed
 */
export class SessionNotInitializedError extends BiographyResearchError {
  constructor() {
    super('Research flow is not initialized. Call initialize() before researchPerson().');
    this.name = 'SessionNotInitializedError';
  }
}
