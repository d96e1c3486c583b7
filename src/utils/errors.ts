import type { ValidationReport } from '../core/intents/types.js';

export class IntentRegistryError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IntentRegistryError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends IntentRegistryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class StoreError extends IntentRegistryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORE_ERROR', options);
    this.name = 'StoreError';
  }
}

export class RegistryUnavailableError extends IntentRegistryError {
  constructor(message = 'No intent registry snapshot has been published yet', options?: ErrorOptions) {
    super(message, 'REGISTRY_UNAVAILABLE', options);
    this.name = 'RegistryUnavailableError';
  }
}

/** Startup could not produce a first snapshot; there is nothing safe to classify against. */
export class RegistryBootstrapError extends IntentRegistryError {
  public readonly report: ValidationReport | undefined;

  constructor(message: string, report?: ValidationReport, options?: ErrorOptions) {
    super(message, 'REGISTRY_BOOTSTRAP_FAILED', options);
    this.name = 'RegistryBootstrapError';
    this.report = report;
  }
}
