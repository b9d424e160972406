/**
 * Raised by the payload builder when the deployment did not supply a broker
 * constant. This is a caller/config defect, never a document problem.
 */
export class ConfigIncompleteError extends Error {
  readonly code = 'CONFIG_INCOMPLETE';

  constructor(readonly missing: string[]) {
    super(`Broker context is incomplete: missing or invalid ${missing.join(', ')}`);
    this.name = 'ConfigIncompleteError';
  }
}
