import type { EngineConfig } from "./config";

/**
 * Raised while building an EngineConfig. Fatal: no engine is constructed
 * from a configuration that fails validation.
 */
export class EngineConfigError extends Error {
  readonly field: keyof EngineConfig;

  constructor(field: keyof EngineConfig, message: string) {
    super(`Invalid engine config "${field}": ${message}`);
    this.name = "EngineConfigError";
    this.field = field;
  }
}
