import { PaykitError } from "@paykit/core";

type ConfigurationErrorCode = "invalid_config" | "missing_session";

/** Thrown for invalid client configuration. Codes: `invalid_config`, `missing_session`. */
export class ConfigurationError extends PaykitError {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}
