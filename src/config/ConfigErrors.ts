export type ConfigErrorCode =
  | "config_not_found"
  | "config_unreadable"
  | "config_malformed"
  | "config_invalid"
  | "settings_invalid";

type ConfigErrorInput = {
  code: ConfigErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly details?: Record<string, unknown>;

  constructor({ code, message, details }: ConfigErrorInput) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.details = details;
  }
}

export const createInvalidConfigError = (reason: string, details?: Record<string, unknown>): ConfigError =>
  new ConfigError({
    code: "config_invalid",
    message: `invalid configuration: ${reason}`,
    details,
  });
