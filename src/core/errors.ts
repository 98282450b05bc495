/** A pooling parameter, input type or target combination that cannot be compiled. */
export class InvalidParameterError extends Error {
  name = "InvalidParameterError";
}

export class ConfigError extends Error {
  name = "ConfigError";
}
