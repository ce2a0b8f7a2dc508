// src/lib/errors.ts

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

export class InvalidConfigError extends GatewayError {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
  }
}
