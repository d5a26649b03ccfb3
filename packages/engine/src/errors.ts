/**
 * Raised by the remote clients when a service answers with a non-ok
 * HTTP status or reports an error in its payload. `status` is the HTTP
 * status when there was one.
 */
export class RemoteServiceError extends Error {
  readonly service: string;
  readonly status?: number;

  constructor(service: string, message: string, status?: number) {
    super(
      status === undefined
        ? `${service} error: ${message}`
        : `${service} error ${status}: ${message}`
    );
    this.name = "RemoteServiceError";
    this.service = service;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
