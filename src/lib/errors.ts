export class FetchFailedError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchFailedError";
    this.url = url;
    this.status = status;
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
