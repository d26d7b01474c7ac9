export class RelayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
  }
}

export class ConfigError extends RelayError {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class UpstreamUnreachableError extends RelayError {
  constructor(failures: number, windowMs: number, cause?: unknown) {
    super(`upstream unreachable: ${failures} consecutive receive errors within ${windowMs}ms`, { cause });
    this.name = 'UpstreamUnreachableError';
  }
}

export class SinkClosedError extends RelayError {
  constructor(target: string) {
    super(`${target} is closed`);
    this.name = 'SinkClosedError';
  }
}
