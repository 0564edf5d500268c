export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class MarketDataError extends Error {
  readonly ticker: string;

  constructor(ticker: string, message: string) {
    super(message);
    this.name = "MarketDataError";
    this.ticker = ticker;
  }
}

export class NotificationError extends Error {
  readonly channel: string;

  constructor(channel: string, message: string) {
    super(`${channel}: ${message}`);
    this.name = "NotificationError";
    this.channel = channel;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
