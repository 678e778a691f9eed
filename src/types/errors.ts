export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class CommandError extends Error {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number;
  constructor(command: string, args: string[], exitCode: number, detail?: string) {
    super(
      `${[command, ...args].join(" ")} exited with code ${exitCode}` +
        (detail ? ` (${detail})` : ""),
    );
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
  }
}
export class WebhookError extends Error {
  readonly service: string;
  readonly url: string;
  readonly status: number | undefined;
  constructor(service: string, url: string, status: number | undefined, cause?: unknown) {
    super(
      status === undefined
        ? `webhook ${service} failed: ${cause instanceof Error ? cause.message : String(cause)}`
        : `webhook ${service} responded with HTTP ${status}`,
      { cause },
    );
    this.name = "WebhookError";
    this.service = service;
    this.url = url;
    this.status = status;
  }
}
