export interface Logger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

const PREFIX = "[pypi-deploy]";

export const consoleLogger: Logger = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  error: (message, err) =>
    err === undefined
      ? console.error(`${PREFIX} ${message}`)
      : console.error(`${PREFIX} ${message}`, err),
};
