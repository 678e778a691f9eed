import fs from "node:fs";
import path from "node:path";
import type { Credentials, IndexTarget } from "./config";

export function renderPypirc(credentials: Credentials, index: IndexTarget): string {
  return [
    "[distutils]",
    `index-servers=${index.name}`,
    "",
    `[${index.name}]`,
    `repository=${index.repository}`,
    `username=${credentials.username}`,
    `password=${credentials.password}`,
    "",
  ].join("\n");
}

const CLEANUP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Writes the credentials file for the duration of `fn` only.
 * Whatever was at `filePath` beforehand (bytes and mode) is put back on every
 * exit path, including SIGINT/SIGTERM while `fn` runs. After restoring on a
 * signal the signal is raised again unless someone else is listening for it.
 */
export async function withPypirc<T>(
  filePath: string,
  content: string,
  fn: () => Promise<T>,
): Promise<T> {
  const previous = fs.existsSync(filePath)
    ? { bytes: fs.readFileSync(filePath), mode: fs.statSync(filePath).mode & 0o777 }
    : undefined;

  let restored = false;
  const restore = () => {
    if (restored) return;
    restored = true;
    if (previous === undefined) {
      fs.rmSync(filePath, { force: true });
    } else {
      fs.writeFileSync(filePath, previous.bytes);
      fs.chmodSync(filePath, previous.mode);
    }
  };
  const removeHandlers = () => {
    for (const signal of CLEANUP_SIGNALS) process.removeListener(signal, onSignal);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    removeHandlers();
    restore();
    if (process.listenerCount(signal) === 0) {
      process.kill(process.pid, signal);
    }
  };

  for (const signal of CLEANUP_SIGNALS) process.once(signal, onSignal);
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, { encoding: "utf8", mode: 0o600 });
    // mode only applies on creation
    fs.chmodSync(filePath, 0o600);
    return await fn();
  } finally {
    removeHandlers();
    restore();
  }
}
