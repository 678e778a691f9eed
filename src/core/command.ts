import { spawn } from "node:child_process";
import os from "node:os";
import { CommandError } from "../types/errors";
import type { Env } from "./config";

export interface CommandOptions {
  cwd: string;
  env?: Env;
}

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, args: string[], opts: CommandOptions): Promise<CommandResult>;
}

/** Shell convention for a child killed by a signal: 128 + signal number. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const n: unknown = Reflect.get(os.constants.signals, signal);
  return 128 + (typeof n === "number" ? n : 0);
}

/**
 * Runs commands with inherited stdio, one at a time.
 * Non-zero exits and signals reject with CommandError; spawn failures use 127.
 */
export const spawnRunner: CommandRunner = {
  run(command, args, opts) {
    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: opts.cwd,
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        stdio: "inherit",
      });
      child.once("error", (err) => {
        reject(new CommandError(command, args, 127, err.message));
      });
      child.once("close", (code, signal) => {
        if (code === 0) {
          resolve({ command, args, exitCode: 0 });
          return;
        }
        if (signal !== null) {
          reject(new CommandError(command, args, signalExitCode(signal), `terminated by ${signal}`));
          return;
        }
        if (code === null) {
          reject(new CommandError(command, args, 1));
          return;
        }
        reject(new CommandError(command, args, code));
      });
    });
  },
};
