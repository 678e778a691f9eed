import type { CommandResult, CommandRunner } from "./command";
import type { PackageSettings } from "./config";
import type { Logger } from "./logger";

export interface PlannedCommand {
  command: string;
  args: string[];
}

export function packagingCommands(pkg: PackageSettings): PlannedCommand[] {
  const commands: PlannedCommand[] = [];
  if (pkg.register) {
    commands.push({ command: pkg.python, args: [pkg.setupScript, "register"] });
  }
  commands.push({
    command: pkg.python,
    args: [pkg.setupScript, "sdist", "bdist_wheel", "upload"],
  });
  return commands;
}

/**
 * Registers (optionally), builds sdist + wheel and uploads them.
 * Stops at the first failing command.
 */
export async function publishDistributions(
  runner: CommandRunner,
  pkg: PackageSettings,
  logger: Logger,
): Promise<CommandResult[]> {
  const results: CommandResult[] = [];
  for (const step of packagingCommands(pkg)) {
    logger.info(`running: ${[step.command, ...step.args].join(" ")}`);
    results.push(await runner.run(step.command, step.args, { cwd: pkg.cwd }));
  }
  return results;
}
