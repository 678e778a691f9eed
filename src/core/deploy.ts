import os from "node:os";
import type { CommandResult, CommandRunner } from "./command";
import { spawnRunner } from "./command";
import type { DeployConfig } from "./config";
import type { Logger } from "./logger";
import { consoleLogger } from "./logger";
import type { PlannedCommand } from "./packaging";
import { packagingCommands, publishDistributions } from "./packaging";
import { renderPypirc, withPypirc } from "./pypirc";
import type { FetchLike, WebhookResult } from "./webhooks";
import { triggerRebuilds } from "./webhooks";

export interface DeployDeps {
  runner?: CommandRunner;
  fetch?: FetchLike;
  logger?: Logger;
  home?: string; // only used to shorten paths in log output
}

export interface DeployOptions {
  dryRun?: boolean;
}

export interface DeployPlan {
  pypircPath: string;
  index: string;
  commands: PlannedCommand[];
  webhooks: string[];
}

export interface DeployReport {
  dryRun: boolean;
  pypircPath: string;
  commands: CommandResult[];
  webhooks: WebhookResult[];
}

export function planDeploy(config: DeployConfig): DeployPlan {
  return {
    pypircPath: config.pypircPath,
    index: `${config.index.name} (${config.index.repository})`,
    commands: packagingCommands(config.package),
    webhooks: config.webhooks.map((h) => h.service),
  };
}

/**
 * Credentials file -> register/build/upload -> rebuild webhooks, strictly in that
 * order. The first failure propagates; nothing already done is undone except the
 * credentials file, which only exists while packaging runs.
 */
export async function runDeploy(
  config: DeployConfig,
  deps: DeployDeps = {},
  opts: DeployOptions = {},
): Promise<DeployReport> {
  const logger = deps.logger ?? consoleLogger;
  const runner = deps.runner ?? spawnRunner;
  const home = deps.home ?? os.homedir();

  if (opts.dryRun) {
    const plan = planDeploy(config);
    logger.info(`dry run: would write ${displayPath(plan.pypircPath, home)} for ${plan.index}`);
    for (const c of plan.commands) {
      logger.info(`dry run: would run ${[c.command, ...c.args].join(" ")}`);
    }
    logger.info(
      plan.webhooks.length
        ? `dry run: would trigger ${plan.webhooks.join(", ")}`
        : "dry run: no webhooks configured",
    );
    return { dryRun: true, pypircPath: config.pypircPath, commands: [], webhooks: [] };
  }

  logger.info(`writing credentials to ${displayPath(config.pypircPath, home)}`);
  const commands = await withPypirc(
    config.pypircPath,
    renderPypirc(config.credentials, config.index),
    () => publishDistributions(runner, config.package, logger),
  );

  const webhooks = await triggerRebuilds(config.webhooks, {
    fetch: deps.fetch,
    logger,
  });
  logger.info(`deploy completed (${commands.length} commands, ${webhooks.length} webhooks)`);
  return { dryRun: false, pypircPath: config.pypircPath, commands, webhooks };
}

function displayPath(p: string, home: string): string {
  return p.startsWith(home + "/") ? "~" + p.slice(home.length) : p;
}
