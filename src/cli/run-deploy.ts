#!/usr/bin/env node
import { loadDeployConfig } from "../core/config";
import { runDeploy } from "../core/deploy";
import { consoleLogger } from "../core/logger";
import { exitCodeFor, parseArgs, stringFlag } from "./shared";

const USAGE = "usage: pypi-deploy [--config <file>] [--dry-run] [--skip-register]";

async function main() {
  const { flags } = parseArgs(process.argv.slice(2));
  if (flags["help"]) {
    console.log(USAGE);
    return;
  }
  const config = loadDeployConfig({
    env: process.env,
    configFile: stringFlag(flags, "config"),
  });
  if (flags["skip-register"]) {
    config.package.register = false;
  }
  await runDeploy(config, { logger: consoleLogger }, { dryRun: flags["dry-run"] === true });
}
main().catch((err) => {
  consoleLogger.error(`failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(exitCodeFor(err));
});
