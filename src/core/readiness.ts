import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../types/errors";
import type { DeployFile, Env } from "./config";
import { loadDeployFile, parseDeployFile, readCredentials, resolveConfigFile } from "./config";

export type GapSeverity = "error" | "warning";

export interface ReadinessGap {
  capability: string;
  reason: string;
  recommendation: string;
  severity: GapSeverity;
}

export interface ReadinessReport {
  gaps: ReadinessGap[];
  configFile?: string;
  webhookCount: number;
}

export interface AssessOptions {
  env?: Env;
  cwd?: string;
  configFile?: string;
  fileExists?: (p: string) => boolean; // injectable for tests
}

/**
 * Pre-flight check of everything a deploy needs. Never throws for bad
 * configuration; problems come back as gaps.
 */
export function assessReadiness(opts: AssessOptions = {}): ReadinessReport {
  const env = opts.env ?? {};
  const cwd = opts.cwd ?? process.cwd();
  const fileExists = opts.fileExists ?? fs.existsSync;
  const gaps: ReadinessGap[] = [];

  try {
    readCredentials(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    gaps.push({
      capability: "credentials",
      reason: err.message,
      recommendation: "Export PYPI_USERNAME and PYPI_PASSWORD before running the deploy.",
      severity: "error",
    });
  }

  let configFile: string | undefined;
  let file: DeployFile | undefined;
  try {
    configFile = resolveConfigFile({ configFile: opts.configFile, env, cwd });
    file = configFile ? loadDeployFile(configFile) : parseDeployFile({});
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    gaps.push({
      capability: "config",
      reason: err.message,
      recommendation: "Fix the deploy config file or point DEPLOY_CONFIG at a valid one.",
      severity: "error",
    });
  }

  if (file) {
    const baseDir = configFile ? path.dirname(configFile) : cwd;
    const setupScript = path.resolve(baseDir, file.package.cwd, file.package.setupScript);
    if (!fileExists(setupScript)) {
      gaps.push({
        capability: "setup-script",
        reason: `${setupScript} not found`,
        recommendation: "Run from the package root or set package.cwd / package.setupScript.",
        severity: "error",
      });
    }
    if (!file.webhooks.length) {
      gaps.push({
        capability: "webhooks",
        reason: "No rebuild webhooks configured",
        recommendation: "Add entries under webhooks: if downstream images should rebuild.",
        severity: "warning",
      });
    }
  }

  return { gaps, configFile, webhookCount: file?.webhooks.length ?? 0 };
}
