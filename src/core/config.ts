import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../types/errors";

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_FILE = "deploy.config.yml";
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 30_000;

export interface Credentials {
  username: string;
  password: string;
}

export interface IndexTarget {
  name: string; // section name in .pypirc
  repository: string;
}

export interface PackageSettings {
  python: string;
  setupScript: string;
  register: boolean; // run "setup.py register" before the upload
  cwd: string; // absolute
}

export interface WebhookTarget {
  service: string;
  url: string;
  timeoutMs: number;
  failOnHttpError: boolean; // treat a non-2xx response as a failed step
}

export interface DeployConfig {
  credentials: Credentials;
  index: IndexTarget;
  pypircPath: string; // absolute
  package: PackageSettings;
  webhooks: WebhookTarget[];
  configFile?: string; // file the settings were read from, if any
}

export interface LoadConfigOptions {
  env?: Env;
  configFile?: string;
  cwd?: string;
  home?: string;
}

const nonEmptyString = z.string().trim().min(1);

const webhookSchema = z.object({
  service: nonEmptyString,
  url: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), "webhook url must be http(s)"),
  timeoutMs: z.number().int().positive().default(DEFAULT_WEBHOOK_TIMEOUT_MS),
  failOnHttpError: z.boolean().default(false),
});

const deployFileSchema = z.object({
  index: z
    .object({
      name: nonEmptyString.regex(/^[A-Za-z0-9_.-]+$/, "index.name must be a plain section name").default("pypi"),
      repository: z.string().url().default("https://upload.pypi.org/legacy/"),
    })
    .default({}),
  pypirc: z
    .object({
      path: nonEmptyString.default("~/.pypirc"),
    })
    .default({}),
  package: z
    .object({
      python: nonEmptyString.default("python"),
      setupScript: nonEmptyString.default("setup.py"),
      register: z.boolean().default(true),
      cwd: nonEmptyString.default("."),
    })
    .default({}),
  webhooks: z
    .array(webhookSchema)
    .default([])
    .superRefine((hooks, ctx) => {
      const seen = new Set<string>();
      hooks.forEach((h, i) => {
        if (seen.has(h.service)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, "service"],
            message: `duplicate webhook service "${h.service}"`,
          });
        }
        seen.add(h.service);
      });
    }),
});

export type DeployFile = z.infer<typeof deployFileSchema>;

export function parseDeployFile(raw: unknown): DeployFile {
  // an empty YAML document loads as undefined
  const result = deployFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid deploy config: ${details}`);
  }
  return result.data;
}

export function expandHome(p: string, home: string): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}

export function readCredentials(env: Env): Credentials {
  const username = requiredSecret(env, "PYPI_USERNAME");
  const password = requiredSecret(env, "PYPI_PASSWORD");
  return { username, password };
}

function requiredSecret(env: Env, name: string): string {
  const value = env[name];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable ${name}`);
  }
  if (/[\r\n]/.test(value)) {
    throw new ConfigError(`${name} must not contain line breaks`);
  }
  return value;
}

/**
 * Locates the deploy config file: explicit option, then DEPLOY_CONFIG,
 * then deploy.config.yml in cwd when present. Explicitly named files must exist.
 */
export function resolveConfigFile(
  opts: { configFile?: string; env: Env; cwd: string },
): string | undefined {
  const named = opts.configFile || opts.env["DEPLOY_CONFIG"];
  if (named) {
    const abs = path.resolve(opts.cwd, named);
    if (!fs.existsSync(abs)) {
      throw new ConfigError(`Config file not found: ${abs}`);
    }
    return abs;
  }
  const fallback = path.join(opts.cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : undefined;
}

export function loadDeployFile(filePath: string): DeployFile {
  const content = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseDeployFile(parsed);
}

export function loadDeployConfig(opts: LoadConfigOptions = {}): DeployConfig {
  const env = opts.env ?? {};
  const cwd = opts.cwd ?? process.cwd();
  const home = opts.home ?? os.homedir();

  const credentials = readCredentials(env);
  const configFile = resolveConfigFile({ configFile: opts.configFile, env, cwd });
  const file = configFile ? loadDeployFile(configFile) : parseDeployFile({});
  const baseDir = configFile ? path.dirname(configFile) : cwd;

  const repository = env["PYPI_REPOSITORY_URL"] || file.index.repository;
  const pypircPath = env["PYPIRC_PATH"] || file.pypirc.path;

  return {
    credentials,
    index: { name: file.index.name, repository },
    pypircPath: path.resolve(cwd, expandHome(pypircPath, home)),
    package: {
      python: env["PYTHON"] || file.package.python,
      setupScript: file.package.setupScript,
      register: file.package.register,
      cwd: path.resolve(baseDir, file.package.cwd),
    },
    webhooks: file.webhooks.map((h) => ({ ...h })),
    configFile,
  };
}
