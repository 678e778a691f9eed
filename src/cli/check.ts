#!/usr/bin/env node
import { assessReadiness } from "../core/readiness";
import { exitCodeFor, parseArgs, stringFlag } from "./shared";

async function main() {
  const { flags } = parseArgs(process.argv.slice(2));
  const report = assessReadiness({
    env: process.env,
    configFile: stringFlag(flags, "config"),
  });
  if (report.configFile) {
    console.log(`Config: ${report.configFile}`);
  }
  console.log(`Webhooks configured: ${report.webhookCount}`);
  if (report.gaps.length) {
    console.log("Readiness gaps:");
    for (const g of report.gaps) {
      console.log(`- [${g.severity}] ${g.capability}: ${g.reason} -> ${g.recommendation}`);
    }
  } else {
    console.log("No readiness gaps detected.");
  }
  if (report.gaps.some((g) => g.severity === "error")) {
    process.exitCode = 1;
  }
}
main().catch((e) => {
  console.error(e);
  process.exit(exitCodeFor(e));
});
