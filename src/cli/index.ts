#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runIntegrateCommand } from "../commands/integrate";
import { runPublishCommand } from "../commands/publish";
import { formatOrganizations, runOrganizationsCommand } from "../commands/organizations";
import { integrationExitCode, publishExitCode, summarizeIntegration } from "../pipeline/report";
import { PipelineError, errorMessage } from "../pipeline/errors";
import { makeLogger } from "../logging/logger";
import { readLogLevel } from "../config/settings";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.REGSYNC_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

interface IntegrateCliOptions {
  out?: string;
  identifierSuffix?: string;
  dryRun?: boolean;
}

const program = new Command();

program
  .name("regsync")
  .description("Feed open-data traffic regulations into the national regulation registry")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides REGSYNC_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("integrate")
  .description("Fetch, clean and submit the regulations of one organization")
  .argument("<organization>", "Organization key (see `regsync organizations`)")
  .option("--out <dir>", "Keep the raw download and run_report.json under this directory")
  .option("--identifier-suffix <suffix>", "Suffix appended to every regulation identifier")
  .option("--dry-run", "Diff against the registry without submitting anything", false)
  .action(async (organization: string, opts: IntegrateCliOptions) => {
    const report = await runIntegrateCommand({
      organization,
      outDir: opts.out ?? null,
      identifierSuffix: opts.identifierSuffix,
      dryRun: opts.dryRun
    });
    console.log(JSON.stringify(summarizeIntegration(report), null, 2));
    process.exitCode = integrationExitCode(report);
  });

program
  .command("publish")
  .description("Publish every regulation the organization has in the registry")
  .argument("<organization>", "Organization key")
  .action(async (organization: string) => {
    const report = await runPublishCommand({ organization });
    console.log(
      JSON.stringify(
        { organization, succeeded: report.succeeded, failed: report.failed, total: report.total },
        null,
        2
      )
    );
    process.exitCode = publishExitCode(report);
  });

program
  .command("organizations")
  .description("List registered organizations and whether their settings are complete")
  .action(() => {
    console.log(formatOrganizations(runOrganizationsCommand()));
  });

program.parseAsync().catch((error: unknown) => {
  const logger = makeLogger({ command: "cli" }, readLogLevel());
  logger.error(
    { stage: error instanceof PipelineError ? error.stage : null, err: error },
    errorMessage(error)
  );
  process.exitCode = 1;
});
