import { getOrganization } from "../config/registry";
import { loadBaseSettings, loadOrganizationSettings } from "../config/settings";
import { HttpRegistryClient } from "../registry/client";
import type { RegulationRegistry } from "../registry/registry";
import { IntegrationRunner } from "../pipeline/runner";
import { PublishReport } from "../pipeline/report";
import { ConfigurationError } from "../pipeline/errors";
import { Logger, makeLogger } from "../logging/logger";

export interface PublishCommandOptions {
  organization: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  registry?: RegulationRegistry;
}

export async function runPublishCommand(options: PublishCommandOptions): Promise<PublishReport> {
  if (!getOrganization(options.organization)) {
    throw new ConfigurationError(`Unknown organization ${options.organization}`);
  }
  const base = loadBaseSettings(options.env);
  const logger =
    options.logger ?? makeLogger({ organization: options.organization, command: "publish" }, base.LOG_LEVEL);
  const settings = loadOrganizationSettings(options.organization, options.env);
  const registry = options.registry ?? new HttpRegistryClient(settings);

  const runner = new IntegrationRunner({ registry, organization: options.organization, logger });
  return runner.publishAll();
}
