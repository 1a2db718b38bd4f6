import { listOrganizations } from "../config/registry";
import { SettingsCheck, checkOrganizationSettings, readLogLevel } from "../config/settings";
import { Logger, makeLogger } from "../logging/logger";

export interface OrganizationStatus extends SettingsCheck {
  description: string;
  draft: boolean;
}

export interface OrganizationsCommandOptions {
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export function runOrganizationsCommand(options: OrganizationsCommandOptions = {}): OrganizationStatus[] {
  const logger = options.logger ?? makeLogger({ command: "organizations" }, readLogLevel(options.env));

  return listOrganizations().map((entry) => {
    const check = checkOrganizationSettings(entry.organization, options.env);
    for (const key of check.missing) {
      logger.warn({ organization: entry.organization, variable: key }, `Missing setting ${key}`);
    }
    return { ...check, description: entry.description, draft: entry.draft };
  });
}

export function formatOrganizations(statuses: OrganizationStatus[]): string {
  return statuses
    .map((status) => {
      const state = status.valid ? "ready" : `missing ${status.missing.join(", ")}`;
      const mode = status.draft ? "draft" : "published";
      return `${status.organization}\t${mode}\t${state}\t${status.description}`;
    })
    .join("\n");
}
