import { BrestIntegration } from "../integrations/coBrest/integration";
import { SarthesIntegration } from "../integrations/dpSarthes/integration";
import type { CleanDataSource } from "../pipeline/integration";
import type { Logger } from "../logging/logger";
import { ConfigurationError } from "../pipeline/errors";

export interface OrganizationEntry {
  organization: string;
  description: string;
  /** Whether regulations are submitted as drafts. */
  draft: boolean;
  create: (logger: Logger) => CleanDataSource;
}

const ORGANIZATIONS: OrganizationEntry[] = [
  {
    organization: "co_brest",
    description: "Brest métropole permanent traffic orders (zipped shapefile)",
    draft: false,
    create: (logger) => new BrestIntegration({ draft: false, logger })
  },
  {
    organization: "dp_sarthes",
    description: "Sarthe department speed limits (CSV export)",
    draft: true,
    create: (logger) => new SarthesIntegration({ draft: true, logger })
  }
];

export function listOrganizations(): OrganizationEntry[] {
  return [...ORGANIZATIONS];
}

export function getOrganization(organization: string): OrganizationEntry | undefined {
  return ORGANIZATIONS.find((entry) => entry.organization === organization);
}

export function createIntegration(organization: string, logger: Logger): CleanDataSource {
  const entry = getOrganization(organization);
  if (!entry) {
    const known = ORGANIZATIONS.map((item) => item.organization).join(", ");
    throw new ConfigurationError(`Unknown organization ${organization} (known: ${known})`);
  }
  return entry.create(logger);
}
