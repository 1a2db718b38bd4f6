import { z } from "zod";
import { ConfigurationError } from "../pipeline/errors";

const ENV_PREFIX = "REGISTRY_";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

export type LogLevel = z.infer<typeof LogLevelSchema>;

const BaseSettingsSchema = z.object({
  REGISTRY_BASE_URL: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.string().url("REGISTRY_BASE_URL must be a valid URL").optional()
  ),
  LOG_LEVEL: LogLevelSchema
});

export type BaseSettings = z.infer<typeof BaseSettingsSchema>;

export interface OrganizationSettings {
  organization: string;
  baseUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface SettingsCheck {
  organization: string;
  valid: boolean;
  missing: string[];
}

type Env = Record<string, string | undefined>;

export function organizationEnvKey(organization: string, field: "CLIENT_ID" | "CLIENT_SECRET"): string {
  return `${ENV_PREFIX}${organization.toUpperCase()}_${field}`;
}

export function loadBaseSettings(env: Env = process.env): BaseSettings {
  const result = BaseSettingsSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

/** LOG_LEVEL when it is a known level, "info" otherwise. */
export function readLogLevel(env: Env = process.env): LogLevel {
  const result = LogLevelSchema.safeParse(env.LOG_LEVEL);
  return result.success ? result.data : "info";
}

function readValue(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

export function checkOrganizationSettings(organization: string, env: Env = process.env): SettingsCheck {
  const keys = [
    `${ENV_PREFIX}BASE_URL`,
    organizationEnvKey(organization, "CLIENT_ID"),
    organizationEnvKey(organization, "CLIENT_SECRET")
  ];
  const missing = keys.filter((key) => readValue(env, key) === null);
  return { organization, valid: missing.length === 0, missing };
}

/**
 * Registry URL and client credentials for one organization. Every missing
 * variable is named in the ConfigurationError.
 */
export function loadOrganizationSettings(
  organization: string,
  env: Env = process.env
): OrganizationSettings {
  const base = loadBaseSettings(env);
  const check = checkOrganizationSettings(organization, env);
  const clientId = readValue(env, organizationEnvKey(organization, "CLIENT_ID"));
  const clientSecret = readValue(env, organizationEnvKey(organization, "CLIENT_SECRET"));

  if (!check.valid || !base.REGISTRY_BASE_URL || !clientId || !clientSecret) {
    throw new ConfigurationError(
      `Invalid settings for organization ${organization}: missing ${check.missing.join(", ")}`,
      check.missing
    );
  }

  return {
    organization,
    baseUrl: base.REGISTRY_BASE_URL,
    clientId,
    clientSecret
  };
}
