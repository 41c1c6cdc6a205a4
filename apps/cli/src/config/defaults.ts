import { z } from "zod";
import {
  DEFAULT_LEASE_NAME,
  DEFAULT_LEASE_TYPE,
  DEFAULT_VALID_LIFETIME,
} from "@kea-confgen/generator";
import { ConfigError, formatIssues } from "./errors.js";

/**
 * Values used when a site file leaves a setting out
 */
export interface GeneratorDefaults {
  validLifetime: number;
  leaseType: string;
  leasePersist: boolean;
  leaseName: string;
  jsonIndent: number;
}

const BooleanFlagSchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const DefaultsEnvSchema = z.object({
  KEA_VALID_LIFETIME: z.coerce.number().int().nonnegative().default(DEFAULT_VALID_LIFETIME),
  KEA_LEASE_TYPE: z.string().default(DEFAULT_LEASE_TYPE),
  KEA_LEASE_PERSIST: BooleanFlagSchema.default("true"),
  KEA_LEASE_NAME: z.string().default(DEFAULT_LEASE_NAME),
  KEA_JSON_INDENT: z.coerce.number().int().min(0).max(10).default(2),
});

let cachedDefaults: GeneratorDefaults | null = null;

/**
 * Read generator defaults from environment variables
 */
export function loadGeneratorDefaults(
  env: Record<string, string | undefined> = process.env
): GeneratorDefaults {
  const result = DefaultsEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment configuration:\n${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  return {
    validLifetime: parsed.KEA_VALID_LIFETIME,
    leaseType: parsed.KEA_LEASE_TYPE,
    leasePersist: parsed.KEA_LEASE_PERSIST,
    leaseName: parsed.KEA_LEASE_NAME,
    jsonIndent: parsed.KEA_JSON_INDENT,
  };
}

/**
 * Get the generator defaults for this process
 */
export function getGeneratorDefaults(): GeneratorDefaults {
  if (!cachedDefaults) {
    cachedDefaults = loadGeneratorDefaults();
  }
  return cachedDefaults;
}

/**
 * Re-read generator defaults from the environment
 */
export function reloadGeneratorDefaults(): void {
  cachedDefaults = loadGeneratorDefaults();
}
