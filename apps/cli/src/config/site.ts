import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, formatIssues } from "./errors.js";

const PoolSchema = z.object({
  low: z.string().min(1),
  high: z.string().min(1),
});

const SubnetSchema = z.object({
  subnet: z.string().min(1),
  pools: z.array(PoolSchema).default([]),
});

const OptionSchema = z.object({
  name: z.string().min(1),
  // YAML turns values like 3600 or true into scalars other than strings
  data: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  alwaysSend: z.boolean().default(false),
});

const LeaseDatabaseSchema = z.object({
  type: z.string().optional(),
  persist: z.boolean().optional(),
  name: z.string().optional(),
});

const SiteDefinitionSchema = z
  .object({
    validLifetime: z.number().int().nonnegative().optional(),
    interfaces: z.array(z.string()).default([]),
    leaseDatabase: LeaseDatabaseSchema.optional(),
    subnets: z.array(SubnetSchema).default([]),
    options: z.array(OptionSchema).default([]),
  })
  .strict();

/**
 * Description of one DHCPv4 service, as written in a site file
 */
export type SiteDefinition = z.infer<typeof SiteDefinitionSchema>;

/**
 * Parse a site definition from YAML (or JSON) text
 */
export function parseSiteDefinition(content: string, source = "<input>"): SiteDefinition {
  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: source });
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = SiteDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid site definition in ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load and validate a site file from disk
 */
export function loadSiteFile(filePath: string): SiteDefinition {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read site file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseSiteDefinition(content, filePath);
}
