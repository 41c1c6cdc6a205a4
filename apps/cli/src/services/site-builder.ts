import { Dhcp4, KeaConfig, LeaseDatabase, formatPoolRange } from "@kea-confgen/generator";
import type { GeneratorDefaults } from "../config/defaults.js";
import type { SiteDefinition } from "../config/site.js";

export interface BuildResult {
  config: KeaConfig;
  /** Site entries that were dropped while building the model */
  warnings: string[];
}

/**
 * Build the configuration model for a site definition.
 * Settings the site leaves out come from the generator defaults.
 */
export function buildKeaConfig(site: SiteDefinition, defaults: GeneratorDefaults): BuildResult {
  const warnings: string[] = [];

  const dhcp4 = new Dhcp4({
    validLifetime: site.validLifetime ?? defaults.validLifetime,
    interfaces: site.interfaces,
    leaseDatabase: new LeaseDatabase(
      site.leaseDatabase?.type ?? defaults.leaseType,
      site.leaseDatabase?.persist ?? defaults.leasePersist,
      site.leaseDatabase?.name ?? defaults.leaseName
    ),
  });

  for (const subnet of site.subnets) {
    const id = dhcp4.subnet4.addSubnet(subnet.subnet);

    for (const pool of subnet.pools) {
      const range = formatPoolRange(pool.low, pool.high);
      if (dhcp4.subnet4.get(id)?.pools.has(range)) {
        warnings.push(`Duplicate pool ${range} in subnet ${subnet.subnet} ignored`);
        continue;
      }
      dhcp4.subnet4.addPool(id, pool.low, pool.high);
    }
  }

  for (const option of site.options) {
    const existing = dhcp4.optionData.get(option.name);
    if (existing) {
      warnings.push(
        `Option ${option.name} is already set to "${existing.data}", "${option.data}" ignored`
      );
      continue;
    }
    dhcp4.optionData.add(option.name, option.data, option.alwaysSend);
  }

  return { config: new KeaConfig(dhcp4), warnings };
}
