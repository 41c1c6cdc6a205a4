import { KeaConfig } from "@kea-confgen/generator";

/**
 * Demonstration configuration: the default service with one subnet,
 * one pool and DNS servers sent to every client
 */
export function buildExampleConfig(): KeaConfig {
  const config = new KeaConfig();
  const { subnet4, optionData } = config.dhcp4;

  const id = subnet4.addSubnet("192.168.10.0/24");
  subnet4.addPool(id, "192.168.10.10", "192.168.10.20");
  optionData.addAlways("domain-name-servers", "192.0.2.1, 192.0.2.2");

  return config;
}
