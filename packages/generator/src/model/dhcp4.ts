import type {
  Dhcp4Fragment,
  RenderDiagnostic,
  RenderResult,
} from "@kea-confgen/shared";
import { InterfacesConfig } from "./interfaces-config.js";
import { LeaseDatabase } from "./lease-database.js";
import { OptionData } from "./option-data.js";
import { Subnet4 } from "./subnet4.js";

export interface Dhcp4Options {
  /**
   * Default lease duration in seconds. Must be a non-negative integer;
   * it is written as given, and NaN or Infinity would serialize as null.
   */
  validLifetime: number;
  interfaces?: readonly string[];
  leaseDatabase?: LeaseDatabase;
}

export const MISSING_INTERFACES: Readonly<RenderDiagnostic> = Object.freeze({
  code: "missing-interfaces",
  section: "interfaces-config",
  message: "interfaces-config is empty",
});

export const INVALID_LEASE_DATABASE: Readonly<RenderDiagnostic> = Object.freeze({
  code: "invalid-lease-database",
  section: "lease-database",
  message: "lease-database needs both a type and a name",
});

export const MISSING_SUBNETS: Readonly<RenderDiagnostic> = Object.freeze({
  code: "missing-subnets",
  section: "subnet4",
  message: "subnet4 has no subnets",
});

/**
 * DHCPv4 service configuration
 */
export class Dhcp4 {
  validLifetime: number;
  interfacesConfig: InterfacesConfig;
  leaseDatabase: LeaseDatabase;
  readonly subnet4 = new Subnet4();
  readonly optionData = new OptionData();

  constructor(options: Dhcp4Options) {
    this.validLifetime = options.validLifetime;
    this.interfacesConfig = new InterfacesConfig(options.interfaces);
    this.leaseDatabase = options.leaseDatabase ?? new LeaseDatabase();
  }

  /**
   * Every structural problem in the configuration, in rendering order.
   * Unlike render(), this does not stop at the first one.
   */
  validate(): RenderDiagnostic[] {
    const problems: RenderDiagnostic[] = [];
    if (this.interfacesConfig.isEmpty()) {
      problems.push(MISSING_INTERFACES);
    }
    if (!this.leaseDatabase.isValid()) {
      problems.push(INVALID_LEASE_DATABASE);
    }
    if (this.subnet4.isEmpty()) {
      problems.push(MISSING_SUBNETS);
    }
    return problems;
  }

  /**
   * Render the service section by section. Interfaces, lease database and
   * subnets are required in that order: the first one missing ends
   * rendering and the partial document comes back with a diagnostic.
   * Options are left out when there are none.
   */
  render(): RenderResult<Dhcp4Fragment> {
    const document: Dhcp4Fragment = {
      "valid-lifetime": this.validLifetime,
    };

    if (this.interfacesConfig.isEmpty()) {
      return { complete: false, document, diagnostic: MISSING_INTERFACES };
    }
    document["interfaces-config"] = this.interfacesConfig.render();

    if (!this.leaseDatabase.isValid()) {
      return { complete: false, document, diagnostic: INVALID_LEASE_DATABASE };
    }
    document["lease-database"] = this.leaseDatabase.render();

    if (this.subnet4.isEmpty()) {
      return { complete: false, document, diagnostic: MISSING_SUBNETS };
    }
    document.subnet4 = this.subnet4.render();

    if (!this.optionData.isEmpty()) {
      document["option-data"] = this.optionData.render();
    }

    return { complete: true, document };
  }
}
