import type { KeaDocument, RenderResult } from "@kea-confgen/shared";
import { Dhcp4 } from "./dhcp4.js";

export const DEFAULT_VALID_LIFETIME = 4000;
export const DEFAULT_INTERFACES = ["aaa", "bbb"] as const;

/**
 * Root of a Kea configuration file, holding the DHCPv4 service
 */
export class KeaConfig {
  readonly dhcp4: Dhcp4;

  constructor(dhcp4?: Dhcp4) {
    this.dhcp4 =
      dhcp4 ??
      new Dhcp4({
        validLifetime: DEFAULT_VALID_LIFETIME,
        interfaces: DEFAULT_INTERFACES,
      });
  }

  render(): RenderResult<KeaDocument> {
    const result = this.dhcp4.render();
    const document: KeaDocument = { Dhcp4: result.document };

    if (!result.complete) {
      return { complete: false, document, diagnostic: result.diagnostic };
    }
    return { complete: true, document };
  }
}
