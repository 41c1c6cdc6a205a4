import type { InterfacesConfigFragment } from "@kea-confgen/shared";

/**
 * Network interfaces the DHCP server listens on.
 * Order is kept as given; replace the whole list to change it.
 */
export class InterfacesConfig {
  readonly interfaces: readonly string[];

  constructor(interfaces: readonly string[] = []) {
    this.interfaces = [...interfaces];
  }

  isEmpty(): boolean {
    return this.interfaces.length === 0;
  }

  render(): InterfacesConfigFragment {
    return { interfaces: [...this.interfaces] };
  }
}
