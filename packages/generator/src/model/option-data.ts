import type { OptionFragment } from "@kea-confgen/shared";
import { compareStrings } from "./compare.js";

/**
 * A DHCP option advertised to clients
 */
export interface DhcpOption {
  /** Option name (e.g., "domain-name-servers") */
  name: string;
  /** Option value (e.g., "192.0.2.1, 192.0.2.2") */
  data: string;
  /** Send even when the client did not request it */
  alwaysSend: boolean;
}

/**
 * Options keyed by name. The first value added for a name is kept;
 * later adds with the same name are ignored.
 */
export class OptionData {
  private options = new Map<string, DhcpOption>();

  add(name: string, data: string, alwaysSend = false): void {
    if (this.options.has(name)) {
      return;
    }
    this.options.set(name, { name, data, alwaysSend });
  }

  /**
   * Add an option that is sent with every response
   */
  addAlways(name: string, data: string): void {
    this.add(name, data, true);
  }

  get(name: string): Readonly<DhcpOption> | undefined {
    const option = this.options.get(name);
    return option ? { ...option } : undefined;
  }

  get size(): number {
    return this.options.size;
  }

  isEmpty(): boolean {
    return this.options.size === 0;
  }

  render(): OptionFragment[] {
    return Array.from(this.options.values())
      .sort((a, b) => compareStrings(a.name, b.name))
      .map((option) => ({
        name: option.name,
        data: option.data,
        "always-send": option.alwaysSend,
      }));
  }
}
