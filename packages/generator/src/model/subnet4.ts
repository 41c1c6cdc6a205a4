import type { Subnet4Fragment } from "@kea-confgen/shared";
import { compareStrings } from "./compare.js";

/**
 * Read-only view of a registered subnet
 */
export interface SubnetDefinition {
  readonly id: number;
  /** Subnet in CIDR notation (e.g., "192.168.1.0/24") */
  readonly subnet: string;
  /** Pool ranges, keyed by their "<low> - <high>" text */
  readonly pools: ReadonlySet<string>;
}

interface SubnetEntry {
  id: number;
  subnet: string;
  pools: Set<string>;
}

/**
 * Build the textual range Kea expects for a pool
 */
export function formatPoolRange(low: string, high: string): string {
  return `${low} - ${high}`;
}

/**
 * IPv4 subnets and their address pools.
 * Ids are handed out from a counter starting at 1 and never reused.
 */
export class Subnet4 {
  private subnets = new Map<number, SubnetEntry>();
  private counter = 1;

  /**
   * Register a subnet and return the id assigned to it
   */
  addSubnet(subnet: string): number {
    const id = this.counter++;
    this.subnets.set(id, { id, subnet, pools: new Set() });
    return id;
  }

  /**
   * Add a pool to an existing subnet.
   * Returns false, changing nothing, when no subnet has this id.
   * Adding a range the subnet already has is a no-op.
   */
  addPool(id: number, low: string, high: string): boolean {
    const entry = this.subnets.get(id);
    if (!entry) {
      return false;
    }
    entry.pools.add(formatPoolRange(low, high));
    return true;
  }

  /**
   * Snapshot of a subnet; changing it does not affect the registry
   */
  get(id: number): SubnetDefinition | undefined {
    const entry = this.subnets.get(id);
    if (!entry) {
      return undefined;
    }
    return { id: entry.id, subnet: entry.subnet, pools: new Set(entry.pools) };
  }

  /**
   * The id the next call to addSubnet will return
   */
  get nextId(): number {
    return this.counter;
  }

  get size(): number {
    return this.subnets.size;
  }

  isEmpty(): boolean {
    return this.subnets.size === 0;
  }

  /**
   * Subnets in ascending id order. Pools sort by their range text,
   * not by address value.
   */
  render(): Subnet4Fragment[] {
    return Array.from(this.subnets.values())
      .sort((a, b) => a.id - b.id)
      .map((entry) => ({
        id: entry.id,
        subnet: entry.subnet,
        pools: Array.from(entry.pools)
          .sort(compareStrings)
          .map((range) => ({ pool: range })),
      }));
  }
}
