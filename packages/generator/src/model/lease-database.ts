import type { LeaseDatabaseFragment } from "@kea-confgen/shared";

export const DEFAULT_LEASE_TYPE = "memfile";
export const DEFAULT_LEASE_PERSIST = true;
export const DEFAULT_LEASE_NAME = "/var/lib/kea/dhcp4.leases";

/**
 * Where and how the server stores its leases
 */
export class LeaseDatabase {
  constructor(
    /** Backend identifier (e.g., "memfile", "mysql") */
    readonly type: string = DEFAULT_LEASE_TYPE,
    /** Keep leases across restarts */
    readonly persist: boolean = DEFAULT_LEASE_PERSIST,
    /** File path or connection string */
    readonly name: string = DEFAULT_LEASE_NAME
  ) {}

  /**
   * Both the backend type and its location are required; persist is not.
   */
  isValid(): boolean {
    return this.type !== "" && this.name !== "";
  }

  render(): LeaseDatabaseFragment {
    return {
      type: this.type,
      persist: this.persist,
      name: this.name,
    };
  }
}
