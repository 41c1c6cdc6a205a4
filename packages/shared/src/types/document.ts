/**
 * Listening interfaces section of a Dhcp4 document
 */
export interface InterfacesConfigFragment {
  interfaces: string[];
}

/**
 * Lease storage section of a Dhcp4 document
 */
export interface LeaseDatabaseFragment {
  /** Backend identifier (e.g., "memfile", "mysql") */
  type: string;
  persist: boolean;
  /** File path or connection string for the backend */
  name: string;
}

/**
 * A single address pool, written as "<low> - <high>"
 */
export interface PoolFragment {
  pool: string;
}

/**
 * A subnet entry in the subnet4 list
 */
export interface Subnet4Fragment {
  id: number;
  subnet: string;
  pools: PoolFragment[];
}

/**
 * A single entry in the option-data list
 */
export interface OptionFragment {
  name: string;
  data: string;
  "always-send": boolean;
}

/**
 * Rendered DHCPv4 service.
 * Sections after valid-lifetime are present only when rendering reached them.
 */
export interface Dhcp4Fragment {
  "valid-lifetime": number;
  "interfaces-config"?: InterfacesConfigFragment;
  "lease-database"?: LeaseDatabaseFragment;
  subnet4?: Subnet4Fragment[];
  "option-data"?: OptionFragment[];
}

/**
 * Top-level document consumed by the Kea DHCPv4 server
 */
export interface KeaDocument {
  Dhcp4: Dhcp4Fragment;
}
