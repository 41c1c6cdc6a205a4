export { InterfacesConfig } from "./model/interfaces-config.js";
export {
  LeaseDatabase,
  DEFAULT_LEASE_NAME,
  DEFAULT_LEASE_PERSIST,
  DEFAULT_LEASE_TYPE,
} from "./model/lease-database.js";
export { OptionData, type DhcpOption } from "./model/option-data.js";
export {
  Subnet4,
  formatPoolRange,
  type SubnetDefinition,
} from "./model/subnet4.js";
export {
  Dhcp4,
  INVALID_LEASE_DATABASE,
  MISSING_INTERFACES,
  MISSING_SUBNETS,
  type Dhcp4Options,
} from "./model/dhcp4.js";
export {
  KeaConfig,
  DEFAULT_INTERFACES,
  DEFAULT_VALID_LIFETIME,
} from "./model/kea-config.js";
