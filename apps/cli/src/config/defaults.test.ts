import { describe, expect, it } from "vitest";
import { loadGeneratorDefaults } from "./defaults.js";
import { ConfigError } from "./errors.js";

describe("loadGeneratorDefaults", () => {
  it("falls back to built-in values", () => {
    expect(loadGeneratorDefaults({})).toEqual({
      validLifetime: 4000,
      leaseType: "memfile",
      leasePersist: true,
      leaseName: "/var/lib/kea/dhcp4.leases",
      jsonIndent: 2,
    });
  });

  it("reads values from the environment", () => {
    expect(
      loadGeneratorDefaults({
        KEA_VALID_LIFETIME: "86400",
        KEA_LEASE_TYPE: "mysql",
        KEA_LEASE_PERSIST: "false",
        KEA_LEASE_NAME: "kea",
        KEA_JSON_INDENT: "4",
      })
    ).toEqual({
      validLifetime: 86400,
      leaseType: "mysql",
      leasePersist: false,
      leaseName: "kea",
      jsonIndent: 4,
    });
  });

  it("rejects malformed values", () => {
    expect(() => loadGeneratorDefaults({ KEA_VALID_LIFETIME: "soon" })).toThrow(ConfigError);
    expect(() => loadGeneratorDefaults({ KEA_LEASE_PERSIST: "yes" })).toThrow(
      /^Invalid environment configuration:\nKEA_LEASE_PERSIST: /
    );
  });
});
