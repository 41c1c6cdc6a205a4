import { afterEach, describe, expect, it, vi } from "vitest";
import type { GeneratorDefaults } from "../config/defaults.js";
import { runExample } from "./example.js";

const defaults: GeneratorDefaults = {
  validLifetime: 4000,
  leaseType: "memfile",
  leasePersist: true,
  leaseName: "/var/lib/kea/dhcp4.leases",
  jsonIndent: 2,
};

describe("runExample", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the demonstration configuration", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(runExample({ indent: 0 }, defaults)).toBe(0);
    expect(log).toHaveBeenCalledWith(
      '{"Dhcp4":{"valid-lifetime":4000,' +
        '"interfaces-config":{"interfaces":["aaa","bbb"]},' +
        '"lease-database":{"type":"memfile","persist":true,"name":"/var/lib/kea/dhcp4.leases"},' +
        '"subnet4":[{"id":1,"subnet":"192.168.10.0/24","pools":[{"pool":"192.168.10.10 - 192.168.10.20"}]}],' +
        '"option-data":[{"name":"domain-name-servers","data":"192.0.2.1, 192.0.2.2","always-send":true}]}}'
    );
  });

  it("indents with the configured default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    runExample({}, { ...defaults, jsonIndent: 4 });

    expect(log.mock.calls[0]?.[0]).toMatch(/^\{\n {4}"Dhcp4": \{\n {8}"valid-lifetime": 4000,/);
  });
});
