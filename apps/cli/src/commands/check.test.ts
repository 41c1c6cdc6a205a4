import chalk from "chalk";
import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { GeneratorDefaults } from "../config/defaults.js";
import { fixturePath } from "../../test/fixtures.js";
import { runCheck } from "./check.js";

const defaults: GeneratorDefaults = {
  validLifetime: 4000,
  leaseType: "memfile",
  leasePersist: true,
  leaseName: "/var/lib/kea/dhcp4.leases",
  jsonIndent: 2,
};

describe("runCheck", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits 0 for a complete site", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const path = fixturePath("site.yaml");

    expect(runCheck(path, defaults)).toBe(0);
    expect(log).toHaveBeenCalledWith(`✓ ${path} renders a complete configuration`);
  });

  it("lists every problem and exits 1", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(runCheck(fixturePath("empty-service.yaml"), defaults)).toBe(1);
    expect(error.mock.calls).toEqual([
      ["✖ interfaces-config is empty [missing-interfaces]"],
      ["✖ lease-database needs both a type and a name [invalid-lease-database]"],
      ["✖ subnet4 has no subnets [missing-subnets]"],
    ]);
  });

  it("exits 1 for an invalid site file", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(runCheck(fixturePath("invalid.yaml"), defaults)).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "Error:",
      expect.stringMatching(/^Invalid site definition in /)
    );
  });
});
