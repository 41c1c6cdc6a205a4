import { describe, expect, it } from "vitest";
import { LeaseDatabase } from "./lease-database.js";

describe("LeaseDatabase", () => {
  it("defaults to a persistent memfile store", () => {
    const db = new LeaseDatabase();

    expect(db.isValid()).toBe(true);
    expect(db.render()).toEqual({
      type: "memfile",
      persist: true,
      name: "/var/lib/kea/dhcp4.leases",
    });
  });

  it("requires both type and name", () => {
    expect(new LeaseDatabase("", true, "/tmp/leases.db").isValid()).toBe(false);
    expect(new LeaseDatabase("memfile", true, "").isValid()).toBe(false);
    expect(new LeaseDatabase("", false, "").isValid()).toBe(false);
  });

  it("does not consider persist for validity", () => {
    expect(new LeaseDatabase("mysql", false, "kea").isValid()).toBe(true);
  });

  it("renders keys in type, persist, name order", () => {
    const fragment = new LeaseDatabase("mysql", false, "kea").render();

    expect(Object.keys(fragment)).toEqual(["type", "persist", "name"]);
    expect(fragment).toEqual({ type: "mysql", persist: false, name: "kea" });
  });
});
