import { describe, expect, it } from "vitest";
import { ipv4NetworkObject, ipv4NetworkSchema, ipv6NetworkObject, ipv6NetworkSchema, withReturnFields } from "./objects.ts";

describe("return fields", () => {
  it("requests extattrs and utilization for IPv4 networks", () => {
    expect(ipv4NetworkObject).toEqual({
      objectType: "network",
      returnFields: ["network", "network_view", "comment", "utilization", "extattrs"],
    });
  });

  it("requests extattrs for IPv6 networks", () => {
    expect(ipv6NetworkObject).toEqual({
      objectType: "ipv6network",
      returnFields: ["network", "network_view", "comment", "extattrs"],
    });
  });

  it("does not repeat a field that is already requested", () => {
    expect(withReturnFields(ipv6NetworkObject, "extattrs", "members").returnFields).toEqual([
      "network",
      "network_view",
      "comment",
      "extattrs",
      "members",
    ]);
  });
});

describe("network schemas", () => {
  it("unwraps extensible attribute values", () => {
    const network = ipv4NetworkSchema.parse({
      _ref: "network/abc",
      network: "10.0.0.0/24",
      network_view: "default",
      extattrs: { Site: { value: "HQ" }, Tags: { value: ["a", "b"], inheritance_source: { _ref: "x" } } },
      utilization: 42,
    });

    expect(network).toEqual({
      ref: "network/abc",
      network: "10.0.0.0/24",
      networkView: "default",
      comment: undefined,
      ea: { Site: "HQ", Tags: ["a", "b"] },
      utilization: 42,
    });
  });

  it("decodes the shared network fields the same way for both families", () => {
    const wire = {
      _ref: "network/abc",
      network: "10.0.0.0/24",
      network_view: "lab",
      comment: "rack 4",
      extattrs: { Site: { value: "HQ" } },
    };
    const { utilization, ...shared } = ipv4NetworkSchema.parse({ ...wire, utilization: 10 });

    expect(utilization).toBe(10);
    expect(shared).toEqual(ipv6NetworkSchema.parse(wire));
    expect(shared).toEqual({
      ref: "network/abc",
      network: "10.0.0.0/24",
      networkView: "lab",
      comment: "rack 4",
      ea: { Site: "HQ" },
    });
  });

  it("treats missing utilization as 0", () => {
    expect(ipv4NetworkSchema.parse({ _ref: "network/abc" }).utilization).toBe(0);
  });

  it("rejects utilization above 1000", () => {
    expect(ipv4NetworkSchema.safeParse({ _ref: "network/abc", utilization: 1001 }).success).toBe(false);
  });

  it("requires a reference", () => {
    expect(ipv6NetworkSchema.safeParse({ network: "2001:db8::/64" }).success).toBe(false);
  });
});
