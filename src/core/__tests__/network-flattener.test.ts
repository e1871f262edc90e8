import { flattenNetwork, networkKey } from "../network-flattener";

describe("flattenNetwork", () => {
  test("keys same-named bridges on two nodes apart", () => {
    const result = flattenNetwork({
      nodeA: { bridges: { br0: { ports: ["eno1"] } } },
      nodeB: { bridges: { br0: { vlan_aware: true } } },
    });

    expect(Object.keys(result.bridges)).toEqual(["nodeA_br0", "nodeB_br0"]);
    expect(result.bridges.nodeA_br0).toEqual({ ports: ["eno1"], target_node: "nodeA", name: "br0" });
    expect(result.bridges.nodeB_br0).toEqual({ vlan_aware: true, target_node: "nodeB", name: "br0" });
    expect(result.violations).toEqual([]);
  });

  test("flattens each kind on its own", () => {
    const result = flattenNetwork({
      pve: {
        bonds: { uplink: { interfaces: ["eno1", "eno2"], mode: "802.3ad" } },
        vlans: { uplink: { interface: "vmbr0", vlan_id: 20 } },
        bridges: { uplink: {} },
      },
    });

    expect(result.bonds).toEqual({
      pve_uplink: { interfaces: ["eno1", "eno2"], mode: "802.3ad", target_node: "pve", name: "uplink" },
    });
    expect(result.vlans).toEqual({
      pve_uplink: { interface: "vmbr0", vlan_id: 20, target_node: "pve", name: "uplink" },
    });
    expect(result.bridges).toEqual({ pve_uplink: { target_node: "pve", name: "uplink" } });
  });

  test("treats missing kinds as empty", () => {
    const result = flattenNetwork({ pve: {} });

    expect(result).toEqual({ bonds: {}, vlans: {}, bridges: {}, violations: [] });
  });

  test("reports a composite key claimed by two nodes and keeps the first", () => {
    const result = flattenNetwork({
      a_b: { bridges: { c: { comment: "second" } } },
      a: { bridges: { b_c: { comment: "first" } } },
    });

    expect(result.bridges).toEqual({ a_b_c: { comment: "first", target_node: "a", name: "b_c" } });
    expect(result.violations).toEqual([{
      path: "network.a_b.bridges.c",
      rule: "duplicate-network-key",
      value: "a_b_c",
      message: 'flattened key "a_b_c" is already taken by network.a.bridges.b_c',
    }]);
  });

  test("does not mutate its input", () => {
    const bridge = { mtu: 1500 };
    flattenNetwork({ pve: { bridges: { vmbr0: bridge } } });

    expect(bridge).toEqual({ mtu: 1500 });
  });
});

test("networkKey joins node and element name", () => {
  expect(networkKey("pve-1", "vmbr0")).toBe("pve-1_vmbr0");
});
