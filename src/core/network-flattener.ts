import type { Violation } from "../logging/error-handler";
import type {
  BondConfig,
  BridgeConfig,
  NodeNetworkConfig,
  VlanConfig,
} from "../types/schemas";

export type NetworkElementKind = "bonds" | "vlans" | "bridges";

export type Flattened<T> = T & { target_node: string; name: string };

export interface FlattenedNetwork {
  bonds: Record<string, Flattened<BondConfig>>;
  vlans: Record<string, Flattened<VlanConfig>>;
  bridges: Record<string, Flattened<BridgeConfig>>;
}

export interface FlattenResult extends FlattenedNetwork {
  violations: Violation[];
}

export const networkKey = (node: string, name: string): string => `${node}_${name}`;

function flattenKind<T extends object>(
  network: Record<string, NodeNetworkConfig>,
  kind: NetworkElementKind,
  select: (config: NodeNetworkConfig) => Record<string, T> | undefined,
  violations: Violation[],
): Record<string, Flattened<T>> {
  const flat: Record<string, Flattened<T>> = {};
  const owners = new Map<string, string>();

  for (const node of Object.keys(network).sort()) {
    const elements = select(network[node]) ?? {};
    for (const name of Object.keys(elements).sort()) {
      const key = networkKey(node, name);
      const owner = owners.get(key);
      if (owner !== undefined) {
        violations.push({
          path: `network.${node}.${kind}.${name}`,
          rule: "duplicate-network-key",
          value: key,
          message: `flattened key "${key}" is already taken by network.${owner}`,
        });
        continue;
      }
      owners.set(key, `${node}.${kind}.${name}`);
      flat[key] = { ...elements[name], target_node: node, name };
    }
  }

  return flat;
}

/**
 * Re-keys per-node bonds, VLANs and bridges as `<node>_<name>`, stamping the
 * owning node and element name into each value. Kinds are flattened separately.
 */
export function flattenNetwork(network: Record<string, NodeNetworkConfig>): FlattenResult {
  const violations: Violation[] = [];
  return {
    bonds: flattenKind(network, "bonds", (n) => n.bonds, violations),
    vlans: flattenKind(network, "vlans", (n) => n.vlans, violations),
    bridges: flattenKind(network, "bridges", (n) => n.bridges, violations),
    violations,
  };
}
