import { TopologyError } from "../logging/error-handler";

export const DEFAULT_CONTROL_PLANE_PREFIX = "talos_cp";
export const DEFAULT_DATA_PLANE_PREFIX = "talos_dp";

export interface TopologyPrefixes {
  controlPlanePrefix: string;
  dataPlanePrefix: string;
}

export interface ClusterTopology {
  controlPlane: string[];
  dataPlane: string[];
  bootstrapHead: string;
}

/** Input handed to the cluster bootstrap collaborator once addresses are known. */
export interface BootstrapInput {
  bootstrapHeadAddress: string;
  controlPlaneAddresses: string[];
  dataPlaneAddresses: string[];
}

const naturalOrder = (a: string, b: string): number =>
  a.localeCompare(b, "en", { numeric: true });

export const matchesPrefix = (name: string, prefix: string): boolean =>
  name === prefix || name.startsWith(`${prefix}_`);

/**
 * Partitions instance names by prefix. The first control-plane name in natural
 * order (`talos_cp_2` before `talos_cp_10`) becomes the bootstrap head.
 */
export function selectClusterTopology(
  fleet: Record<string, unknown> | readonly string[],
  prefixes: TopologyPrefixes = {
    controlPlanePrefix: DEFAULT_CONTROL_PLANE_PREFIX,
    dataPlanePrefix: DEFAULT_DATA_PLANE_PREFIX,
  },
): ClusterTopology {
  const names = isNameList(fleet) ? [...fleet] : Object.keys(fleet);
  const sorted = names.sort(naturalOrder);

  const controlPlane = sorted.filter((name) => matchesPrefix(name, prefixes.controlPlanePrefix));
  const dataPlane = sorted.filter(
    (name) => matchesPrefix(name, prefixes.dataPlanePrefix) && !controlPlane.includes(name),
  );

  const [bootstrapHead] = controlPlane;
  if (bootstrapHead === undefined) {
    throw new TopologyError(
      `No control-plane instance matches prefix "${prefixes.controlPlanePrefix}"; the cluster cannot bootstrap`,
    );
  }

  return { controlPlane, dataPlane, bootstrapHead };
}

function isNameList(fleet: Record<string, unknown> | readonly string[]): fleet is readonly string[] {
  return Array.isArray(fleet);
}

export function toBootstrapInput(
  topology: ClusterTopology,
  addresses: Readonly<Record<string, string>>,
): BootstrapInput {
  const lookup = (name: string): string => {
    const address = addresses[name];
    if (address === undefined || address === "") {
      throw new TopologyError(`No address known for instance "${name}"`);
    }
    return address;
  };

  return {
    bootstrapHeadAddress: lookup(topology.bootstrapHead),
    controlPlaneAddresses: topology.controlPlane.map(lookup),
    dataPlaneAddresses: topology.dataPlane.map(lookup),
  };
}
