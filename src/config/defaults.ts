import type { FleetSection, ManifestTree } from "../types/schemas";

export interface ClusterDefaults {
  readonly targetNode: string;
  readonly fileStorageClass: string;
  readonly blockStorageClass: string;
  readonly bridge: string;
  readonly batchLimits: Readonly<Record<FleetSection, number>>;
}

export const FALLBACK_DEFAULTS: ClusterDefaults = Object.freeze({
  targetNode: "pve",
  fileStorageClass: "local",
  blockStorageClass: "local-lvm",
  bridge: "vmbr0",
  batchLimits: Object.freeze({ virtual_machines: 50, containers: 100 }),
});

/**
 * Extracts the cluster-wide defaults once. The result is consulted through
 * {@link resolveValue} and is never merged back into the manifest tree.
 */
export function resolveDefaults(tree: Pick<ManifestTree, "defaults">): ClusterDefaults {
  const d = tree.defaults;
  return Object.freeze({
    targetNode: d.target_node ?? FALLBACK_DEFAULTS.targetNode,
    fileStorageClass: d.file_storage ?? FALLBACK_DEFAULTS.fileStorageClass,
    blockStorageClass: d.block_storage ?? FALLBACK_DEFAULTS.blockStorageClass,
    bridge: d.bridge ?? FALLBACK_DEFAULTS.bridge,
    batchLimits: Object.freeze({
      virtual_machines: d.batch_limits?.virtual_machines ?? FALLBACK_DEFAULTS.batchLimits.virtual_machines,
      containers: d.batch_limits?.containers ?? FALLBACK_DEFAULTS.batchLimits.containers,
    }),
  });
}

/**
 * Precedence: explicit value, then the entry-level default (usually the
 * referenced template), then the cluster default. Only absent values fall through.
 */
export function resolveValue<T>(explicit: T | undefined, entryDefault: T | undefined, clusterDefault: T): T {
  if (explicit !== undefined) {
    return explicit;
  }
  if (entryDefault !== undefined) {
    return entryDefault;
  }
  return clusterDefault;
}
