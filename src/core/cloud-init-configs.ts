import { ClusterDefaults, resolveValue } from "../config/defaults";
import type { CloudInitConfig, ManifestTree } from "../types/schemas";

export interface PreparedCloudInitConfig {
  key: string;
  file: string;
  targetNode: string;
  targetDatastore: string;
}

export interface PreparedCloudInitConfigs {
  user: Record<string, PreparedCloudInitConfig>;
  vendor: Record<string, PreparedCloudInitConfig>;
  network: Record<string, PreparedCloudInitConfig>;
  meta: Record<string, PreparedCloudInitConfig>;
}

function prepare(
  configs: Record<string, CloudInitConfig>,
  defaults: ClusterDefaults,
): Record<string, PreparedCloudInitConfig> {
  const prepared: Record<string, PreparedCloudInitConfig> = {};
  for (const key of Object.keys(configs).sort()) {
    const item = configs[key];
    prepared[key] = {
      key,
      file: item.file,
      targetNode: resolveValue(item.target_node, undefined, defaults.targetNode),
      // Snippets live on file storage, unlike disks.
      targetDatastore: resolveValue(item.target_datastore, undefined, defaults.fileStorageClass),
    };
  }
  return prepared;
}

export function prepareCloudInitConfigs(
  tree: Pick<ManifestTree, "ci_user_configs" | "ci_vendor_configs" | "ci_network_configs" | "ci_meta_configs">,
  defaults: ClusterDefaults,
): PreparedCloudInitConfigs {
  return {
    user: prepare(tree.ci_user_configs, defaults),
    vendor: prepare(tree.ci_vendor_configs, defaults),
    network: prepare(tree.ci_network_configs, defaults),
    meta: prepare(tree.ci_meta_configs, defaults),
  };
}
