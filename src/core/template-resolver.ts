import { ClusterDefaults, resolveValue } from "../config/defaults";
import type {
  ContainerTemplateConfig,
  InstanceKind,
  ManifestTree,
  ResourcePolicyConfig,
  VMTemplateConfig,
} from "../types/schemas";

export interface CloudInitRefs {
  userDataId?: string;
  vendorDataId?: string;
  networkDataId?: string;
  metaDataId?: string;
}

export interface ResolvedTemplate {
  key: string;
  kind: InstanceKind;
  vmId?: number;
  image: string;
  targetNode: string;
  targetDatastore: string;
  cores?: number;
  memory?: number;
  diskSize?: number;
  osType: string;
  bios?: "seabios" | "ovmf";
  machineType?: string;
  description: string;
  tags: string[];
  cloudInit: CloudInitRefs;
}

type TemplateTree = Pick<
  ManifestTree,
  "vm_templates" | "container_templates" | "resource_policies" | "vm_cloud_init_profiles"
>;

function resolveCommon(
  key: string,
  kind: InstanceKind,
  item: ContainerTemplateConfig,
  tree: TemplateTree,
  defaults: ClusterDefaults,
): ResolvedTemplate {
  const policy: ResourcePolicyConfig | undefined = item.resource_policy
    ? tree.resource_policies[item.resource_policy]
    : undefined;

  return {
    key,
    kind,
    vmId: item.vm_id,
    image: item.image,
    targetNode: resolveValue(item.target_node, undefined, defaults.targetNode),
    targetDatastore: resolveValue(item.target_datastore, undefined, defaults.blockStorageClass),
    cores: item.cores ?? policy?.cores,
    memory: item.memory ?? policy?.memory,
    diskSize: item.disk_size ?? policy?.disk_size,
    osType: item.os_type ?? (kind === "vm" ? "l26" : "linux"),
    description: item.description ?? (kind === "vm" ? `${key} template` : `${key} container template`),
    tags: item.tags ?? ["template", kind === "vm" ? "vm" : "lxc"],
    cloudInit: {},
  };
}

function resolveVMTemplate(
  key: string,
  item: VMTemplateConfig,
  tree: TemplateTree,
  defaults: ClusterDefaults,
): ResolvedTemplate {
  const resolved = resolveCommon(key, "vm", item, tree, defaults);
  const profile = item.cloud_init_profile ? tree.vm_cloud_init_profiles[item.cloud_init_profile] : undefined;

  // Empty profile fields mean "no snippet", not an empty reference.
  return {
    ...resolved,
    bios: item.bios,
    machineType: item.machine_type ?? (item.bios === "ovmf" ? "q35" : undefined),
    cloudInit: {
      userDataId: profile?.ci_user_data_id || undefined,
      vendorDataId: profile?.ci_vendor_data_id || undefined,
      networkDataId: profile?.ci_network_data_id || undefined,
      metaDataId: profile?.ci_meta_data_id || undefined,
    },
  };
}

export function resolveTemplates(
  kind: InstanceKind,
  tree: TemplateTree,
  defaults: ClusterDefaults,
): Record<string, ResolvedTemplate> {
  const resolved: Record<string, ResolvedTemplate> = {};

  if (kind === "vm") {
    for (const key of Object.keys(tree.vm_templates).sort()) {
      resolved[key] = resolveVMTemplate(key, tree.vm_templates[key], tree, defaults);
    }
  } else {
    for (const key of Object.keys(tree.container_templates).sort()) {
      resolved[key] = resolveCommon(key, "container", tree.container_templates[key], tree, defaults);
    }
  }

  return resolved;
}
