import { z } from "zod";

// Shapes only: numeric ranges and naming rules are checked by the reference
// validator so that every violation surfaces in one report.

export const DefaultsSchema = z.object({
  target_node: z.string().min(1).optional(),
  file_storage: z.string().min(1).optional(),
  block_storage: z.string().min(1).optional(),
  bridge: z.string().min(1).optional(),
  batch_limits: z.object({
    virtual_machines: z.number().int().positive().optional(),
    containers: z.number().int().positive().optional(),
  }).strict().optional(),
}).strict();

export const NodeSchema = z.object({
  address: z.string().min(1),
  ssh_port: z.number().int().default(22),
}).strict();

export const CHECKSUM_ALGORITHMS = ["md5", "sha1", "sha224", "sha256", "sha384", "sha512"] as const;

export const ImageSchema = z.object({
  distro: z.string().min(1),
  release: z.union([z.string().min(1), z.number()]),
  extension: z.string().min(1),
  arch: z.string().min(1).optional(),
  schematic: z.string().optional(),
  build_date: z.union([z.string(), z.number()]).optional(),
  url: z.string().optional(),
  file_name: z.string().optional(),
  checksum: z.string().min(1).optional(),
  checksum_algorithm: z.enum(CHECKSUM_ALGORITHMS).optional(),
  target_node: z.string().min(1).optional(),
  target_datastore: z.string().min(1).optional(),
}).strict();

export const ResourcePolicySchema = z.object({
  cores: z.number().int().optional(),
  memory: z.number().int().optional(),
  disk_size: z.number().int().optional(),
}).strict();

export const CloudInitProfileSchema = z.object({
  ci_user_data_id: z.string().optional(),
  ci_vendor_data_id: z.string().optional(),
  ci_network_data_id: z.string().optional(),
  ci_meta_data_id: z.string().optional(),
}).strict();

export const CloudInitConfigSchema = z.object({
  file: z.string().min(1),
  target_node: z.string().min(1).optional(),
  target_datastore: z.string().min(1).optional(),
}).strict();

const TemplateBaseSchema = z.object({
  vm_id: z.number().int().optional(),
  image: z.string().min(1),
  resource_policy: z.string().min(1).optional(),
  cores: z.number().int().optional(),
  memory: z.number().int().optional(),
  disk_size: z.number().int().optional(),
  os_type: z.string().min(1).optional(),
  target_node: z.string().min(1).optional(),
  target_datastore: z.string().min(1).optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export const VMTemplateSchema = TemplateBaseSchema.extend({
  cloud_init_profile: z.string().min(1).optional(),
  bios: z.enum(["seabios", "ovmf"]).optional(),
  machine_type: z.string().min(1).optional(),
}).strict();

export const ContainerTemplateSchema = TemplateBaseSchema.strict();

export const DiskSchema = z.object({
  interface: z.string().min(1).optional(),
  size: z.number().int(),
  disk_datastore: z.string().min(1).optional(),
  file_format: z.enum(["raw", "qcow2", "vmdk"]).optional(),
  mount_point: z.string().min(1).optional(),
}).strict();

export const NicSchema = z.object({
  bridge: z.string().min(1),
  vlan_id: z.number().int().optional(),
  mac_address: z.string().optional(),
  model: z.enum(["virtio", "e1000", "rtl8139", "vmxnet3"]).optional(),
  mtu: z.number().int().optional(),
}).strict();

// `count` switches between the single and batch shapes; the fleet expander
// resolves the shape so mixed entries become violations instead of load errors.
export const FleetEntrySchema = z.object({
  template_id: z.string().min(1),
  count: z.number().int().optional(),
  vm_id: z.number().int().optional(),
  vm_id_start: z.number().int().optional(),
  target_node: z.string().min(1).optional(),
  target_datastore: z.string().min(1).optional(),
  cores: z.number().int().optional(),
  memory: z.number().int().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  protection: z.boolean().optional(),
  disks: z.array(DiskSchema).optional(),
  nics: z.array(NicSchema).optional(),
}).strict();

export const BondSchema = z.object({
  interfaces: z.array(z.string().min(1)).nonempty(),
  mode: z.enum([
    "balance-rr",
    "active-backup",
    "balance-xor",
    "broadcast",
    "802.3ad",
    "balance-tlb",
    "balance-alb",
  ]).default("active-backup"),
  mtu: z.number().int().optional(),
  comment: z.string().optional(),
}).strict();

export const VlanSchema = z.object({
  interface: z.string().min(1),
  vlan_id: z.number().int(),
  address: z.string().optional(),
  gateway: z.string().optional(),
  mtu: z.number().int().optional(),
  comment: z.string().optional(),
}).strict();

export const BridgeSchema = z.object({
  ports: z.array(z.string().min(1)).optional(),
  vlan_aware: z.boolean().optional(),
  address: z.string().optional(),
  gateway: z.string().optional(),
  mtu: z.number().int().optional(),
  autostart: z.boolean().optional(),
  comment: z.string().optional(),
}).strict();

export const NodeNetworkSchema = z.object({
  bonds: z.record(z.string(), BondSchema).optional(),
  vlans: z.record(z.string(), VlanSchema).optional(),
  bridges: z.record(z.string(), BridgeSchema).optional(),
}).strict();

export const ClusterSchema = z.object({
  name: z.string().min(1),
  control_plane_prefix: z.string().min(1).optional(),
  data_plane_prefix: z.string().min(1).optional(),
  talos_version: z.string().optional(),
  kubernetes_version: z.string().optional(),
}).strict();

const sections = {
  defaults: DefaultsSchema,
  versions: z.record(z.string(), z.string()),
  nodes: z.record(z.string(), NodeSchema),
  images: z.record(z.string(), ImageSchema),
  resource_policies: z.record(z.string(), ResourcePolicySchema),
  vm_cloud_init_profiles: z.record(z.string(), CloudInitProfileSchema),
  ci_user_configs: z.record(z.string(), CloudInitConfigSchema),
  ci_vendor_configs: z.record(z.string(), CloudInitConfigSchema),
  ci_network_configs: z.record(z.string(), CloudInitConfigSchema),
  ci_meta_configs: z.record(z.string(), CloudInitConfigSchema),
  vm_templates: z.record(z.string(), VMTemplateSchema),
  container_templates: z.record(z.string(), ContainerTemplateSchema),
  virtual_machines: z.record(z.string(), FleetEntrySchema),
  containers: z.record(z.string(), FleetEntrySchema),
  network: z.record(z.string(), NodeNetworkSchema),
};

/** One manifest file: any subset of the sections, nothing else. */
export const ManifestFragmentSchema = z.object({
  ...sections,
  cluster: ClusterSchema,
}).partial().strict();

export const ManifestSchema = z.object({
  defaults: DefaultsSchema.default({}),
  versions: sections.versions.default({}),
  nodes: sections.nodes.default({}),
  images: sections.images.default({}),
  resource_policies: sections.resource_policies.default({}),
  vm_cloud_init_profiles: sections.vm_cloud_init_profiles.default({}),
  ci_user_configs: sections.ci_user_configs.default({}),
  ci_vendor_configs: sections.ci_vendor_configs.default({}),
  ci_network_configs: sections.ci_network_configs.default({}),
  ci_meta_configs: sections.ci_meta_configs.default({}),
  vm_templates: sections.vm_templates.default({}),
  container_templates: sections.container_templates.default({}),
  virtual_machines: sections.virtual_machines.default({}),
  containers: sections.containers.default({}),
  network: sections.network.default({}),
  cluster: ClusterSchema.optional(),
}).strict();

export const ManifestIndexSchema = z.object({
  fragments: z.array(z.string().min(1)).nonempty(),
}).strict();

// Export types
export type ManifestTree = z.infer<typeof ManifestSchema>;
export type ManifestFragment = z.infer<typeof ManifestFragmentSchema>;
export type ManifestSection = keyof ManifestTree;
export type DefaultsConfig = z.infer<typeof DefaultsSchema>;
export type NodeConfig = z.infer<typeof NodeSchema>;
export type ImageConfig = z.infer<typeof ImageSchema>;
export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];
export type ResourcePolicyConfig = z.infer<typeof ResourcePolicySchema>;
export type CloudInitProfileConfig = z.infer<typeof CloudInitProfileSchema>;
export type CloudInitConfig = z.infer<typeof CloudInitConfigSchema>;
export type VMTemplateConfig = z.infer<typeof VMTemplateSchema>;
export type ContainerTemplateConfig = z.infer<typeof ContainerTemplateSchema>;
export type FleetEntryConfig = z.infer<typeof FleetEntrySchema>;
export type DiskConfig = z.infer<typeof DiskSchema>;
export type NicConfig = z.infer<typeof NicSchema>;
export type BondConfig = z.infer<typeof BondSchema>;
export type VlanConfig = z.infer<typeof VlanSchema>;
export type BridgeConfig = z.infer<typeof BridgeSchema>;
export type NodeNetworkConfig = z.infer<typeof NodeNetworkSchema>;
export type ClusterConfig = z.infer<typeof ClusterSchema>;

export type FleetSection = "virtual_machines" | "containers";
export type InstanceKind = "vm" | "container";

export const FLEET_SECTIONS: readonly FleetSection[] = ["virtual_machines", "containers"];

// Validation helpers
export const parseManifest = (data: unknown): ManifestTree => {
  return ManifestSchema.parse(data);
};

export const parseFragmentSafe = (data: unknown) => {
  return ManifestFragmentSchema.safeParse(data);
};
