/**
 * Cross-Reference Validator
 *
 * Walks the merged manifest and the expanded fleet once and collects every
 * reference, naming, range, format and uniqueness violation. Nothing here
 * throws; an empty list means the manifest is safe to provision.
 */

import { FALLBACK_DEFAULTS } from "../config/defaults";
import type { Violation, ViolationRule } from "../logging/error-handler";
import {
  FLEET_SECTIONS,
  FleetEntryConfig,
  FleetSection,
  ManifestSection,
  ManifestTree,
} from "../types/schemas";
import type { ExpandedInstance } from "./fleet-expander";
import { imageTypeOf } from "./image-catalog";
import { normalizeMAC } from "./identifiers";

export interface Bound {
  min: number;
  max: number;
}

export const LIMITS = {
  cores: { min: 1, max: 128 },
  memory: { min: 64, max: 1_048_576 },
  diskSize: { min: 1, max: 65_536 },
  id: { min: 100, max: 999_999_999 },
  vlanId: { min: 1, max: 4094 },
  mtu: { min: 68, max: 9000 },
  sshPort: { min: 1, max: 65_535 },
} as const satisfies Record<string, Bound>;

export const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
export const NODE_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const BATCH_SUFFIX = /_\d+$/;

const NAMED_SECTIONS: readonly ManifestSection[] = [
  "images",
  "resource_policies",
  "vm_cloud_init_profiles",
  "ci_user_configs",
  "ci_vendor_configs",
  "ci_network_configs",
  "ci_meta_configs",
  "vm_templates",
  "container_templates",
  "virtual_machines",
  "containers",
];

const PROFILE_TARGETS = [
  ["ci_user_data_id", "ci_user_configs"],
  ["ci_vendor_data_id", "ci_vendor_configs"],
  ["ci_network_data_id", "ci_network_configs"],
  ["ci_meta_data_id", "ci_meta_configs"],
] as const;

const CLOUD_INIT_SECTIONS = ["ci_user_configs", "ci_vendor_configs", "ci_network_configs", "ci_meta_configs"] as const;

export interface ValidationInput {
  tree: ManifestTree;
  instances: Record<FleetSection, Record<string, ExpandedInstance>>;
}

export class CrossReferenceValidator {
  private readonly violations: Violation[] = [];

  constructor(private readonly input: ValidationInput) {}

  validate(): Violation[] {
    this.violations.length = 0;
    this.checkNames();
    this.checkNodes();
    this.checkImages();
    this.checkPolicies();
    this.checkCloudInit();
    this.checkTemplates();
    this.checkFleet();
    this.checkNetwork();
    this.checkUniqueness();
    return [...this.violations];
  }

  private report(path: string, rule: ViolationRule, value: unknown, message: string): void {
    this.violations.push({ path, rule, value, message });
  }

  private checkRange(path: string, value: number | undefined, bound: Bound, label: string): void {
    if (value === undefined) {
      return;
    }
    if (!Number.isInteger(value) || value < bound.min || value > bound.max) {
      this.report(path, "range", value, `${label} must be between ${bound.min} and ${bound.max}`);
    }
  }

  private checkReference(path: string, value: string | undefined, section: ManifestSection): void {
    if (value === undefined || value === "") {
      return;
    }
    const collection: object = this.input.tree[section] ?? {};
    if (!Object.prototype.hasOwnProperty.call(collection, value)) {
      this.report(path, "unknown-reference", value, `"${value}" is not defined in ${section}`);
    }
  }

  /**
   * Placement that no link of `chain` or `defaults.target_node` sets lands on
   * the built-in node, which has to be declared like any other.
   */
  private checkInheritedNode(path: string, ...chain: Array<string | undefined>): void {
    const { tree } = this.input;
    if (tree.defaults.target_node !== undefined || chain.some((node) => node !== undefined)) {
      return;
    }
    const node = FALLBACK_DEFAULTS.targetNode;
    if (!Object.prototype.hasOwnProperty.call(tree.nodes, node)) {
      this.report(path, "unknown-reference", node, `"${node}" is not defined in nodes (inherited placement)`);
    }
  }

  private checkNames(): void {
    const { tree } = this.input;
    for (const section of NAMED_SECTIONS) {
      const collection: object = tree[section] ?? {};
      for (const key of Object.keys(collection).sort()) {
        if (!NAME_PATTERN.test(key)) {
          this.report(`${section}.${key}`, "name-pattern", key, `name must match ${NAME_PATTERN.source}`);
        }
      }
    }

    for (const section of FLEET_SECTIONS) {
      const entries: Record<string, FleetEntryConfig> = tree[section];
      for (const key of Object.keys(entries).sort()) {
        const count = entries[key].count ?? 0;
        if (count === 0 && BATCH_SUFFIX.test(key)) {
          this.report(
            `${section}.${key}`,
            "name-reserved-suffix",
            key,
            "single entry names must not end with _<number>; that suffix is reserved for batch instances",
          );
        }
      }
    }
  }

  private checkNodes(): void {
    const { tree } = this.input;
    for (const name of Object.keys(tree.nodes).sort()) {
      if (!NODE_NAME_PATTERN.test(name)) {
        this.report(`nodes.${name}`, "name-pattern", name, `node name must match ${NODE_NAME_PATTERN.source}`);
      }
      this.checkRange(`nodes.${name}.ssh_port`, tree.nodes[name].ssh_port, LIMITS.sshPort, "ssh_port");
    }
    this.checkReference("defaults.target_node", tree.defaults.target_node, "nodes");
  }

  private checkImages(): void {
    const { tree } = this.input;
    for (const key of Object.keys(tree.images).sort()) {
      const image = tree.images[key];
      const path = `images.${key}`;
      this.checkReference(`${path}.target_node`, image.target_node, "nodes");
      this.checkInheritedNode(`${path}.target_node`, image.target_node);
      if (imageTypeOf(image.extension) === "unknown") {
        this.report(`${path}.extension`, "unknown-extension", image.extension, `unsupported image extension "${image.extension}"`);
      }
      if (typeof image.release === "string" && image.release.startsWith("versions.")) {
        this.checkReference(`${path}.release`, image.release.slice("versions.".length), "versions");
      }
    }
  }

  private checkPolicies(): void {
    const { tree } = this.input;
    for (const key of Object.keys(tree.resource_policies).sort()) {
      const policy = tree.resource_policies[key];
      const path = `resource_policies.${key}`;
      this.checkRange(`${path}.cores`, policy.cores, LIMITS.cores, "cores");
      this.checkRange(`${path}.memory`, policy.memory, LIMITS.memory, "memory (MiB)");
      this.checkRange(`${path}.disk_size`, policy.disk_size, LIMITS.diskSize, "disk_size (GiB)");
    }
  }

  private checkCloudInit(): void {
    const { tree } = this.input;
    for (const key of Object.keys(tree.vm_cloud_init_profiles).sort()) {
      const profile = tree.vm_cloud_init_profiles[key];
      for (const [field, section] of PROFILE_TARGETS) {
        this.checkReference(`vm_cloud_init_profiles.${key}.${field}`, profile[field], section);
      }
    }
    for (const section of CLOUD_INIT_SECTIONS) {
      const configs = tree[section];
      for (const key of Object.keys(configs).sort()) {
        this.checkReference(`${section}.${key}.target_node`, configs[key].target_node, "nodes");
        this.checkInheritedNode(`${section}.${key}.target_node`, configs[key].target_node);
      }
    }
  }

  private checkTemplates(): void {
    const { tree } = this.input;
    const sections = [
      ["vm_templates", tree.vm_templates],
      ["container_templates", tree.container_templates],
    ] as const;

    for (const [section, templates] of sections) {
      for (const key of Object.keys(templates).sort()) {
        const template = templates[key];
        const path = `${section}.${key}`;
        this.checkReference(`${path}.image`, template.image, "images");
        this.checkReference(`${path}.resource_policy`, template.resource_policy, "resource_policies");
        this.checkReference(`${path}.target_node`, template.target_node, "nodes");
        this.checkInheritedNode(`${path}.target_node`, template.target_node);
        this.checkRange(`${path}.vm_id`, template.vm_id, LIMITS.id, "vm_id");
        this.checkRange(`${path}.cores`, template.cores, LIMITS.cores, "cores");
        this.checkRange(`${path}.memory`, template.memory, LIMITS.memory, "memory (MiB)");
        this.checkRange(`${path}.disk_size`, template.disk_size, LIMITS.diskSize, "disk_size (GiB)");
      }
    }

    for (const key of Object.keys(tree.vm_templates).sort()) {
      this.checkReference(
        `vm_templates.${key}.cloud_init_profile`,
        tree.vm_templates[key].cloud_init_profile,
        "vm_cloud_init_profiles",
      );
    }
  }

  private checkFleet(): void {
    const { tree } = this.input;
    for (const section of FLEET_SECTIONS) {
      const templateSection = section === "virtual_machines" ? "vm_templates" : "container_templates";
      const entries: Record<string, FleetEntryConfig> = tree[section];

      for (const key of Object.keys(entries).sort()) {
        const entry = entries[key];
        const path = `${section}.${key}`;
        const template: { target_node?: string } | undefined = tree[templateSection][entry.template_id];
        this.checkReference(`${path}.template_id`, entry.template_id, templateSection);
        this.checkReference(`${path}.target_node`, entry.target_node, "nodes");
        this.checkInheritedNode(`${path}.target_node`, entry.target_node, template?.target_node);
        this.checkRange(`${path}.vm_id`, entry.vm_id, LIMITS.id, "vm_id");
        this.checkRange(`${path}.vm_id_start`, entry.vm_id_start, LIMITS.id, "vm_id_start");
        this.checkRange(`${path}.cores`, entry.cores, LIMITS.cores, "cores");
        this.checkRange(`${path}.memory`, entry.memory, LIMITS.memory, "memory (MiB)");

        (entry.disks ?? []).forEach((disk, i) => {
          this.checkRange(`${path}.disks.${i}.size`, disk.size, LIMITS.diskSize, "disk size (GiB)");
        });
        (entry.nics ?? []).forEach((nic, i) => {
          this.checkRange(`${path}.nics.${i}.vlan_id`, nic.vlan_id, LIMITS.vlanId, "vlan_id");
          this.checkRange(`${path}.nics.${i}.mtu`, nic.mtu, LIMITS.mtu, "mtu");
          if (nic.mac_address !== undefined && normalizeMAC(nic.mac_address) === undefined) {
            this.report(`${path}.nics.${i}.mac_address`, "mac-format", nic.mac_address, "MAC address must look like xx:xx:xx:xx:xx:xx");
          }
        });
      }
    }
  }

  private checkNetwork(): void {
    const { tree } = this.input;
    for (const node of Object.keys(tree.network).sort()) {
      const path = `network.${node}`;
      this.checkReference(path, node, "nodes");
      const { bonds = {}, vlans = {}, bridges = {} } = tree.network[node];

      for (const name of Object.keys(bonds).sort()) {
        this.checkRange(`${path}.bonds.${name}.mtu`, bonds[name].mtu, LIMITS.mtu, "mtu");
      }
      for (const name of Object.keys(vlans).sort()) {
        this.checkRange(`${path}.vlans.${name}.vlan_id`, vlans[name].vlan_id, LIMITS.vlanId, "vlan_id");
        this.checkRange(`${path}.vlans.${name}.mtu`, vlans[name].mtu, LIMITS.mtu, "mtu");
      }
      for (const name of Object.keys(bridges).sort()) {
        this.checkRange(`${path}.bridges.${name}.mtu`, bridges[name].mtu, LIMITS.mtu, "mtu");
      }
    }
  }

  private checkUniqueness(): void {
    const { tree, instances } = this.input;
    const names = new Map<string, string>();
    const ids = new Map<number, string>();
    const macs = new Map<string, string>();

    const claimId = (path: string, id: number | undefined, label: string): void => {
      if (id === undefined) {
        return;
      }
      const owner = ids.get(id);
      if (owner !== undefined) {
        this.report(path, "duplicate-id", id, `${label} reuses ID ${id} already taken by ${owner}`);
        return;
      }
      ids.set(id, label);
    };

    for (const key of Object.keys(tree.vm_templates).sort()) {
      claimId(`vm_templates.${key}.vm_id`, tree.vm_templates[key].vm_id, `vm_templates.${key}`);
    }
    for (const key of Object.keys(tree.container_templates).sort()) {
      claimId(`container_templates.${key}.vm_id`, tree.container_templates[key].vm_id, `container_templates.${key}`);
    }

    for (const section of FLEET_SECTIONS) {
      for (const name of Object.keys(instances[section]).sort()) {
        const instance = instances[section][name];
        const path = `${section}.${instance.entry}`;
        const label = `${section}.${name}`;

        const owner = names.get(name);
        if (owner !== undefined) {
          this.report(path, "duplicate-instance-name", name, `instance name "${name}" is already used by ${owner}`);
        } else {
          names.set(name, label);
        }

        claimId(path, instance.id, label);

        for (const nic of instance.nics) {
          if (nic.macAddress === undefined) {
            continue;
          }
          const macOwner = macs.get(nic.macAddress);
          if (macOwner !== undefined) {
            this.report(
              `${path}.nics.${nic.index}.mac_address`,
              "duplicate-mac",
              nic.macAddress,
              `${label} NIC ${nic.index} reuses MAC ${nic.macAddress} of ${macOwner}`,
            );
          } else {
            macs.set(nic.macAddress, `${label} NIC ${nic.index}`);
          }
        }
      }
    }
  }
}

export function validateManifest(input: ValidationInput): Violation[] {
  return new CrossReferenceValidator(input).validate();
}
