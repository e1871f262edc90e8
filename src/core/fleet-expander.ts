/**
 * Fleet Expander
 *
 * Turns hybrid single/batch fleet entries into concrete instance records with
 * derived names, IDs, placement, storage and NIC addresses.
 */

import { ClusterDefaults, resolveValue } from "../config/defaults";
import { deepFreeze } from "../config/manifest-loader";
import { DerivationOverflowError, Violation } from "../logging/error-handler";
import type { FleetEntryConfig, FleetSection, InstanceKind, NicConfig } from "../types/schemas";
import { deriveInstanceID, deriveMAC, normalizeMAC } from "./identifiers";
import type { CloudInitRefs, ResolvedTemplate } from "./template-resolver";

export type FleetShape =
  | { kind: "single"; id?: number }
  | { kind: "batch"; count: number; startId: number };

export type ShapeResult =
  | { ok: true; shape: FleetShape }
  | { ok: false; violations: Violation[] };

export interface ResolvedDisk {
  size: number;
  datastore: string;
  fileFormat?: "raw" | "qcow2" | "vmdk";
  /** VM disks only. */
  interface?: string;
  /** Container mount points only. */
  mountPoint?: string;
}

export interface ResolvedNic {
  index: number;
  bridge: string;
  vlanId?: number;
  model?: string;
  mtu?: number;
  /** Unset only when the instance ID is left to the hypervisor. */
  macAddress?: string;
}

export interface ExpandedInstance {
  name: string;
  hostname: string;
  kind: InstanceKind;
  /** Key of the fleet entry this instance came from. */
  entry: string;
  /** 1-based position within a batch; absent for singles. */
  index?: number;
  id?: number;
  targetNode: string;
  templateId: string;
  templateVmId?: number;
  templateNode?: string;
  datastore: string;
  cores?: number;
  memory?: number;
  diskSize?: number;
  disks: ResolvedDisk[];
  nics: ResolvedNic[];
  cloudInit: CloudInitRefs;
  protection: boolean;
  tags: string[];
  description: string;
}

export interface ExpansionContext {
  section: FleetSection;
  defaults: ClusterDefaults;
  templates: Record<string, ResolvedTemplate>;
}

export interface ExpansionResult {
  instances: Record<string, ExpandedInstance>;
  violations: Violation[];
}

export const SECTION_KIND: Record<FleetSection, InstanceKind> = {
  virtual_machines: "vm",
  containers: "container",
};

/** Resolves the entry's shape once; mixed single/batch fields reject the entry. */
export function parseFleetShape(
  section: FleetSection,
  key: string,
  entry: FleetEntryConfig,
  batchLimit: number,
): ShapeResult {
  const path = `${section}.${key}`;
  const count = entry.count ?? 0;

  if (count < 0) {
    return {
      ok: false,
      violations: [{
        path: `${path}.count`,
        rule: "batch-count-range",
        value: count,
        message: `count must be 0 (single) or between 1 and ${batchLimit}`,
      }],
    };
  }

  if (count === 0) {
    if (entry.vm_id_start !== undefined) {
      return {
        ok: false,
        violations: [{
          path: `${path}.vm_id_start`,
          rule: "shape-start-forbidden",
          value: entry.vm_id_start,
          message: "vm_id_start is only valid for batch entries (count > 0); use vm_id for a single instance",
        }],
      };
    }
    return { ok: true, shape: { kind: "single", id: entry.vm_id } };
  }

  const violations: Violation[] = [];
  if (entry.vm_id !== undefined) {
    violations.push({
      path: `${path}.vm_id`,
      rule: "shape-exclusive",
      value: entry.vm_id,
      message: `batch entry (count ${count}) cannot declare a single vm_id; use vm_id_start`,
    });
  }
  if (entry.vm_id_start === undefined) {
    violations.push({
      path: `${path}.vm_id_start`,
      rule: "shape-start-required",
      value: undefined,
      message: `batch entry (count ${count}) requires vm_id_start`,
    });
  }
  if (count > batchLimit) {
    violations.push({
      path: `${path}.count`,
      rule: "batch-count-range",
      value: count,
      message: `count must be between 1 and ${batchLimit}`,
    });
  }
  if (violations.length > 0 || entry.vm_id_start === undefined) {
    return { ok: false, violations };
  }
  return { ok: true, shape: { kind: "batch", count, startId: entry.vm_id_start } };
}

export const toHostname = (name: string): string => name.replace(/_/g, "-");

function buildInstance(
  context: ExpansionContext,
  key: string,
  entry: FleetEntryConfig,
  name: string,
  id: number | undefined,
  index: number | undefined,
): ExpandedInstance {
  const kind = SECTION_KIND[context.section];
  const { defaults } = context;
  const template: ResolvedTemplate | undefined = context.templates[entry.template_id];

  const nicConfigs: NicConfig[] = entry.nics ?? [{ bridge: defaults.bridge }];
  const nics = nicConfigs.map((nic, nicIndex): ResolvedNic => {
    // An explicit MAC always wins; malformed ones are kept for the validator to report.
    const explicit = nic.mac_address !== undefined
      ? normalizeMAC(nic.mac_address) ?? nic.mac_address
      : undefined;
    return {
      index: nicIndex,
      bridge: nic.bridge,
      vlanId: nic.vlan_id,
      model: nic.model,
      mtu: nic.mtu,
      macAddress: explicit ?? (id !== undefined ? deriveMAC(kind, id, nicIndex) : undefined),
    };
  });

  const disks = (entry.disks ?? []).map((disk, diskIndex): ResolvedDisk => ({
    size: disk.size,
    datastore: resolveValue(disk.disk_datastore, undefined, defaults.blockStorageClass),
    fileFormat: disk.file_format,
    interface: kind === "vm" ? disk.interface ?? `scsi${diskIndex + 1}` : undefined,
    mountPoint: kind === "container" ? disk.mount_point ?? `/mnt/disk${diskIndex}` : undefined,
  }));

  return {
    name,
    hostname: toHostname(name),
    kind,
    entry: key,
    index,
    id,
    targetNode: resolveValue(entry.target_node, template?.targetNode, defaults.targetNode),
    templateId: entry.template_id,
    templateVmId: template?.vmId,
    templateNode: template?.targetNode,
    datastore: resolveValue(entry.target_datastore, template?.targetDatastore, defaults.blockStorageClass),
    cores: entry.cores ?? template?.cores,
    memory: entry.memory ?? template?.memory,
    diskSize: template?.diskSize,
    disks,
    nics,
    cloudInit: kind === "vm" && template ? { ...template.cloudInit } : {},
    protection: entry.protection ?? false,
    tags: entry.tags ?? [kind === "vm" ? "vm" : "lxc", key],
    description: entry.description ?? `${key} (${context.section})`,
  };
}

function plannedRecords(key: string, shape: FleetShape): Array<{ name: string; id?: number; index?: number }> {
  if (shape.kind === "single") {
    return [{ name: key, id: shape.id }];
  }
  const records: Array<{ name: string; id: number; index: number }> = [];
  for (let index = 1; index <= shape.count; index++) {
    records.push({ name: `${key}_${index}`, id: deriveInstanceID(shape.startId, index), index });
  }
  return records;
}

/**
 * Expands every entry of one fleet section. Entries are visited in key order,
 * so the output depends only on the entries themselves.
 */
export function expandFleet(
  entries: Record<string, FleetEntryConfig>,
  context: ExpansionContext,
): ExpansionResult {
  const instances: Record<string, ExpandedInstance> = {};
  const violations: Violation[] = [];
  const batchLimit = context.defaults.batchLimits[context.section];

  for (const key of Object.keys(entries).sort()) {
    const entry = entries[key];
    const shape = parseFleetShape(context.section, key, entry, batchLimit);
    if (!shape.ok) {
      violations.push(...shape.violations);
      continue;
    }

    for (const record of plannedRecords(key, shape.shape)) {
      if (instances[record.name] !== undefined) {
        violations.push({
          path: `${context.section}.${key}`,
          rule: "duplicate-instance-name",
          value: record.name,
          message: `instance name "${record.name}" is already produced by entry "${instances[record.name].entry}"`,
        });
        continue;
      }
      try {
        instances[record.name] = deepFreeze(buildInstance(context, key, entry, record.name, record.id, record.index));
      } catch (error) {
        if (!(error instanceof DerivationOverflowError)) {
          throw error;
        }
        violations.push({
          path: `${context.section}.${key}`,
          rule: "id-overflow",
          value: error.value,
          message: `instance "${record.name}": ${error.message}`,
        });
      }
    }
  }

  return { instances, violations };
}
