/**
 * Manifest Compiler
 *
 * Runs the whole pipeline over a loaded manifest tree: defaults, templates,
 * images, fleet expansion, network flattening, validation and cluster
 * topology. The result is either a frozen compiled manifest or the complete
 * violation report; it is never both.
 */

import { ClusterDefaults, resolveDefaults } from "../config/defaults";
import { deepFreeze } from "../config/manifest-loader";
import {
  ErrorHandler,
  TopologyError,
  ValidationFailedError,
  Violation,
} from "../logging/error-handler";
import type { FleetSection, ManifestTree, NodeConfig } from "../types/schemas";
import { PreparedCloudInitConfigs, prepareCloudInitConfigs } from "./cloud-init-configs";
import {
  ClusterTopology,
  DEFAULT_CONTROL_PLANE_PREFIX,
  DEFAULT_DATA_PLANE_PREFIX,
  selectClusterTopology,
} from "./cluster-topology";
import { ExpandedInstance, ExpansionResult, SECTION_KIND, expandFleet } from "./fleet-expander";
import { PreparedImage, prepareImages, resolveRelease } from "./image-catalog";
import { FlattenedNetwork, flattenNetwork } from "./network-flattener";
import { validateManifest } from "./reference-validator";
import { ResolvedTemplate, resolveTemplates } from "./template-resolver";

export interface CompiledCluster {
  name: string;
  talosVersion?: string;
  kubernetesVersion?: string;
  topology: ClusterTopology;
}

export interface CompiledManifest {
  defaults: ClusterDefaults;
  nodes: Record<string, NodeConfig>;
  images: Record<string, PreparedImage>;
  vmTemplates: Record<string, ResolvedTemplate>;
  containerTemplates: Record<string, ResolvedTemplate>;
  cloudInitConfigs: PreparedCloudInitConfigs;
  virtualMachines: Record<string, ExpandedInstance>;
  containers: Record<string, ExpandedInstance>;
  network: FlattenedNetwork;
  cluster?: CompiledCluster;
}

export type CompileResult =
  | { ok: true; manifest: CompiledManifest }
  | { ok: false; violations: Violation[] };

export class ManifestCompiler {
  constructor(private readonly logger: ErrorHandler = new ErrorHandler()) {}

  compile(tree: ManifestTree): CompileResult {
    const defaults = resolveDefaults(tree);
    const vmTemplates = resolveTemplates("vm", tree, defaults);
    const containerTemplates = resolveTemplates("container", tree, defaults);
    const vmExpansion = this.expand(tree, "virtual_machines", defaults, vmTemplates);
    const containerExpansion = this.expand(tree, "containers", defaults, containerTemplates);
    const instances: Record<FleetSection, Record<string, ExpandedInstance>> = {
      virtual_machines: vmExpansion.instances,
      containers: containerExpansion.instances,
    };
    const violations: Violation[] = [...vmExpansion.violations, ...containerExpansion.violations];

    const { violations: networkViolations, ...network } = flattenNetwork(tree.network);
    violations.push(...networkViolations);

    violations.push(...validateManifest({ tree, instances }));

    let cluster: CompiledCluster | undefined;
    if (tree.cluster !== undefined) {
      try {
        cluster = {
          name: tree.cluster.name,
          talosVersion: tree.cluster.talos_version ?? this.talosVersionFromImages(tree),
          kubernetesVersion: tree.cluster.kubernetes_version,
          topology: selectClusterTopology(instances.virtual_machines, {
            controlPlanePrefix: tree.cluster.control_plane_prefix ?? DEFAULT_CONTROL_PLANE_PREFIX,
            dataPlanePrefix: tree.cluster.data_plane_prefix ?? DEFAULT_DATA_PLANE_PREFIX,
          }),
        };
      } catch (error) {
        if (!(error instanceof TopologyError)) {
          throw error;
        }
        violations.push({
          path: "cluster",
          rule: "control-plane-required",
          value: tree.cluster.control_plane_prefix ?? DEFAULT_CONTROL_PLANE_PREFIX,
          message: error.message,
        });
      }
    }

    if (violations.length > 0) {
      this.logger.warn(`Manifest rejected with ${violations.length} violation(s)`);
      return { ok: false, violations };
    }

    const manifest: CompiledManifest = {
      defaults,
      nodes: { ...tree.nodes },
      images: prepareImages(tree, defaults),
      vmTemplates,
      containerTemplates,
      cloudInitConfigs: prepareCloudInitConfigs(tree, defaults),
      virtualMachines: instances.virtual_machines,
      containers: instances.containers,
      network,
      cluster,
    };

    for (const image of Object.values(manifest.images)) {
      if (image.url === undefined) {
        this.logger.info(`Image ${image.key} has no download source; expecting ${image.volumeId} on ${image.targetNode}`);
      }
    }

    this.logger.info("Manifest compiled", {
      virtualMachines: Object.keys(manifest.virtualMachines).length,
      containers: Object.keys(manifest.containers).length,
      bridges: Object.keys(network.bridges).length,
    });
    return { ok: true, manifest: deepFreeze(manifest) };
  }

  /** Like {@link compile}, but throws {@link ValidationFailedError} on any violation. */
  compileOrThrow(tree: ManifestTree): CompiledManifest {
    const result = this.compile(tree);
    if (!result.ok) {
      throw new ValidationFailedError(result.violations);
    }
    return result.manifest;
  }

  private expand(
    tree: ManifestTree,
    section: FleetSection,
    defaults: ClusterDefaults,
    templates: Record<string, ResolvedTemplate>,
  ): ExpansionResult {
    const expansion = expandFleet(tree[section], { section, defaults, templates });
    this.logger.debug(`Expanded ${section}`, {
      kind: SECTION_KIND[section],
      entries: Object.keys(tree[section]).length,
      instances: Object.keys(expansion.instances).length,
    });
    return expansion;
  }

  private talosVersionFromImages(tree: ManifestTree): string | undefined {
    const key = Object.keys(tree.images).sort().find((k) => tree.images[k].distro === "talos");
    return key === undefined ? undefined : resolveRelease(tree.images[key].release, tree.versions);
  }
}
