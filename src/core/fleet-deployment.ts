import * as proxmoxve from "@muhlba91/pulumi-proxmoxve";
import * as pulumi from "@pulumi/pulumi";
import { CloneSource, CloudInitFiles, ImageSource, ProxmoxFactory } from "../providers/proxmox-factory";
import type { PreparedCloudInitConfigs } from "./cloud-init-configs";
import type { CompiledManifest } from "./compiler";
import type { ExpandedInstance } from "./fleet-expander";
import { networkKey } from "./network-flattener";
import type { CloudInitRefs, ResolvedTemplate } from "./template-resolver";

export interface FleetDeploymentArgs {
  manifest: CompiledManifest;
  provider?: proxmoxve.Provider;
  /** Directory that relative cloud-init snippet paths are resolved against. */
  snippetRoot?: string;
}

type SnippetKind = keyof PreparedCloudInitConfigs;

const SNIPPET_KINDS: readonly SnippetKind[] = ["user", "vendor", "network", "meta"];

/**
 * Applies a compiled manifest to Proxmox VE: images, cloud-init snippets,
 * bridges and VLANs, templates, then the expanded VMs and containers.
 * Bonds are left to the host network tooling.
 */
export class FleetDeployment extends pulumi.ComponentResource {
  public readonly images: Record<string, proxmoxve.download.File> = {};
  public readonly snippets: Record<SnippetKind, Record<string, proxmoxve.storage.File>> = {
    user: {},
    vendor: {},
    network: {},
    meta: {},
  };
  public readonly bridges: Record<string, proxmoxve.network.NetworkBridge> = {};
  public readonly vlans: Record<string, proxmoxve.network.NetworkVlan> = {};
  public readonly vmTemplates: Record<string, proxmoxve.vm.VirtualMachine> = {};
  public readonly containerTemplates: Record<string, proxmoxve.ct.Container> = {};
  public readonly virtualMachines: Record<string, proxmoxve.vm.VirtualMachine> = {};
  public readonly containers: Record<string, proxmoxve.ct.Container> = {};

  private readonly factory: ProxmoxFactory;

  constructor(name: string, args: FleetDeploymentArgs, opts?: pulumi.ComponentResourceOptions) {
    super("homelab:fleet:FleetDeployment", name, {}, opts);

    const { manifest } = args;
    this.factory = new ProxmoxFactory(name, args.provider, this, args.snippetRoot);

    for (const [key, image] of Object.entries(manifest.images)) {
      const { url } = image;
      // Images without a download URL are expected on the datastore already.
      if (url !== undefined) {
        this.images[key] = this.factory.createImage({ ...image, url });
      }
    }
    for (const kind of SNIPPET_KINDS) {
      for (const [key, config] of Object.entries(manifest.cloudInitConfigs[kind])) {
        this.snippets[kind][key] = this.factory.createSnippet(kind, config);
      }
    }

    this.deployNetwork(manifest);
    this.deployTemplates(manifest);

    const network = [...Object.values(this.bridges), ...Object.values(this.vlans)];
    for (const [name, instance] of Object.entries(manifest.virtualMachines)) {
      this.virtualMachines[name] = this.factory.createVM(
        instance,
        this.cloneSource(instance, this.vmTemplates[instance.templateId]),
        network,
      );
    }
    for (const [name, instance] of Object.entries(manifest.containers)) {
      this.containers[name] = this.factory.createContainer(
        instance,
        this.cloneSource(instance, this.containerTemplates[instance.templateId]),
        network,
      );
    }

    this.registerOutputs({
      virtualMachineIds: Object.fromEntries(
        Object.entries(this.virtualMachines).map(([key, vm]) => [key, vm.vmId]),
      ),
      containerIds: Object.fromEntries(
        Object.entries(this.containers).map(([key, ct]) => [key, ct.vmId]),
      ),
    });
  }

  private deployNetwork(manifest: CompiledManifest): void {
    for (const [key, bridge] of Object.entries(manifest.network.bridges)) {
      this.bridges[key] = this.factory.createBridge(key, bridge);
    }
    for (const [key, vlan] of Object.entries(manifest.network.vlans)) {
      // A VLAN on top of a managed bridge needs that bridge first.
      const parent = this.bridges[networkKey(vlan.target_node, vlan.interface)];
      this.vlans[key] = this.factory.createVlan(key, vlan, parent ? [parent] : []);
    }
  }

  private deployTemplates(manifest: CompiledManifest): void {
    for (const [key, template] of Object.entries(manifest.vmTemplates)) {
      this.vmTemplates[key] = this.factory.createVMTemplate(
        template,
        this.imageSource(manifest, template.image),
        this.cloudInitFiles(template),
      );
    }
    for (const [key, template] of Object.entries(manifest.containerTemplates)) {
      this.containerTemplates[key] = this.factory.createContainerTemplate(
        template,
        this.imageSource(manifest, template.image),
      );
    }
  }

  private imageSource(manifest: CompiledManifest, key: string): ImageSource | undefined {
    const download = this.images[key];
    if (download !== undefined) {
      return { fileId: download.id, resource: download };
    }
    const image = manifest.images[key];
    return image === undefined ? undefined : { fileId: image.volumeId };
  }

  private cloudInitFiles(template: ResolvedTemplate): CloudInitFiles {
    const refs: CloudInitRefs = template.cloudInit;
    const fileId = (kind: SnippetKind, key: string | undefined): pulumi.Output<string> | undefined =>
      key === undefined ? undefined : this.snippets[kind][key]?.id;

    return {
      userDataFileId: fileId("user", refs.userDataId),
      vendorDataFileId: fileId("vendor", refs.vendorDataId),
      networkDataFileId: fileId("network", refs.networkDataId),
      metaDataFileId: fileId("meta", refs.metaDataId),
    };
  }

  private cloneSource(
    instance: ExpandedInstance,
    template: { vmId: pulumi.Output<number> } & pulumi.Resource | undefined,
  ): CloneSource | undefined {
    if (template !== undefined) {
      return {
        vmId: template.vmId,
        nodeName: instance.templateNode ?? instance.targetNode,
        resource: template,
      };
    }
    if (instance.templateVmId !== undefined) {
      return {
        vmId: instance.templateVmId,
        nodeName: instance.templateNode ?? instance.targetNode,
      };
    }
    return undefined;
  }
}
