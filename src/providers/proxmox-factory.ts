import * as proxmoxve from "@muhlba91/pulumi-proxmoxve";
import * as pulumi from "@pulumi/pulumi";
import path from "path";
import type { PreparedCloudInitConfig } from "../core/cloud-init-configs";
import type { ExpandedInstance } from "../core/fleet-expander";
import type { PreparedImage } from "../core/image-catalog";
import type { Flattened } from "../core/network-flattener";
import type { ResolvedTemplate } from "../core/template-resolver";
import type { BridgeConfig, VlanConfig } from "../types/schemas";

/** Source of a clone: the template resource when it is managed here, else its raw ID. */
export interface CloneSource {
  vmId: pulumi.Input<number>;
  nodeName: string;
  resource?: pulumi.Resource;
}

/** Volume an image lives in; `resource` is set when the download is managed here. */
export interface ImageSource {
  fileId: pulumi.Input<string>;
  resource?: pulumi.Resource;
}

export interface CloudInitFiles {
  userDataFileId?: pulumi.Input<string>;
  vendorDataFileId?: pulumi.Input<string>;
  networkDataFileId?: pulumi.Input<string>;
  metaDataFileId?: pulumi.Input<string>;
}

export class ProxmoxFactory {
  constructor(
    private readonly name: string,
    private readonly provider: proxmoxve.Provider | undefined,
    private readonly parent: pulumi.ComponentResource,
    private readonly snippetRoot: string = process.cwd(),
  ) {}

  /** `<deployment>-<kind>-<key>`, with underscores turned into dashes. */
  private resourceName(kind: string, key: string): string {
    return `${this.name}-${kind}-${key.replace(/_/g, "-")}`;
  }

  private options(dependsOn: pulumi.Resource[] = []): pulumi.CustomResourceOptions {
    return { provider: this.provider, parent: this.parent, dependsOn };
  }

  createImage(image: PreparedImage & { url: string }): proxmoxve.download.File {
    return new proxmoxve.download.File(this.resourceName("image", image.key), {
      nodeName: image.targetNode,
      datastoreId: image.targetDatastore,
      contentType: image.type,
      url: image.url,
      fileName: image.fileName,
      checksum: image.checksum,
      checksumAlgorithm: image.checksumAlgorithm,
      overwriteUnmanaged: true,
    }, { ...this.options(), retainOnDelete: true });
  }

  createSnippet(kind: string, config: PreparedCloudInitConfig): proxmoxve.storage.File {
    return new proxmoxve.storage.File(this.resourceName(`ci-${kind}`, config.key), {
      nodeName: config.targetNode,
      datastoreId: config.targetDatastore,
      contentType: "snippets",
      sourceFile: {
        path: path.resolve(this.snippetRoot, config.file),
      },
    }, this.options());
  }

  createBridge(key: string, bridge: Flattened<BridgeConfig>): proxmoxve.network.NetworkBridge {
    return new proxmoxve.network.NetworkBridge(this.resourceName("bridge", key), {
      nodeName: bridge.target_node,
      name: bridge.name,
      ports: bridge.ports,
      vlanAware: bridge.vlan_aware,
      address: bridge.address,
      gateway: bridge.gateway,
      mtu: bridge.mtu,
      autostart: bridge.autostart ?? true,
      comment: bridge.comment,
    }, this.options());
  }

  createVlan(key: string, vlan: Flattened<VlanConfig>, dependsOn: pulumi.Resource[]): proxmoxve.network.NetworkVlan {
    return new proxmoxve.network.NetworkVlan(this.resourceName("vlan", key), {
      nodeName: vlan.target_node,
      name: vlan.name,
      interface: vlan.interface,
      vlan: vlan.vlan_id,
      address: vlan.address,
      gateway: vlan.gateway,
      mtu: vlan.mtu,
      comment: vlan.comment,
    }, this.options(dependsOn));
  }

  createVMTemplate(
    template: ResolvedTemplate,
    image: ImageSource | undefined,
    cloudInit: CloudInitFiles,
  ): proxmoxve.vm.VirtualMachine {
    const dependsOn = image?.resource ? [image.resource] : [];
    return new proxmoxve.vm.VirtualMachine(this.resourceName("template", template.key), {
      nodeName: template.targetNode,
      vmId: template.vmId,
      name: template.key.replace(/_/g, "-"),
      description: template.description,
      tags: template.tags,
      template: true,
      started: false,
      bios: template.bios,
      machine: template.machineType,
      operatingSystem: { type: template.osType },
      cpu: { cores: template.cores },
      memory: { dedicated: template.memory },
      disks: [{
        interface: "scsi0",
        datastoreId: template.targetDatastore,
        fileId: image?.fileId,
        size: template.diskSize,
      }],
      initialization: {
        datastoreId: template.targetDatastore,
        ...cloudInit,
      },
    }, this.options(dependsOn));
  }

  createContainerTemplate(
    template: ResolvedTemplate,
    image: ImageSource | undefined,
  ): proxmoxve.ct.Container {
    const dependsOn = image?.resource ? [image.resource] : [];
    return new proxmoxve.ct.Container(this.resourceName("ct-template", template.key), {
      nodeName: template.targetNode,
      vmId: template.vmId,
      description: template.description,
      tags: template.tags,
      template: true,
      unprivileged: true,
      operatingSystem: {
        templateFileId: image ? image.fileId : template.image,
        type: template.osType,
      },
      cpu: { cores: template.cores },
      memory: { dedicated: template.memory },
      disk: {
        datastoreId: template.targetDatastore,
        size: template.diskSize,
      },
    }, this.options(dependsOn));
  }

  createVM(instance: ExpandedInstance, source: CloneSource | undefined, dependsOn: pulumi.Resource[]): proxmoxve.vm.VirtualMachine {
    return new proxmoxve.vm.VirtualMachine(this.resourceName("vm", instance.name), {
      nodeName: instance.targetNode,
      vmId: instance.id,
      name: instance.hostname,
      description: instance.description,
      tags: instance.tags,
      protection: instance.protection,
      ...(source && {
        clone: {
          vmId: source.vmId,
          nodeName: source.nodeName,
          datastoreId: instance.datastore,
          full: true,
        },
      }),
      cpu: { cores: instance.cores },
      memory: { dedicated: instance.memory },
      disks: instance.disks.map((disk) => ({
        interface: disk.interface ?? "scsi1",
        datastoreId: disk.datastore,
        size: disk.size,
        fileFormat: disk.fileFormat,
      })),
      networkDevices: instance.nics.map((nic) => ({
        bridge: nic.bridge,
        model: nic.model ?? "virtio",
        vlanId: nic.vlanId,
        macAddress: nic.macAddress,
        mtu: nic.mtu,
      })),
    }, this.options(source?.resource ? [source.resource, ...dependsOn] : dependsOn));
  }

  createContainer(instance: ExpandedInstance, source: CloneSource | undefined, dependsOn: pulumi.Resource[]): proxmoxve.ct.Container {
    return new proxmoxve.ct.Container(this.resourceName("ct", instance.name), {
      nodeName: instance.targetNode,
      vmId: instance.id,
      description: instance.description,
      tags: instance.tags,
      protection: instance.protection,
      unprivileged: true,
      ...(source && {
        clone: {
          vmId: source.vmId,
          nodeName: source.nodeName,
          datastoreId: instance.datastore,
        },
      }),
      cpu: { cores: instance.cores },
      memory: { dedicated: instance.memory },
      initialization: { hostname: instance.hostname },
      networkInterfaces: instance.nics.map((nic) => ({
        name: `eth${nic.index}`,
        bridge: nic.bridge,
        vlanId: nic.vlanId,
        macAddress: nic.macAddress,
        mtu: nic.mtu,
      })),
      mountPoints: instance.disks.map((disk) => ({
        volume: disk.datastore,
        size: `${disk.size}G`,
        path: disk.mountPoint ?? "/mnt/data",
      })),
    }, this.options(source?.resource ? [source.resource, ...dependsOn] : dependsOn));
  }
}
