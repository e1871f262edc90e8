import { FALLBACK_DEFAULTS } from "../../config/defaults";
import { resolveTemplates } from "../template-resolver";
import { buildTree } from "./utils";

const tree = buildTree({
  resource_policies: { small: { cores: 2, memory: 2048, disk_size: 20 } },
  vm_cloud_init_profiles: {
    debian: { ci_user_data_id: "debian_user", ci_vendor_data_id: "" },
  },
  vm_templates: {
    debian_base: {
      vm_id: 9001,
      image: "debian_cloud",
      resource_policy: "small",
      cloud_init_profile: "debian",
      cores: 4,
    },
    talos_base: { vm_id: 9000, image: "talos", bios: "ovmf", target_node: "pve-2" },
    custom: { image: "talos", bios: "ovmf", machine_type: "pc" },
  },
  container_templates: {
    debian_ct: { vm_id: 9100, image: "debian_lxc", resource_policy: "small", target_datastore: "fast" },
  },
});

describe("resolveTemplates", () => {
  test("resolves VM templates against policies, profiles and defaults", () => {
    const templates = resolveTemplates("vm", tree, FALLBACK_DEFAULTS);

    expect(Object.keys(templates)).toEqual(["custom", "debian_base", "talos_base"]);
    expect(templates.debian_base).toEqual({
      key: "debian_base",
      kind: "vm",
      vmId: 9001,
      image: "debian_cloud",
      targetNode: "pve",
      targetDatastore: "local-lvm",
      cores: 4,
      memory: 2048,
      diskSize: 20,
      osType: "l26",
      bios: undefined,
      machineType: undefined,
      description: "debian_base template",
      tags: ["template", "vm"],
      cloudInit: {
        userDataId: "debian_user",
        vendorDataId: undefined,
        networkDataId: undefined,
        metaDataId: undefined,
      },
    });
  });

  test("selects q35 for UEFI templates unless a machine type is given", () => {
    const templates = resolveTemplates("vm", tree, FALLBACK_DEFAULTS);

    expect(templates.talos_base.machineType).toBe("q35");
    expect(templates.talos_base.targetNode).toBe("pve-2");
    expect(templates.custom.machineType).toBe("pc");
  });

  test("resolves container templates without cloud-init", () => {
    const templates = resolveTemplates("container", tree, FALLBACK_DEFAULTS);

    expect(templates).toEqual({
      debian_ct: {
        key: "debian_ct",
        kind: "container",
        vmId: 9100,
        image: "debian_lxc",
        targetNode: "pve",
        targetDatastore: "fast",
        cores: 2,
        memory: 2048,
        diskSize: 20,
        osType: "linux",
        description: "debian_ct container template",
        tags: ["template", "lxc"],
        cloudInit: {},
      },
    });
  });

  test("leaves hardware unset when neither template nor policy gives it", () => {
    const templates = resolveTemplates("vm", tree, FALLBACK_DEFAULTS);

    expect([templates.custom.cores, templates.custom.memory, templates.custom.diskSize]).toEqual([
      undefined,
      undefined,
      undefined,
    ]);
  });
});
