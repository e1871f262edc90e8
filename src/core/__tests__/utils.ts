import type { z } from "zod";
import { resolveDefaults } from "../../config/defaults";
import { ErrorHandler } from "../../logging/error-handler";
import { ManifestSchema, ManifestTree } from "../../types/schemas";
import { ExpandedInstance, expandFleet } from "../fleet-expander";
import type { ResolvedTemplate } from "../template-resolver";
import { resolveTemplates } from "../template-resolver";

export type ManifestInput = z.input<typeof ManifestSchema>;

export const SAMPLE_MANIFEST = `${__dirname}/../../../manifest/index.yaml`;

export function buildTree(input: ManifestInput = {}): ManifestTree {
  return ManifestSchema.parse(input);
}

export function silentLogger(): ErrorHandler {
  return new ErrorHandler({ silent: true });
}

export function vmTemplate(overrides: Partial<ResolvedTemplate> = {}): ResolvedTemplate {
  return {
    key: "base",
    kind: "vm",
    vmId: 9000,
    image: "debian_cloud",
    targetNode: "pve",
    targetDatastore: "local-lvm",
    osType: "l26",
    description: "base template",
    tags: ["template", "vm"],
    cloudInit: {},
    ...overrides,
  };
}

/** Expands both fleet sections the way the compiler does. */
export function expandAll(tree: ManifestTree): {
  virtual_machines: Record<string, ExpandedInstance>;
  containers: Record<string, ExpandedInstance>;
} {
  const defaults = resolveDefaults(tree);
  return {
    virtual_machines: expandFleet(tree.virtual_machines, {
      section: "virtual_machines",
      defaults,
      templates: resolveTemplates("vm", tree, defaults),
    }).instances,
    containers: expandFleet(tree.containers, {
      section: "containers",
      defaults,
      templates: resolveTemplates("container", tree, defaults),
    }).instances,
  };
}
