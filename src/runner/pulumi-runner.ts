import * as proxmoxve from "@muhlba91/pulumi-proxmoxve";
import * as pulumi from "@pulumi/pulumi";
import * as automation from "@pulumi/pulumi/automation";
import type { ProxmoxSettings } from "../config/settings";
import type { CompiledManifest } from "../core/compiler";
import { FleetDeployment } from "../core/fleet-deployment";
import { ErrorHandler, describeError } from "../logging/error-handler";

export const PROJECT_NAME = "homelab-fleet";

export type PulumiAction = "preview" | "up" | "destroy";

export interface PulumiOptions {
  stack: string;
  action: PulumiAction;
  proxmox: ProxmoxSettings;
  snippetRoot?: string;
  logger?: ErrorHandler;
  onOutput?: (out: string) => void;
}

export interface PulumiSummary {
  action: PulumiAction;
  changes: Record<string, number | undefined>;
  outputs: Record<string, unknown>;
}

/** Inline program: one provider and one deployment component per stack. */
export function fleetProgram(
  manifest: CompiledManifest,
  proxmox: ProxmoxSettings,
  snippetRoot?: string,
): automation.PulumiFn {
  return async () => {
    const provider = new proxmoxve.Provider("proxmoxve", {
      endpoint: proxmox.endpoint,
      apiToken: proxmox.apiToken === undefined ? undefined : pulumi.secret(proxmox.apiToken),
      insecure: proxmox.insecure,
    });
    const deployment = new FleetDeployment("fleet", { manifest, provider, snippetRoot });

    return {
      virtualMachineIds: Object.fromEntries(
        Object.entries(deployment.virtualMachines).map(([name, vm]) => [name, vm.vmId]),
      ),
      containerIds: Object.fromEntries(
        Object.entries(deployment.containers).map(([name, ct]) => [name, ct.vmId]),
      ),
      bootstrapHead: manifest.cluster?.topology.bootstrapHead,
    };
  };
}

export async function runPulumi(manifest: CompiledManifest, opts: PulumiOptions): Promise<PulumiSummary> {
  const logger = opts.logger ?? new ErrorHandler();
  const onOutput = opts.onOutput ?? ((out: string) => process.stdout.write(out));

  try {
    const stack = await automation.LocalWorkspace.createOrSelectStack(
      {
        stackName: opts.stack,
        projectName: PROJECT_NAME,
        program: fleetProgram(manifest, opts.proxmox, opts.snippetRoot),
      },
      {
        projectSettings: {
          name: PROJECT_NAME,
          runtime: "nodejs",
          description: "Homelab fleet compiled from a declarative manifest",
        },
      },
    );
    logger.info(`Using Pulumi stack ${opts.stack}`, { action: opts.action });

    switch (opts.action) {
      case "destroy": {
        const result = await stack.destroy({ onOutput });
        logger.info("Destroy completed", { changes: result.summary.resourceChanges });
        return { action: opts.action, changes: { ...result.summary.resourceChanges }, outputs: {} };
      }
      case "preview": {
        const result = await stack.preview({ onOutput });
        logger.info("Preview completed", { changes: result.changeSummary });
        return { action: opts.action, changes: { ...result.changeSummary }, outputs: {} };
      }
      case "up": {
        const result = await stack.up({ onOutput });
        logger.info("Deployment completed", { changes: result.summary.resourceChanges });
        const outputs = Object.fromEntries(
          Object.entries(result.outputs).map(([key, output]) => [key, output.value]),
        );
        return { action: opts.action, changes: { ...result.summary.resourceChanges }, outputs };
      }
    }
  } catch (error) {
    logger.error(`Pulumi ${opts.action} failed: ${describeError(error)}`, error instanceof Error ? error : undefined);
    throw error;
  }
}
