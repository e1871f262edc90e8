/**
 * Settings and Configuration Manager
 * Resolves CLI options against the environment and built-in defaults.
 */

import { ErrorLevel, parseErrorLevel } from "../logging/error-handler";

export interface ProxmoxSettings {
  endpoint?: string;
  apiToken?: string;
  insecure: boolean;
}

export interface FleetSettings {
  /** Manifest index file listing the fragments in merge order. */
  manifest: string;
  logLevel: ErrorLevel;
  stack: string;
  proxmox: ProxmoxSettings;
}

export interface SettingsOverrides {
  manifest?: string;
  logLevel?: string;
  stack?: string;
  proxmox?: Partial<ProxmoxSettings>;
}

export const DEFAULT_SETTINGS: Readonly<Omit<FleetSettings, "proxmox">> = Object.freeze({
  manifest: "manifest/index.yaml",
  logLevel: ErrorLevel.INFO,
  stack: "dev",
});

const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value === "") {
    return undefined;
  }
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
};

export class SettingsManager {
  private config: FleetSettings;

  constructor(overrides: SettingsOverrides = {}, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.mergeWithDefaults(overrides);
  }

  private mergeWithDefaults(overrides: SettingsOverrides): FleetSettings {
    const env = this.env;
    const logLevel = overrides.logLevel ?? env.HOMELAB_LOG_LEVEL;
    const parsedLevel = parseErrorLevel(logLevel);
    if (logLevel !== undefined && logLevel !== "" && parsedLevel === undefined) {
      throw new Error(`Unknown log level "${logLevel}" (expected one of ${Object.values(ErrorLevel).join(", ")})`);
    }

    return {
      manifest: overrides.manifest ?? (env.HOMELAB_MANIFEST || DEFAULT_SETTINGS.manifest),
      logLevel: parsedLevel ?? DEFAULT_SETTINGS.logLevel,
      stack: overrides.stack ?? (env.HOMELAB_STACK || DEFAULT_SETTINGS.stack),
      proxmox: {
        endpoint: overrides.proxmox?.endpoint ?? (env.PROXMOX_VE_ENDPOINT || undefined),
        apiToken: overrides.proxmox?.apiToken ?? (env.PROXMOX_VE_API_TOKEN || undefined),
        insecure: overrides.proxmox?.insecure ?? parseBoolean(env.PROXMOX_VE_INSECURE) ?? false,
      },
    };
  }

  getConfig(): FleetSettings {
    return this.config;
  }

  updateConfig(updates: SettingsOverrides): void {
    this.config = this.mergeWithDefaults({
      manifest: this.config.manifest,
      logLevel: this.config.logLevel,
      stack: this.config.stack,
      ...updates,
      proxmox: { ...this.config.proxmox, ...updates.proxmox },
    });
  }
}
