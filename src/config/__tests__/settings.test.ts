import { ErrorLevel } from "../../logging/error-handler";
import { DEFAULT_SETTINGS, SettingsManager } from "../settings";

describe("SettingsManager", () => {
  test("uses built-in defaults with an empty environment", () => {
    expect(new SettingsManager({}, {}).getConfig()).toEqual({
      manifest: DEFAULT_SETTINGS.manifest,
      logLevel: ErrorLevel.INFO,
      stack: "dev",
      proxmox: { endpoint: undefined, apiToken: undefined, insecure: false },
    });
  });

  test("reads the environment", () => {
    const settings = new SettingsManager({}, {
      HOMELAB_MANIFEST: "fleet/index.yaml",
      HOMELAB_LOG_LEVEL: "debug",
      HOMELAB_STACK: "prod",
      PROXMOX_VE_ENDPOINT: "https://pve.example:8006/",
      PROXMOX_VE_API_TOKEN: "test-token",
      PROXMOX_VE_INSECURE: "yes",
    }).getConfig();

    expect(settings).toEqual({
      manifest: "fleet/index.yaml",
      logLevel: ErrorLevel.DEBUG,
      stack: "prod",
      proxmox: { endpoint: "https://pve.example:8006/", apiToken: "test-token", insecure: true },
    });
  });

  test("lets explicit options override the environment", () => {
    const settings = new SettingsManager(
      { manifest: "other.yaml", logLevel: "warn", proxmox: { insecure: false } },
      { HOMELAB_MANIFEST: "fleet/index.yaml", HOMELAB_LOG_LEVEL: "debug", PROXMOX_VE_INSECURE: "1" },
    ).getConfig();

    expect([settings.manifest, settings.logLevel, settings.proxmox.insecure]).toEqual([
      "other.yaml",
      ErrorLevel.WARN,
      false,
    ]);
  });

  test("ignores empty environment values", () => {
    const settings = new SettingsManager({}, { HOMELAB_STACK: "", HOMELAB_LOG_LEVEL: "" }).getConfig();

    expect([settings.stack, settings.logLevel]).toEqual(["dev", ErrorLevel.INFO]);
  });

  test("rejects an unknown log level", () => {
    expect(() => new SettingsManager({ logLevel: "loud" }, {})).toThrow(
      'Unknown log level "loud" (expected one of DEBUG, INFO, WARN, ERROR, FATAL)',
    );
  });

  test("updateConfig keeps what it is not given", () => {
    const manager = new SettingsManager({ manifest: "a.yaml", proxmox: { endpoint: "https://pve.example:8006/" } }, {});
    manager.updateConfig({ stack: "staging", proxmox: { insecure: true } });

    expect(manager.getConfig()).toEqual({
      manifest: "a.yaml",
      logLevel: ErrorLevel.INFO,
      stack: "staging",
      proxmox: { endpoint: "https://pve.example:8006/", apiToken: undefined, insecure: true },
    });
  });
});
