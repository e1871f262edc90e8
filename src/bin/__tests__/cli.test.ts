import fs from "fs";
import os from "os";
import path from "path";
import * as YAML from "yaml";
import { DerivationOverflowError, ManifestLoadError, ValidationFailedError } from "../../logging/error-handler";
import { EXIT_LOAD, EXIT_OK, EXIT_UNEXPECTED, EXIT_VALIDATION, exitCodeFor, main } from "../cli";

const SAMPLE_INDEX = path.join(__dirname, "..", "..", "..", "manifest", "index.yaml");

interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

async function run(...args: string[]): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const code = await main(["node", "homelab-fleet", ...args], {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    env: {},
  });
  return { code, stdout: stdout.join(""), stderr: stderr.join("") };
}

describe("homelab-fleet CLI", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "fleet-cli-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeManifest = (fragment: string): string => {
    fs.writeFileSync(path.join(dir, "fleet.yaml"), fragment, "utf8");
    const index = path.join(dir, "index.yaml");
    fs.writeFileSync(index, "fragments:\n  - fleet.yaml\n", "utf8");
    return index;
  };

  test("prints the version", async () => {
    expect(await run("--version")).toEqual({ code: EXIT_OK, stdout: "1.0.0\n", stderr: "" });
  });

  describe("mac", () => {
    test("derives a VM MAC for the first NIC by default", async () => {
      expect(await run("mac", "vm", "2000")).toEqual({ code: EXIT_OK, stdout: "02:01:00:07:d0:00\n", stderr: "" });
    });

    test("derives a container MAC for a given NIC", async () => {
      expect((await run("mac", "container", "2000", "1")).stdout).toBe("02:02:00:07:d0:01\n");
    });

    test("fails on an ID that does not fit the MAC", async () => {
      const result = await run("mac", "vm", "16777216");

      expect(result.code).toBe(EXIT_VALIDATION);
      expect(result.stderr).toBe("ID 16777216 cannot be encoded in a derived MAC (allowed 0-16777215)\n");
    });

    test("rejects an unknown kind through commander", async () => {
      const result = await run("mac", "disk", "1");

      expect(result.code).toBe(1);
      expect(result.stdout).toBe("");
    });
  });

  describe("validate", () => {
    test("accepts the sample manifest", async () => {
      const result = await run("validate", "-m", SAMPLE_INDEX);

      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe("Manifest is valid: 6 VM(s), 1 container(s)\n");
      expect(result.stderr).toContain("INFO: Manifest compiled");
    });

    test("prints every violation and exits with the validation code", async () => {
      const index = writeManifest([
        "nodes:",
        "  pve:",
        "    address: 10.0.0.1",
        "virtual_machines:",
        "  web:",
        "    template_id: ghost",
        "  worker:",
        "    template_id: ghost",
        "    count: 2",
        "    vm_id: 300",
        "    vm_id_start: 300",
      ].join("\n"));

      const result = await run("--log-level", "error", "validate", "-m", index);

      expect(result.code).toBe(EXIT_VALIDATION);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe([
        "virtual_machines.worker.vm_id [shape-exclusive]: batch entry (count 2) cannot declare a single vm_id; use vm_id_start",
        'virtual_machines.web.template_id [unknown-reference]: "ghost" is not defined in vm_templates',
        'virtual_machines.worker.template_id [unknown-reference]: "ghost" is not defined in vm_templates',
        "Manifest has 3 violation(s)",
        "",
      ].join("\n"));
    });

    test("exits with the load code when the manifest cannot be read", async () => {
      const result = await run("validate", "-m", path.join(dir, "missing.yaml"));

      expect(result.code).toBe(EXIT_LOAD);
      expect(result.stderr).toMatch(/^Cannot read manifest file /);
    });

    test("exits with the unexpected code on an unknown log level", async () => {
      const result = await run("--log-level", "loud", "validate", "-m", SAMPLE_INDEX);

      expect(result.code).toBe(EXIT_UNEXPECTED);
      expect(result.stderr).toBe('Unknown log level "loud" (expected one of DEBUG, INFO, WARN, ERROR, FATAL)\n');
    });
  });

  describe("compile", () => {
    test("prints JSON by default", async () => {
      const result = await run("--log-level", "error", "compile", "-m", SAMPLE_INDEX);
      const manifest = JSON.parse(result.stdout);

      expect(result.code).toBe(EXIT_OK);
      expect(Object.keys(manifest.containers)).toEqual(["dns"]);
      expect(manifest.virtualMachines.bastion.nics[0].macAddress).toBe("02:01:00:04:b0:00");
    });

    test("prints YAML on request", async () => {
      const result = await run("--log-level", "error", "compile", "-m", SAMPLE_INDEX, "-f", "yaml");

      expect(YAML.parse(result.stdout).cluster.topology.bootstrapHead).toBe("talos_cp_1");
    });

    test("writes to a file", async () => {
      const output = path.join(dir, "out", "compiled.json");
      const result = await run("--log-level", "error", "compile", "-m", SAMPLE_INDEX, "-o", output);

      expect(result.stdout).toBe("");
      expect(JSON.parse(fs.readFileSync(output, "utf8")).cluster.name).toBe("homelab");
    });
  });

  describe("topology", () => {
    test("prints the selected topology", async () => {
      const result = await run("--log-level", "error", "topology", "-m", SAMPLE_INDEX);

      expect(JSON.parse(result.stdout)).toEqual({
        controlPlane: ["talos_cp_1", "talos_cp_2", "talos_cp_3"],
        dataPlane: ["talos_dp_1", "talos_dp_2"],
        bootstrapHead: "talos_cp_1",
      });
    });

    test("prints the bootstrap input when addresses are given", async () => {
      const addresses = path.join(dir, "addresses.yaml");
      fs.writeFileSync(addresses, [
        "talos_cp_1: 10.0.20.11",
        "talos_cp_2: 10.0.20.12",
        "talos_cp_3: 10.0.20.13",
        "talos_dp_1: 10.0.20.21",
        "talos_dp_2: 10.0.20.22",
      ].join("\n"), "utf8");

      const result = await run("--log-level", "error", "topology", "-m", SAMPLE_INDEX, "-a", addresses);

      expect(JSON.parse(result.stdout)).toEqual({
        bootstrapHeadAddress: "10.0.20.11",
        controlPlaneAddresses: ["10.0.20.11", "10.0.20.12", "10.0.20.13"],
        dataPlaneAddresses: ["10.0.20.21", "10.0.20.22"],
      });
    });

    test("fails when the manifest has no cluster", async () => {
      const index = writeManifest("nodes:\n  pve:\n    address: 10.0.0.1\n");
      const result = await run("--log-level", "error", "topology", "-m", index);

      expect(result.code).toBe(EXIT_VALIDATION);
      expect(result.stderr).toBe("Manifest declares no cluster section\n");
    });
  });

  test("schema:emit prints the fragment JSON Schema", async () => {
    const result = await run("schema:emit");
    const schema = JSON.parse(result.stdout);

    expect(result.code).toBe(EXIT_OK);
    expect(schema.$ref).toBe("#/definitions/ManifestFragment");
    expect(schema.definitions.ManifestFragment.type).toBe("object");
    expect(Object.keys(schema.definitions.ManifestFragment.properties)).toContain("virtual_machines");
  });
});

describe("exitCodeFor", () => {
  test("maps error classes to exit codes", () => {
    expect(exitCodeFor(new ManifestLoadError("bad"))).toBe(EXIT_LOAD);
    expect(exitCodeFor(new ValidationFailedError([]))).toBe(EXIT_VALIDATION);
    expect(exitCodeFor(new DerivationOverflowError("too big", 1))).toBe(EXIT_VALIDATION);
    expect(exitCodeFor(new Error("other"))).toBe(EXIT_UNEXPECTED);
  });
});
