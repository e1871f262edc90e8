#!/usr/bin/env node
import { Argument, Command, CommanderError, InvalidArgumentError, Option } from "commander";
import fs from "fs";
import path from "path";
import * as YAML from "yaml";
import { z } from "zod";
import { SettingsManager } from "../config/settings";
import { loadManifest, loadManifestIndex, readDocument } from "../config/manifest-loader";
import { toBootstrapInput } from "../core/cluster-topology";
import { CompiledManifest, ManifestCompiler } from "../core/compiler";
import { deriveMAC } from "../core/identifiers";
import {
  DerivationOverflowError,
  ErrorHandler,
  ManifestLoadError,
  TopologyError,
  ValidationFailedError,
  describeError,
  formatViolation,
} from "../logging/error-handler";
import { ManifestFragmentSchema } from "../types/schemas";

export const EXIT_OK = 0;
export const EXIT_VALIDATION = 1;
export const EXIT_LOAD = 2;
export const EXIT_UNEXPECTED = 99;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

interface GlobalOptions {
  logLevel?: string;
}

interface ManifestOptions {
  manifest?: string;
}

interface CompileOptions extends ManifestOptions {
  format: "json" | "yaml";
  output?: string;
}

interface TopologyOptions extends ManifestOptions {
  addresses?: string;
}

interface DeployOptions extends ManifestOptions {
  stack?: string;
  preview: boolean;
  destroy: boolean;
}

const AddressBookSchema = z.record(z.string(), z.string().min(1));

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  if (error instanceof ManifestLoadError) {
    return EXIT_LOAD;
  }
  if (
    error instanceof ValidationFailedError ||
    error instanceof DerivationOverflowError ||
    error instanceof TopologyError
  ) {
    return EXIT_VALIDATION;
  }
  return EXIT_UNEXPECTED;
}

export function createProgram(io: CliIO): Command {
  const program = new Command();
  const print = (text: string) => io.stdout(`${text}\n`);

  const context = (opts: ManifestOptions) => {
    const globals = program.opts<GlobalOptions>();
    const settings = new SettingsManager(
      { manifest: opts.manifest, logLevel: globals.logLevel },
      io.env,
    ).getConfig();
    const logger = new ErrorHandler({ minLevel: settings.logLevel, write: (line) => io.stderr(`${line}\n`) });
    return { settings, logger };
  };

  const compileFrom = (opts: ManifestOptions): { manifest: CompiledManifest; context: ReturnType<typeof context> } => {
    const ctx = context(opts);
    const tree = loadManifest(loadManifestIndex(ctx.settings.manifest), ctx.logger);
    const result = new ManifestCompiler(ctx.logger).compile(tree);
    if (!result.ok) {
      result.violations.forEach((violation) => io.stderr(`${formatViolation(violation)}\n`));
      throw new ValidationFailedError(result.violations);
    }
    return { manifest: result.manifest, context: ctx };
  };

  program
    .name("homelab-fleet")
    .description("Compile, validate and deploy a declarative homelab fleet manifest")
    .version("1.0.0")
    .option("--log-level <level>", "DEBUG, INFO, WARN, ERROR or FATAL")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command("validate")
    .description("Load and compile the manifest, reporting every violation")
    .option("-m, --manifest <path>", "Manifest index file")
    .action((opts: ManifestOptions) => {
      const { manifest } = compileFrom(opts);
      print(
        `Manifest is valid: ${Object.keys(manifest.virtualMachines).length} VM(s), ` +
        `${Object.keys(manifest.containers).length} container(s)`,
      );
    });

  program
    .command("compile")
    .description("Print the compiled manifest")
    .option("-m, --manifest <path>", "Manifest index file")
    .addOption(new Option("-f, --format <format>", "Output format").choices(["json", "yaml"]).default("json"))
    .option("-o, --output <path>", "Write to a file instead of stdout")
    .action((opts: CompileOptions) => {
      const { manifest, context: ctx } = compileFrom(opts);
      const text = opts.format === "yaml" ? YAML.stringify(manifest) : `${JSON.stringify(manifest, null, 2)}\n`;
      if (opts.output) {
        fs.mkdirSync(path.dirname(path.resolve(opts.output)), { recursive: true });
        fs.writeFileSync(opts.output, text, "utf8");
        ctx.logger.info(`Wrote compiled manifest to ${opts.output}`);
      } else {
        io.stdout(text);
      }
    });

  program
    .command("topology")
    .description("Print the cluster topology, or the bootstrap input when addresses are given")
    .option("-m, --manifest <path>", "Manifest index file")
    .option("-a, --addresses <path>", "YAML or JSON mapping of instance name to address")
    .action((opts: TopologyOptions) => {
      const { manifest } = compileFrom(opts);
      if (manifest.cluster === undefined) {
        throw new TopologyError("Manifest declares no cluster section");
      }
      if (opts.addresses === undefined) {
        print(JSON.stringify(manifest.cluster.topology, null, 2));
        return;
      }
      const addresses = AddressBookSchema.safeParse(readDocument(opts.addresses));
      if (!addresses.success) {
        throw new ManifestLoadError(
          `Invalid address file ${opts.addresses}`,
          addresses.error.issues.map((issue) => ({
            file: opts.addresses ?? "",
            path: issue.path.join(".") || "root",
            message: issue.message,
          })),
        );
      }
      print(JSON.stringify(toBootstrapInput(manifest.cluster.topology, addresses.data), null, 2));
    });

  program
    .command("mac")
    .description("Derive the MAC address of one NIC")
    .addArgument(new Argument("<kind>", "Resource kind").choices(["vm", "container"]))
    .addArgument(new Argument("<id>", "Numeric instance ID").argParser(parseInteger))
    .addArgument(new Argument("[nic]", "NIC index").argParser(parseInteger).default(0))
    .action((kind: "vm" | "container", id: number, nic: number) => {
      print(deriveMAC(kind, id, nic));
    });

  program
    .command("schema:emit")
    .description("Emit the JSON Schema of a manifest fragment")
    .option("-o, --output <path>", "Output file (stdout when omitted)")
    .action(async (opts: { output?: string }) => {
      const { zodToJsonSchema } = await import("zod-to-json-schema");
      const schema = JSON.stringify(zodToJsonSchema(ManifestFragmentSchema, "ManifestFragment"), null, 2);
      if (opts.output) {
        fs.mkdirSync(path.dirname(path.resolve(opts.output)), { recursive: true });
        fs.writeFileSync(opts.output, `${schema}\n`, "utf8");
      } else {
        print(schema);
      }
    });

  program
    .command("deploy")
    .description("Apply the compiled manifest to Proxmox VE through Pulumi")
    .option("-m, --manifest <path>", "Manifest index file")
    .option("--stack <name>", "Pulumi stack name")
    .option("--preview", "Preview only", false)
    .option("--destroy", "Destroy the stack", false)
    .action(async (opts: DeployOptions) => {
      const { manifest, context: ctx } = compileFrom(opts);
      const { runPulumi } = await import("../runner/pulumi-runner");
      const settings = new SettingsManager(
        { manifest: ctx.settings.manifest, logLevel: ctx.settings.logLevel, stack: opts.stack },
        io.env,
      ).getConfig();
      await runPulumi(manifest, {
        stack: settings.stack,
        action: opts.destroy ? "destroy" : opts.preview ? "preview" : "up",
        proxmox: settings.proxmox,
        snippetRoot: path.dirname(path.resolve(settings.manifest)),
        logger: ctx.logger,
        onOutput: io.stdout,
      });
    });

  return program;
}

/** Runs the CLI and returns the process exit code. */
export async function main(argv: string[], io: CliIO): Promise<number> {
  try {
    await createProgram(io).parseAsync(argv);
    return EXIT_OK;
  } catch (error) {
    // Commander has already written its own message.
    if (!(error instanceof CommanderError)) {
      io.stderr(`${describeError(error)}\n`);
    }
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  main(process.argv, {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
  }).then((code) => {
    process.exitCode = code;
  }, (error: unknown) => {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = EXIT_UNEXPECTED;
  });
}
