import fs from "fs";
import path from "path";
import * as YAML from "yaml";
import type { ZodIssue } from "zod";
import {
  ManifestIndexSchema,
  ManifestSchema,
  ManifestTree,
  parseFragmentSafe,
} from "../types/schemas";
import {
  ErrorHandler,
  ManifestIssue,
  ManifestLoadError,
  describeError,
} from "../logging/error-handler";

export interface LoadedFragment {
  file: string;
  data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `containers:` with no value parses as null; such a section is absent. */
function dropEmptySections(document: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(document).filter(([, value]) => value !== null));
}

function toIssues(file: string, issues: ZodIssue[]): ManifestIssue[] {
  return issues.map((issue) => ({
    file,
    path: issue.path.length > 0 ? issue.path.join(".") : "root",
    message: issue.message,
  }));
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return [...duplicates];
}

export function readDocument(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new ManifestLoadError(`Cannot read manifest file ${file}: ${describeError(error)}`);
  }
  try {
    return file.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error) {
    throw new ManifestLoadError(`Cannot parse manifest file ${file}: ${describeError(error)}`);
  }
}

/**
 * Reads an index document (`fragments: [...]`) and returns the fragment paths,
 * resolved against the index directory, in the declared order.
 */
export function loadManifestIndex(indexPath: string): string[] {
  const result = ManifestIndexSchema.safeParse(readDocument(indexPath));
  if (!result.success) {
    throw new ManifestLoadError(`Invalid manifest index ${indexPath}`, toIssues(indexPath, result.error.issues));
  }
  const baseDir = path.dirname(path.resolve(indexPath));
  return result.data.fragments.map((fragment) => path.resolve(baseDir, fragment));
}

/**
 * Merges fragments in order. Every top-level key of a section is replaced as a
 * whole by a later fragment declaring the same key; overrides are logged.
 */
export function mergeFragments(fragments: LoadedFragment[], logger?: ErrorHandler): Record<string, unknown> {
  const merged: Record<string, Record<string, unknown>> = {};
  const origin = new Map<string, string>();

  for (const { file, data } of fragments) {
    for (const [section, value] of Object.entries(data)) {
      if (!isRecord(value)) {
        continue;
      }
      const target = merged[section] ?? {};
      for (const [key, item] of Object.entries(value)) {
        const slot = `${section}.${key}`;
        const previous = origin.get(slot);
        if (previous !== undefined) {
          logger?.warn(`${slot} from ${previous} overridden by ${file}`);
        }
        target[key] = item;
        origin.set(slot, file);
      }
      merged[section] = target;
    }
  }

  return merged;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Loads, validates and merges the given fragments into one frozen manifest tree.
 * Throws {@link ManifestLoadError} listing every issue of every fragment.
 */
export function loadManifest(fragmentPaths: string[], logger = new ErrorHandler()): ManifestTree {
  if (fragmentPaths.length === 0) {
    throw new ManifestLoadError("No manifest fragments declared");
  }
  const duplicates = findDuplicates(fragmentPaths.map((p) => path.resolve(p)));
  if (duplicates.length > 0) {
    throw new ManifestLoadError(`Manifest fragments declared more than once: ${duplicates.join(", ")}`);
  }

  const fragments: LoadedFragment[] = [];
  const issues: ManifestIssue[] = [];

  for (const file of fragmentPaths) {
    const raw = readDocument(file) ?? {};
    if (!isRecord(raw)) {
      issues.push({ file, path: "root", message: "Fragment root must be a mapping" });
      continue;
    }
    const document = dropEmptySections(raw);
    const result = parseFragmentSafe(document);
    if (!result.success) {
      issues.push(...toIssues(file, result.error.issues));
      continue;
    }
    logger.debug(`Loaded manifest fragment ${file}`, { sections: Object.keys(document) });
    fragments.push({ file, data: document });
  }

  if (issues.length > 0) {
    throw new ManifestLoadError(`Manifest failed to load with ${issues.length} issue(s)`, issues);
  }

  const result = ManifestSchema.safeParse(mergeFragments(fragments, logger));
  if (!result.success) {
    throw new ManifestLoadError("Merged manifest is invalid", toIssues("<merged>", result.error.issues));
  }
  return deepFreeze(result.data);
}
