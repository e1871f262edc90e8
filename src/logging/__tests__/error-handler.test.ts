import {
  ErrorHandler,
  ErrorLevel,
  ManifestLoadError,
  ValidationFailedError,
  describeError,
  formatViolation,
  parseErrorLevel,
} from "../error-handler";

describe("ErrorHandler", () => {
  test("writes timestamped lines at or above the minimum level", () => {
    const lines: string[] = [];
    const logger = new ErrorHandler({ minLevel: ErrorLevel.WARN, write: (line) => lines.push(line) });

    logger.info("hidden");
    logger.warn("Manifest rejected", { violations: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN: Manifest rejected \{"violations":2\}$/);
    expect(logger.getLogs().map((log) => log.level)).toEqual([ErrorLevel.WARN]);
  });

  test("writes the stack of errors", () => {
    const lines: string[] = [];
    const logger = new ErrorHandler({ write: (line) => lines.push(line) });
    const error = new Error("boom");

    logger.error("Deployment failed", error);

    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe(error.stack);
  });

  test("keeps logs in memory when silent", () => {
    const lines: string[] = [];
    const logger = new ErrorHandler({ silent: true, write: (line) => lines.push(line) });

    logger.info("one");
    logger.debug("below the default level");
    logger.warn("two");

    expect(lines).toEqual([]);
    expect(logger.getLogs().map((log) => log.message)).toEqual(["one", "two"]);
    expect(logger.getLogs(ErrorLevel.WARN).map((log) => log.message)).toEqual(["two"]);

    logger.clearLogs();
    expect(logger.getLogs()).toEqual([]);
  });
});

test("parseErrorLevel is case-insensitive", () => {
  expect(parseErrorLevel("debug")).toBe(ErrorLevel.DEBUG);
  expect(parseErrorLevel("Fatal")).toBe(ErrorLevel.FATAL);
  expect(parseErrorLevel("verbose")).toBeUndefined();
  expect(parseErrorLevel(undefined)).toBeUndefined();
});

test("describeError handles non-errors", () => {
  expect(describeError(new Error("bad"))).toBe("bad");
  expect(describeError("plain")).toBe("plain");
});

test("ManifestLoadError lists its issues", () => {
  const error = new ManifestLoadError("Manifest failed to load with 2 issue(s)", [
    { file: "a.yaml", path: "root", message: "Unrecognized key(s) in object: 'bogus'" },
    { file: "b.yaml", path: "nodes.pve.address", message: "Required" },
  ]);

  expect(error.name).toBe("ManifestLoadError");
  expect(error.message).toBe([
    "Manifest failed to load with 2 issue(s):",
    "  a.yaml: root: Unrecognized key(s) in object: 'bogus'",
    "  b.yaml: nodes.pve.address: Required",
  ].join("\n"));
});

test("ValidationFailedError and formatViolation", () => {
  const violation = {
    path: "virtual_machines.worker.count",
    rule: "batch-count-range" as const,
    value: 60,
    message: "count must be between 1 and 50",
  };

  expect(new ValidationFailedError([violation]).message).toBe("Manifest has 1 violation(s)");
  expect(formatViolation(violation)).toBe(
    "virtual_machines.worker.count [batch-count-range]: count must be between 1 and 50",
  );
});
