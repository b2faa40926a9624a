import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, prefixedLogger } from "../../src/utils/logger";

const TIMESTAMP = "\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z";

const linesOf = (filePath: string) =>
  readFileSync(filePath, "utf8").split("\n").filter(Boolean);

describe("createLogger", () => {
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    stdout = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stdout.mockRestore();
    stderr.mockRestore();
  });

  test("writes info lines to stdout", () => {
    const log = createLogger({ logLevel: "info" });
    log.info("hello", 42, { a: 1 });

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(stdout.mock.calls[0]?.[0]).toMatch(
      new RegExp(`^${TIMESTAMP} \\[INFO\\] \\[Cache\\] hello 42 \\{"a":1\\}\\n$`)
    );
    expect(stderr).not.toHaveBeenCalled();
  });

  test("writes warn and error lines to stderr", () => {
    const log = createLogger({ logLevel: "info" });
    log.warn("careful");
    log.error("broken");

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr.mock.calls[0]?.[0]).toMatch(/\[WARN\] \[Cache\] careful\n$/);
    expect(stderr.mock.calls[1]?.[0]).toMatch(/\[ERROR\] \[Cache\] broken\n$/);
  });

  test("drops lines below the configured level", () => {
    const log = createLogger({ logLevel: "warn" });
    log.debug("noise");
    log.info("more noise");

    expect(stdout).not.toHaveBeenCalled();
    expect(log.isDebugEnabled()).toBe(false);
    expect(createLogger({ logLevel: "debug" }).isDebugEnabled()).toBe(true);
  });

  test("serializes errors with their stack", () => {
    const log = createLogger({ logLevel: "error" });
    const error = new Error("kaput");
    log.error("failed:", error);

    expect(stderr.mock.calls[0]?.[0]).toContain(
      `[ERROR] [Cache] failed: ${error.stack}`
    );
  });
});

describe("prefixedLogger", () => {
  test("prefixes messages", () => {
    const spy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
    const log = prefixedLogger("Test", createLogger({ logLevel: "info" }));
    log.info("hello");

    expect(spy.mock.calls[0]?.[0]).toMatch(/\[INFO\] \[Cache\] \[Test\] hello\n$/);
    spy.mockRestore();
  });
});

describe("debug log file", () => {
  let dir: string;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cache-log-"));
    stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    stderr.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  test("receives lines below the console level", () => {
    const debugLogFile = join(dir, "logs", "debug.log");
    const log = createLogger({ logLevel: "error", debugLogFile });
    log.debug("first");
    log.info("second");

    const lines = linesOf(debugLogFile);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(new RegExp(`^${TIMESTAMP} \\[DEBUG\\] \\[Cache\\] first$`));
    expect(lines[1]).toMatch(/\[INFO\] \[Cache\] second$/);
  });

  test("truncates once the size cap would be exceeded", () => {
    const debugLogFile = join(dir, "debug.log");
    // Each line is 24 timestamp bytes plus "[DEBUG] [Cache] <msg>\n"
    const log = createLogger({
      logLevel: "error",
      debugLogFile,
      debugLogMaxBytes: 100,
    });
    log.debug("first");
    log.debug("second");
    expect(linesOf(debugLogFile)).toHaveLength(2);

    log.debug("third");
    const lines = linesOf(debugLogFile);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[DEBUG\] \[Cache\] third$/);
  });

  test("disables itself after a failed write", () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    const log = createLogger({
      logLevel: "error",
      debugLogFile: join(blocker, "debug.log"),
    });
    log.debug("one");
    log.debug("two");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0]?.[0]).toContain(
      "[WARN] [Cache] Debug log file disabled:"
    );
  });
});
