import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { main, shouldUseColor } from "../main.js";

const CRITICAL = "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H";

describe("main", () => {
  let stdoutSpy: MockInstance;
  let stderrSpy: MockInstance;

  function stdout(): string {
    return stdoutSpy.mock.calls.map((call) => String(call[0])).join("");
  }

  function stderr(): string {
    return stderrSpy.mock.calls.map((call) => String(call[0])).join("");
  }

  beforeEach(() => {
    delete process.env.CVSSKIT_LOG_LEVEL;
    stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.CVSSKIT_LOG_LEVEL;
  });

  it("prints help with no arguments", async () => {
    expect(await main([])).toBe(0);
    expect(stdout()).toContain("USAGE");
    expect(stdout()).toContain("cvsskit batch <file>");
  });

  it("prints help for --help anywhere in argv", async () => {
    expect(await main(["score", "--help"])).toBe(0);
    expect(stdout()).toContain("SCORE OPTIONS");
  });

  it("prints the version for --version and the version command", async () => {
    expect(await main(["--version"])).toBe(0);
    expect(await main(["version"])).toBe(0);
    expect(stdout()).toBe("cvsskit v0.1.0\ncvsskit v0.1.0\n");
  });

  it("rejects an unknown command and shows help", async () => {
    expect(await main(["frobnicate"])).toBe(1);
    expect(stderr()).toBe("Unknown command: frobnicate\n");
    expect(stdout()).toContain("USAGE");
  });

  it("exits 1 when batch is given no file", async () => {
    expect(await main(["batch"])).toBe(1);
    expect(stderr()).toBe("[cvsskit] Error: no file given. Usage: cvsskit batch <file>\n");
    expect(stdout()).toBe("");
  });

  it("reports a flag missing its value as a usage error", async () => {
    expect(await main(["score", "--format"])).toBe(1);
    expect(stderr()).toBe("[cvsskit] Error: --format requires a value\n");
  });

  it("dispatches score with plain output under --no-color", async () => {
    expect(await main(["score", CRITICAL, "--no-color"])).toBe(0);
    const lines = stdout().split("\n");
    expect(lines).toContain(`  ${CRITICAL}`);
    expect(lines).toContain("    Base            9.8  Critical");
    expect(stdout()).not.toContain("\x1b[");
  });
});

describe("shouldUseColor", () => {
  it("colors a terminal by default", () => {
    expect(shouldUseColor({}, true, {})).toBe(true);
  });

  it("is off when stdout is not a terminal", () => {
    expect(shouldUseColor({}, false, {})).toBe(false);
  });

  it("is off under --no-color", () => {
    expect(shouldUseColor({ "no-color": "true" }, true, {})).toBe(false);
  });

  it("is off when NO_COLOR is set", () => {
    expect(shouldUseColor({}, true, { NO_COLOR: "1" })).toBe(false);
  });

  it("ignores an empty NO_COLOR", () => {
    expect(shouldUseColor({}, true, { NO_COLOR: "" })).toBe(true);
  });
});
