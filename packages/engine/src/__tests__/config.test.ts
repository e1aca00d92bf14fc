import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, filterByConfig, DEFAULT_CONFIG, type CvssKitConfig } from "../config.js";
import { safeScoreVector } from "../cvss/score.js";

const TEST_DIR = join(tmpdir(), `cvsskit-config-test-${Date.now()}`);

function setupConfig(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".cvsskit.yml"), content);
}

describe("loadConfig", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("returns null when no config file exists", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it("parses valid config", () => {
    setupConfig(`
format: markdown
fail_on: high
severity_threshold: medium
`);

    expect(loadConfig(TEST_DIR)).toEqual({
      format: "markdown",
      fail_on: "High",
      severity_threshold: "Medium",
    });
  });

  it("returns defaults for empty YAML", () => {
    setupConfig("");
    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
  });

  it("treats fail_on: none as no gate", () => {
    setupConfig("fail_on: none\n");
    expect(loadConfig(TEST_DIR)?.fail_on).toBeNull();
  });

  it("warns on a typo in format", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setupConfig("format: jsno\n");

    expect(loadConfig(TEST_DIR)?.format).toBe("table");
    expect(stderrSpy).toHaveBeenCalledWith(
      "[cvsskit] invalid format 'jsno' — did you mean 'json'?. Using default 'table'.\n",
    );
  });

  it("warns on an unknown severity", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setupConfig("severity_threshold: hihg\n");

    expect(loadConfig(TEST_DIR)?.severity_threshold).toBe("None");
    expect(stderrSpy).toHaveBeenCalledWith(
      "[cvsskit] invalid severity_threshold 'hihg' — did you mean 'high'?. Using default 'none'.\n",
    );
  });

  it("warns on unknown keys", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setupConfig("formt: json\n");

    loadConfig(TEST_DIR);
    expect(stderrSpy).toHaveBeenCalledWith("[cvsskit] unknown config key 'formt' — did you mean 'format'?\n");
  });

  it("falls back to defaults on malformed YAML", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setupConfig("format: [unclosed\n");

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(stderrSpy).toHaveBeenCalledTimes(1);
  });

  it("falls back to defaults when a field has the wrong type", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setupConfig("format: 3\n");

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(stderrSpy).toHaveBeenCalled();
  });
});

describe("filterByConfig", () => {
  const rows = [
    { name: "critical", outcome: safeScoreVector("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H") },
    { name: "medium", outcome: safeScoreVector("CVSS:3.1/AV:L/AC:L/PR:L/UI:N/S:U/C:L/I:L/A:L") },
    { name: "low", outcome: safeScoreVector("CVSS:3.1/AV:P/AC:H/PR:H/UI:R/S:U/C:L/I:N/A:N") },
    { name: "broken", outcome: safeScoreVector("CVSS:3.1") },
  ];

  it("keeps everything at the default threshold", () => {
    expect(filterByConfig(rows, DEFAULT_CONFIG)).toHaveLength(4);
  });

  it("drops scored rows below the threshold and keeps failures", () => {
    const config: CvssKitConfig = { ...DEFAULT_CONFIG, severity_threshold: "Medium" };
    expect(filterByConfig(rows, config).map((r) => r.name)).toEqual(["critical", "medium", "broken"]);
  });
});
