import { describe, it, expect, afterEach, vi } from "vitest";
import { readVectorList, scoreBatch, summarize } from "../batch.js";

const V31 = "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H";
const V40_LOW = "CVSS:4.0/AV:L/AC:H/AT:P/PR:L/UI:P/VC:L/VI:N/VA:N/SC:N/SI:N/SA:N";

describe("readVectorList", () => {
  it("skips blank lines and comments", () => {
    const text = `# nightly scan\n${V31}\n\n   \n  ${V40_LOW}  \r\n# end\n`;
    expect(readVectorList(text)).toEqual([V31, V40_LOW]);
  });

  it("returns an empty list for an empty file", () => {
    expect(readVectorList("")).toEqual([]);
  });
});

describe("scoreBatch", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.CVSSKIT_LOG_LEVEL;
  });

  it("scores every row independently", () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const report = scoreBatch([V31, "CVSS:3.1/AV:N", V40_LOW]);

    expect(report.rows.map((r) => r.index)).toEqual([1, 2, 3]);
    expect(report.rows.map((r) => r.outcome.success)).toEqual([true, false, true]);
    expect(report.summary).toEqual({
      total: 3,
      scored: 2,
      failed: 1,
      bySeverity: { None: 0, Low: 1, Medium: 0, High: 0, Critical: 1 },
    });
  });

  it("records null inputs as failed rows", () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const report = scoreBatch([null, V31]);
    expect(report.rows[0].input).toBe("");
    expect(report.rows[0].outcome.success).toBe(false);
    expect(report.summary.scored).toBe(1);
  });

  it("logs a summary line", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    scoreBatch([V31, "nope"]);
    expect(stderrSpy).toHaveBeenCalledWith("[cvsskit] Scored 1/2 vectors (1 failed)\n");
  });

  it("logs each failure at debug level", () => {
    process.env.CVSSKIT_LOG_LEVEL = "debug";
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    scoreBatch(["CVSS:2.0/AV:N"]);
    expect(stderrSpy).toHaveBeenCalledWith(
      "[cvsskit] row 1: Unsupported CVSS version tag 'CVSS:2.0' (expected CVSS:3.1 or CVSS:4.0)\n",
    );
  });
});

describe("summarize", () => {
  it("counts an empty batch", () => {
    expect(summarize([])).toEqual({
      total: 0,
      scored: 0,
      failed: 0,
      bySeverity: { None: 0, Low: 0, Medium: 0, High: 0, Critical: 0 },
    });
  });
});
