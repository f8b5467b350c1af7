import { describe, expect, it } from "vitest";
import { REFRESH_DEFAULT_SEC, REFRESH_MIN_SEC, renderDashboardHtml } from "./serve.js";

describe("renderDashboardHtml", () => {
  const html = renderDashboardHtml("test-nonce");

  it("tags the inline style and script with the nonce", () => {
    expect(html).toContain('<style nonce="test-nonce">');
    expect(html).toContain('<script nonce="test-nonce">');
    expect(html).not.toContain(" style=");
  });

  it("draws a sparkline for each metrics series", () => {
    for (const id of ["sparkCpu", "sparkMemory", "sparkDisk", "sparkNetio"]) {
      expect(html).toContain(`id="${id}"`);
    }
    expect(html).toContain("if (out.metrics) renderMetrics(out.metrics);");
    expect(html).toContain('renderMetrics((await api("/api/metrics")).data);');
  });

  it("posts the last snapshots to the report endpoint", () => {
    expect(html).toContain('id="btnReport"');
    expect(html).toContain('api("/api/report", "POST", {');
    expect(html).toContain("health: lastHealth || undefined,");
    expect(html).toContain("metrics: lastMetrics || undefined");
  });

  it("offers auto refresh with a bounded interval", () => {
    expect(REFRESH_DEFAULT_SEC).toBe(30);
    expect(REFRESH_MIN_SEC).toBe(10);
    expect(html).toContain('<input id="refreshInterval" type="number" min="10" value="30">');
    expect(html).toContain("return Math.max(10, seconds) * 1000;");
  });
});
