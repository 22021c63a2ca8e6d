import { describe, expect, it } from "vitest";

import type { ChartSpec } from "../../pipeline/contracts";
import { ChartPipelineError } from "../../pipeline/errors";
import { createPipelineLogger } from "../../pipeline/logger";
import { renderChart } from "../render_chart";
import type { HostDocument, RenderSession, RenderSessionFactory } from "../render_session";

const logger = createPipelineLogger({ silent: true });

const spec: ChartSpec = {
  type: "line",
  data: {
    id: "data",
    values: [
      { month: "2024-01", revenue: 10 },
      { month: "2024-02", revenue: 14 },
      { month: "2024-03", revenue: 9 },
    ],
  },
  xField: "month",
  yField: "revenue",
  theme: "light",
  title: { text: "Revenue </script>" },
};

function recordingFactory(options: { failOn?: "draw" } = {}) {
  const calls: string[] = [];
  const mounted: HostDocument[] = [];
  const factory: RenderSessionFactory = () => {
    const session: RenderSession = {
      mount: (document) => {
        calls.push("mount");
        mounted.push(document);
      },
      draw: () => {
        calls.push("draw");
        if (options.failOn === "draw") throw new Error("draw exploded");
      },
      capture: () => {
        calls.push("capture");
        return Buffer.from("fake-png");
      },
      close: () => {
        calls.push("close");
      },
    };
    return session;
  };
  return { calls, mounted, factory };
}

describe("renderChart", () => {
  it("captures a png through the session and closes it", async () => {
    const { calls, mounted, factory } = recordingFactory();
    const rendered = await renderChart(spec, { outputType: "png", sessionFactory: factory, logger });

    expect(rendered).toEqual({ kind: "png", buffer: Buffer.from("fake-png") });
    expect(calls).toEqual(["mount", "draw", "capture", "close"]);
    expect(mounted[0]).toMatchObject({ width: 1000, height: 1000, background: "#ffffff" });
  });

  it("frames a png with the injected default size", async () => {
    const { mounted, factory } = recordingFactory();
    await renderChart(spec, { outputType: "png", defaultWidth: 640, defaultHeight: 480, sessionFactory: factory, logger });
    expect(mounted[0]).toMatchObject({ width: 640, height: 480 });
  });

  it("prefers an explicit size over the injected default", async () => {
    const { mounted, factory } = recordingFactory();
    await renderChart(spec, {
      outputType: "png",
      width: 320,
      defaultWidth: 640,
      defaultHeight: 480,
      sessionFactory: factory,
      logger,
    });
    expect(mounted[0]).toMatchObject({ width: 320, height: 480 });
  });

  it("closes the session when drawing fails", async () => {
    const { calls, factory } = recordingFactory({ failOn: "draw" });
    const error = await renderChart(spec, { outputType: "png", sessionFactory: factory, logger }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ChartPipelineError);
    expect(error).toMatchObject({ code: "RENDER_FAILED", message: "Chart rendering failed: draw exploded" });
    expect(calls).toEqual(["mount", "draw", "close"]);
  });

  it("writes a self-contained html document without opening a session", async () => {
    const { calls, factory } = recordingFactory();
    const rendered = await renderChart(spec, { outputType: "html", sessionFactory: factory, logger });

    expect(calls).toEqual([]);
    if (rendered.kind !== "html") throw new Error("expected html output");
    expect(rendered.html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(rendered.html).toContain("#chart { width: 100%; height: 100%; }");
    expect(rendered.html).toContain('<script type="application/json" id="chart-spec">');
    expect(rendered.html).toContain("Revenue \\u003c/script>");
    expect(rendered.html).toContain("<title>Revenue &lt;/script&gt;</title>");
  });

  it("fixes the html frame when a size is given", async () => {
    const rendered = await renderChart(spec, { outputType: "html", width: 800, height: 600, logger });
    if (rendered.kind !== "html") throw new Error("expected html output");
    expect(rendered.html).toContain("#chart { width: 800px; height: 600px; }");
    expect(rendered.html).toContain('viewBox="0 0 800 600" width="800" height="600"');
  });

  it("rasterizes with resvg at the requested size", async () => {
    const rendered = await renderChart(spec, { outputType: "png", width: 320, height: 200, logger });
    if (rendered.kind !== "png") throw new Error("expected png output");
    expect(rendered.buffer.subarray(1, 4).toString("ascii")).toBe("PNG");
    expect(rendered.buffer.readUInt32BE(16)).toBe(320);
    expect(rendered.buffer.readUInt32BE(20)).toBe(200);
  });
});
