import type { ChartSpec } from "../pipeline/contracts";
import { serializeSpec } from "../pipeline/spec_serializer";
import { escapeXml, type SvgChart } from "./svg_chart";

// Runs in the viewer's browser; reads the embedded spec for the title and animation flag.
const MOUNT_SCRIPT = `(function () {
  var specNode = document.getElementById("chart-spec");
  var spec = specNode ? JSON.parse(specNode.textContent || "{}") : {};
  var container = document.getElementById("chart");
  var tip = document.getElementById("chart-tooltip");
  if (!container || !tip) return;
  if (spec.animation !== false) {
    container.style.opacity = "0";
    container.style.transition = "opacity 600ms ease-out";
    requestAnimationFrame(function () { container.style.opacity = "1"; });
  }
  container.addEventListener("mousemove", function (event) {
    var target = event.target;
    var text = target && target.getAttribute ? target.getAttribute("data-tooltip") : null;
    if (!text) { tip.style.display = "none"; return; }
    tip.textContent = text;
    tip.style.display = "block";
    tip.style.left = event.clientX + 12 + "px";
    tip.style.top = event.clientY + 12 + "px";
  });
  container.addEventListener("mouseleave", function () { tip.style.display = "none"; });
})();`;

/** JSON inside a script element must not be able to close the element. */
export function embedJson(text: string): string {
  return text.replace(/</g, "\\u003c");
}

export function buildHtmlDocument(
  spec: ChartSpec,
  chart: SvgChart,
  options: { width?: number; height?: number }
): string {
  const width = options.width ? `${options.width}px` : "100%";
  const height = options.height ? `${options.height}px` : "100%";
  // without a fixed frame the drawn surface scales to its container
  const svg = options.width && options.height ? chart.svg : chart.svg.replace(/ width="\d+" height="\d+"/, ' width="100%" height="100%"');
  const title = escapeXml(spec.title?.text ?? "Chart");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8" />
<title>${title}</title>
<style>
  html, body { margin: 0; padding: 0; width: 100%; height: 100%; background: ${chart.background}; }
  #chart { width: ${width}; height: ${height}; }
  #chart .mark:hover { opacity: 0.75; }
  #chart-tooltip { position: fixed; display: none; pointer-events: none; padding: 4px 8px; border-radius: 4px; background: rgba(17, 24, 39, 0.9); color: #f9fafb; font: 12px sans-serif; }
</style>
</head>
<body>
<div id="chart">
${svg}
</div>
<div id="chart-tooltip"></div>
<script type="application/json" id="chart-spec">${embedJson(serializeSpec(spec))}</script>
<script>${MOUNT_SCRIPT}</script>
</body>
</html>
`;
}
