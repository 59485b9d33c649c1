import type { DisplayConfig } from "../config/display.js";
import type { EdgeRecord, NodeRecord } from "../graph/types.js";
import { omitKeys } from "../utils/object.js";

/** Payload handed to {@link renderNetworkHtml}. */
export interface NetworkHtmlInput {
  nodes: readonly NodeRecord[];
  edges: readonly EdgeRecord[];
  options: Record<string, unknown>;
  display: DisplayConfig;
  /** DOT source parsed in the browser; replaces the node and edge data sets. */
  dot?: string;
}

const ANCHOR_PATTERN = /<a\s+(?:[^>]*?\s)?href\s*=\s*(["'])[^"']*\1[^>]*>[\s\S]*?<\/a\s*>/i;

/**
 * Whether {@link text} contains a complete anchor element carrying an `href`.
 * Titles holding links switch the document to click-to-open popups, since a
 * hover tooltip follows the cursor and cannot be clicked.
 */
export function containsAnchorLink(text: string): boolean {
  return ANCHOR_PATTERN.test(text);
}

/** Whether any node title carries a link. */
export function usesTooltipLinks(nodes: readonly NodeRecord[]): boolean {
  return nodes.some((node) => typeof node.title === "string" && containsAnchorLink(node.title));
}

/**
 * Serialises a value for inclusion inside a `<script>` element. Characters
 * that could terminate the element or break the JavaScript parser are
 * replaced by their unicode escapes, which JSON.parse and JS literals read back
 * unchanged.
 */
export function serialiseForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function applyFontColor(nodes: readonly NodeRecord[], fontColor: string | undefined): readonly NodeRecord[] {
  if (!fontColor) {
    return nodes;
  }
  return nodes.map((node) => (node.font === undefined ? { ...node, font: { color: fontColor } } : node));
}

function isConfigureEnabled(options: Record<string, unknown>): boolean {
  const configure = options.configure;
  return typeof configure === "object" && configure !== null && Reflect.get(configure, "enabled") === true;
}

/**
 * Renders a self-contained HTML document embedding `vis-network` and the
 * serialised node/edge data sets. Output is deterministic for a given input so
 * exported files diff cleanly.
 */
export function renderNetworkHtml(input: NetworkHtmlInput): string {
  const { display } = input;
  const nodes = applyFontColor(input.nodes, display.fontColor);
  const configure = isConfigureEnabled(input.options);
  const dot = input.dot;
  const tooltipLinks = dot === undefined && usesTooltipLinks(nodes);
  const title = display.heading.trim().length > 0 ? display.heading : "Network";

  const lines: string[] = [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '  <meta charset="utf-8">',
    `  <title>${escapeHtml(title)}</title>`,
    `  <script type="text/javascript" src="${escapeHtml(display.cdnUrl)}"></script>`,
    '  <style type="text/css">',
    "    #mynetwork {",
    `      width: ${display.width};`,
    `      height: ${display.height};`,
    `      background-color: ${display.bgcolor};`,
    "      border: 1px solid lightgray;",
    "      position: relative;",
    "      float: left;",
    "    }",
  ];
  if (configure) {
    lines.push("    #config {", "      float: left;", "      width: 400px;", "      height: 600px;", "    }");
  }
  if (tooltipLinks) {
    lines.push(
      "    #node-popup {",
      "      display: none;",
      "      position: absolute;",
      "      z-index: 10;",
      "      padding: 6px;",
      "      background: #ffffff;",
      "      border: 1px solid #888888;",
      "    }",
    );
  }
  lines.push("  </style>", "</head>", "<body>");

  if (display.heading.trim().length > 0) {
    lines.push(`  <h1>${escapeHtml(display.heading)}</h1>`);
  }
  lines.push('  <div id="mynetwork"></div>');
  if (configure) {
    lines.push('  <div id="config"></div>');
  }
  if (tooltipLinks) {
    lines.push('  <div id="node-popup"></div>');
  }

  lines.push('  <script type="text/javascript">');
  if (dot === undefined) {
    lines.push(
      `    var nodes = new vis.DataSet(${serialiseForScript(tooltipLinks ? stripTitles(nodes) : nodes)});`,
      `    var edges = new vis.DataSet(${serialiseForScript(input.edges)});`,
      '    var container = document.getElementById("mynetwork");',
      "    var data = { nodes: nodes, edges: edges };",
      `    var options = ${serialiseForScript(input.options)};`,
    );
  } else {
    lines.push(
      `    var parsed = vis.parseDOTNetwork(${serialiseForScript(dot)});`,
      "    var nodes = new vis.DataSet(parsed.nodes);",
      "    var edges = new vis.DataSet(parsed.edges);",
      '    var container = document.getElementById("mynetwork");',
      "    var data = { nodes: nodes, edges: edges };",
      `    var options = Object.assign({}, parsed.options, ${serialiseForScript(input.options)});`,
    );
  }
  if (configure) {
    lines.push('    options.configure.container = document.getElementById("config");');
  }
  lines.push("    var network = new vis.Network(container, data, options);");
  if (tooltipLinks) {
    lines.push(
      `    var popups = ${serialiseForScript(collectTitles(nodes))};`,
      '    var popup = document.getElementById("node-popup");',
      '    network.on("click", function (params) {',
      "      var id = params.nodes.length > 0 ? JSON.stringify(params.nodes[0]) : null;",
      "      if (id === null || !Object.prototype.hasOwnProperty.call(popups, id)) {",
      '        popup.style.display = "none";',
      "        return;",
      "      }",
      "      popup.innerHTML = popups[id];",
      '      popup.style.left = params.pointer.DOM.x + "px";',
      '      popup.style.top = params.pointer.DOM.y + "px";',
      '      popup.style.display = "block";',
      "    });",
    );
  }
  lines.push("  </script>", "</body>", "</html>");
  return `${lines.join("\n")}\n`;
}

function stripTitles(nodes: readonly NodeRecord[]): NodeRecord[] {
  return nodes.map((node) => ({ ...omitKeys(node, ["title"]), id: node.id, label: node.label, shape: node.shape }));
}

/** Popup titles keyed by the JSON form of the id, so `1` and `"1"` stay apart. */
function collectTitles(nodes: readonly NodeRecord[]): Record<string, string> {
  const titles: Record<string, string> = {};
  for (const node of nodes) {
    if (typeof node.title === "string") {
      titles[JSON.stringify(node.id)] = node.title;
    }
  }
  return titles;
}

/**
 * Wraps a rendered document in an `<iframe srcdoc>` fragment, used when the
 * document is displayed inline (notebook mode) instead of written to disk.
 */
export function renderInlineFrame(html: string, display: Pick<DisplayConfig, "width" | "height">): string {
  return `<iframe srcdoc="${escapeHtml(html)}" width="${escapeHtml(display.width)}" height="${escapeHtml(display.height)}" style="border: none;"></iframe>`;
}
