import { describe, it } from "mocha";
import { expect } from "chai";

import { resolveDisplayConfig } from "../src/config/display.js";
import {
  containsAnchorLink,
  escapeHtml,
  renderInlineFrame,
  renderNetworkHtml,
  serialiseForScript,
} from "../src/export/html.js";
import type { NodeRecord } from "../src/graph/types.js";
import { NetworkOptions } from "../src/options/networkOptions.js";

function lines(html: string): string[] {
  return html.split("\n");
}

describe("anchor detection", () => {
  it("recognises complete anchors with an href", () => {
    expect(containsAnchorLink('<a href="https://example.test">docs</a>')).to.equal(true);
    expect(containsAnchorLink("see <a class='x' href='/page'>here</a> for more")).to.equal(true);
    expect(containsAnchorLink('<A HREF="#top">top</A>')).to.equal(true);
  });

  it("ignores text that only mentions links", () => {
    expect(containsAnchorLink("href=https://example.test")).to.equal(false);
    expect(containsAnchorLink("<a>no target</a>")).to.equal(false);
    expect(containsAnchorLink('<a href="https://example.test">unterminated')).to.equal(false);
    expect(containsAnchorLink('<abbr href="x">nope</abbr>')).to.equal(false);
  });
});

describe("escaping", () => {
  it("escapes markup characters for attributes and text", () => {
    expect(escapeHtml(`<b title="x">Tom & 'Jerry'</b>`)).to.equal(
      "&lt;b title=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/b&gt;",
    );
  });

  it("keeps script payloads from closing the element", () => {
    expect(serialiseForScript({ title: "</script><b>&" })).to.equal(
      '{"title":"\\u003c/script\\u003e\\u003cb\\u003e\\u0026"}',
    );
    expect(serialiseForScript("a\u2028b")).to.equal('"a\\u2028b"');
  });
});

describe("renderNetworkHtml", () => {
  const nodes: NodeRecord[] = [
    { id: 0, label: "0", shape: "dot" },
    { id: 1, label: "1", shape: "dot" },
  ];

  it("embeds data sets, options and display settings", () => {
    const options = new NetworkOptions();
    const html = renderNetworkHtml({
      nodes,
      edges: [{ from: 0, to: 1 }],
      options: options.toJSON(),
      display: resolveDisplayConfig({ height: "750px", width: "80%", bgcolor: "#222222" }),
    });
    const output = lines(html);

    expect(output[0]).to.equal("<!DOCTYPE html>");
    expect(output).to.include("  <title>Network</title>");
    expect(output).to.include("      width: 80%;");
    expect(output).to.include("      height: 750px;");
    expect(output).to.include("      background-color: #222222;");
    expect(output).to.include(
      '    var nodes = new vis.DataSet([{"id":0,"label":"0","shape":"dot"},{"id":1,"label":"1","shape":"dot"}]);',
    );
    expect(output).to.include('    var edges = new vis.DataSet([{"from":0,"to":1}]);');
    expect(output).to.include(`    var options = ${JSON.stringify(options.toJSON())};`);
    expect(output).to.not.include('  <div id="config"></div>');
    expect(html.endsWith("</html>\n")).to.equal(true);
  });

  it("renders the heading and the configure container when enabled", () => {
    const options = new NetworkOptions().showButtons(["physics"]);
    const output = lines(
      renderNetworkHtml({
        nodes,
        edges: [],
        options: options.toJSON(),
        display: resolveDisplayConfig({ heading: "Fish & Chips" }),
      }),
    );

    expect(output).to.include("  <title>Fish &amp; Chips</title>");
    expect(output).to.include("  <h1>Fish &amp; Chips</h1>");
    expect(output).to.include('  <div id="config"></div>');
    expect(output).to.include('    options.configure.container = document.getElementById("config");');
  });

  it("applies the font colour to nodes without their own font", () => {
    const output = lines(
      renderNetworkHtml({
        nodes: [
          { id: "a", label: "a", shape: "dot" },
          { id: "b", label: "b", shape: "dot", font: { color: "red" } },
        ],
        edges: [],
        options: {},
        display: resolveDisplayConfig({ fontColor: "white" }),
      }),
    );

    expect(output).to.include(
      '    var nodes = new vis.DataSet([{"id":"a","label":"a","shape":"dot","font":{"color":"white"}},{"id":"b","label":"b","shape":"dot","font":{"color":"red"}}]);',
    );
  });

  it("keeps popups of ids 1 and \"1\" apart", () => {
    const output = lines(
      renderNetworkHtml({
        nodes: [
          { id: 1, label: "1", shape: "dot", title: '<a href="/number">number</a>' },
          { id: "1", label: "1", shape: "dot", title: "text" },
        ],
        edges: [],
        options: {},
        display: resolveDisplayConfig(),
      }),
    );

    expect(output).to.include(
      '    var popups = {"1":"\\u003ca href=\\"/number\\"\\u003enumber\\u003c/a\\u003e","\\"1\\"":"text"};',
    );
    expect(output).to.include("      var id = params.nodes.length > 0 ? JSON.stringify(params.nodes[0]) : null;");
  });

  it("parses DOT text in the browser instead of embedding data sets", () => {
    const output = lines(
      renderNetworkHtml({
        nodes,
        edges: [{ from: 0, to: 1 }],
        options: { physics: { enabled: false } },
        display: resolveDisplayConfig(),
        dot: 'digraph { a -> b [label="<x>"] }',
      }),
    );

    expect(output).to.include('    var parsed = vis.parseDOTNetwork("digraph { a -\\u003e b [label=\\"\\u003cx\\u003e\\"] }");');
    expect(output).to.include("    var nodes = new vis.DataSet(parsed.nodes);");
    expect(output).to.include("    var edges = new vis.DataSet(parsed.edges);");
    expect(output).to.include('    var options = Object.assign({}, parsed.options, {"physics":{"enabled":false}});');
    expect(output.some((line) => line.includes('"shape":"dot"'))).to.equal(false);
  });

  it("moves linked titles into click popups", () => {
    const output = lines(
      renderNetworkHtml({
        nodes: [
          { id: 1, label: "1", shape: "dot", title: '<a href="https://example.test">home</a>' },
          { id: 2, label: "2", shape: "dot", title: "plain" },
        ],
        edges: [],
        options: {},
        display: resolveDisplayConfig(),
      }),
    );

    expect(output).to.include('  <div id="node-popup"></div>');
    expect(output).to.include(
      '    var nodes = new vis.DataSet([{"id":1,"label":"1","shape":"dot"},{"id":2,"label":"2","shape":"dot"}]);',
    );
    expect(output).to.include(
      '    var popups = {"1":"\\u003ca href=\\"https://example.test\\"\\u003ehome\\u003c/a\\u003e","2":"plain"};',
    );
  });
});

describe("renderInlineFrame", () => {
  it("wraps the document in an escaped srcdoc attribute", () => {
    expect(renderInlineFrame('<p class="x">hi</p>', { width: "100%", height: "500px" })).to.equal(
      '<iframe srcdoc="&lt;p class=&quot;x&quot;&gt;hi&lt;/p&gt;" width="100%" height="500px" style="border: none;"></iframe>',
    );
  });
});
