import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidOptionsError, NetworkOptions } from "../src/options/networkOptions.js";
import { SOLVER_DEFAULTS, createPhysicsOptions, selectSolver } from "../src/options/physics.js";

describe("physics options", () => {
  it("starts enabled with stabilisation and no solver block", () => {
    expect(createPhysicsOptions()).to.deep.equal({
      enabled: true,
      stabilization: { enabled: true, iterations: 1000, updateInterval: 50, onlyDynamicEdges: false, fit: true },
    });
  });

  it("fills solver parameters from the defaults and applies overrides", () => {
    const physics = selectSolver(createPhysicsOptions(), "forceAtlas2Based", { springLength: 42 });

    expect(physics.solver).to.equal("forceAtlas2Based");
    expect(physics.forceAtlas2Based).to.deep.equal({ ...SOLVER_DEFAULTS.forceAtlas2Based, springLength: 42 });
  });

  it("keeps a single solver block when switching solvers", () => {
    const first = selectSolver(createPhysicsOptions(), "barnesHut");
    const second = selectSolver(first, "repulsion");

    expect(second).to.not.have.property("barnesHut");
    expect(second.repulsion).to.deep.equal(SOLVER_DEFAULTS.repulsion);
  });
});

describe("NetworkOptions", () => {
  it("serialises the default options", () => {
    expect(new NetworkOptions().toJSON()).to.deep.equal({
      interaction: { hideEdgesOnDrag: false, hideNodesOnDrag: false, dragNodes: true },
      configure: { enabled: false },
      physics: createPhysicsOptions(),
      edges: { smooth: { enabled: false, type: "continuous" }, color: { inherit: true } },
    });
  });

  it("applies toggles to the typed state", () => {
    const options = new NetworkOptions()
      .togglePhysics(false)
      .toggleStabilization(false)
      .toggleDragNodes(false)
      .toggleHideEdgesOnDrag(true)
      .toggleHideNodesOnDrag(true)
      .inheritEdgeColors(false)
      .setEdgeSmooth("dynamic");

    expect(options.physics.enabled).to.equal(false);
    expect(options.physics.stabilization.enabled).to.equal(false);
    expect(options.interaction).to.deep.equal({ hideEdgesOnDrag: true, hideNodesOnDrag: true, dragNodes: false });
    expect(options.edges).to.deep.equal({ smooth: { enabled: true, type: "dynamic" }, color: { inherit: false } });
  });

  it("enables the configure panel with an optional filter", () => {
    const options = new NetworkOptions();

    expect(options.showButtons().configure).to.deep.equal({ enabled: true });
    expect(options.showButtons(true).configure).to.deep.equal({ enabled: true, filter: true });
    expect(options.showButtons(["physics", "nodes"]).configure).to.deep.equal({
      enabled: true,
      filter: ["physics", "nodes"],
    });
    expect(() => options.showButtons(["colours"])).to.throw(InvalidOptionsError, "unknown configure panel 'colours'");
  });

  it("switches to the hierarchical layout and back", () => {
    const options = new NetworkOptions().setHierarchicalLayout(true, "LR");

    expect(options.toJSON().layout).to.deep.equal({
      hierarchical: { enabled: true, direction: "LR", sortMethod: "hubsize" },
    });
    expect(options.setHierarchicalLayout(false).toJSON()).to.not.have.property("layout");
  });

  it("replaces the whole object with JSON text until reset", () => {
    const options = new NetworkOptions().setOptions('{"physics": {"enabled": false}, "nodes": {"borderWidth": 2}}');

    expect(options.isCustom).to.equal(true);
    expect(options.toJSON()).to.deep.equal({ physics: { enabled: false }, nodes: { borderWidth: 2 } });

    options.resetOptions();
    expect(options.isCustom).to.equal(false);
    expect(options.toJSON()).to.have.property("interaction");
  });

  it("rejects malformed JSON text and null values", () => {
    const options = new NetworkOptions();

    expect(() => options.setOptions("{not json")).to.throw(InvalidOptionsError);
    expect(() => options.setOptions({ physics: null })).to.throw(InvalidOptionsError, /^invalid network options: physics: /);
    expect(options.isCustom).to.equal(false);
  });

  it("returns detached copies from toJSON", () => {
    const options = new NetworkOptions();
    const snapshot = options.toJSON();
    snapshot.configure = { enabled: true };

    expect(options.configure.enabled).to.equal(false);
  });
});
