import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  DEFAULT_VIS_NETWORK_URL,
  InvalidDisplayConfigError,
  resolveDisplayConfig,
} from "../src/config/display.js";
import { readInt, readOptionalBool, readOptionalEnum, readOptionalString } from "../src/config/env.js";

const VARIABLES = [
  "NETCANVAS_CDN_URL",
  "NETCANVAS_DEFAULT_HEIGHT",
  "NETCANVAS_DEFAULT_WIDTH",
  "NETCANVAS_LAYOUT",
  "NETCANVAS_NOTEBOOK",
  "NETCANVAS_TEST_FLAG",
  "NETCANVAS_TEST_INT",
];

afterEach(() => {
  for (const name of VARIABLES) {
    delete process.env[name];
  }
});

describe("environment helpers", () => {
  it("coerces boolean literals and ignores unknown ones", () => {
    process.env.NETCANVAS_TEST_FLAG = " Yes ";
    expect(readOptionalBool("NETCANVAS_TEST_FLAG")).to.equal(true);

    process.env.NETCANVAS_TEST_FLAG = "off";
    expect(readOptionalBool("NETCANVAS_TEST_FLAG")).to.equal(false);

    process.env.NETCANVAS_TEST_FLAG = "maybe";
    expect(readOptionalBool("NETCANVAS_TEST_FLAG")).to.equal(undefined);
  });

  it("parses bounded integers", () => {
    process.env.NETCANVAS_TEST_INT = "512";
    expect(readInt("NETCANVAS_TEST_INT", 10, { min: 256 })).to.equal(512);

    process.env.NETCANVAS_TEST_INT = "12";
    expect(readInt("NETCANVAS_TEST_INT", 10, { min: 256 })).to.equal(10);

    process.env.NETCANVAS_TEST_INT = "1.5";
    expect(readInt("NETCANVAS_TEST_INT", 10)).to.equal(10);
  });

  it("treats blank strings as unset", () => {
    process.env.NETCANVAS_TEST_FLAG = "   ";
    expect(readOptionalString("NETCANVAS_TEST_FLAG")).to.equal(undefined);
  });

  it("matches enum values case-insensitively", () => {
    process.env.NETCANVAS_LAYOUT = "Hierarchical";
    expect(readOptionalEnum("NETCANVAS_LAYOUT", ["default", "hierarchical"] as const)).to.equal("hierarchical");
  });
});

describe("display configuration", () => {
  it("applies the defaults", () => {
    expect(resolveDisplayConfig()).to.deep.equal({
      height: "500px",
      width: "100%",
      bgcolor: "#ffffff",
      directed: false,
      notebook: false,
      heading: "",
      layout: "default",
      cdnUrl: DEFAULT_VIS_NETWORK_URL,
    });
  });

  it("turns bare numbers into pixel lengths", () => {
    const config = resolveDisplayConfig({ height: 750, width: "80%" });

    expect(config.height).to.equal("750px");
    expect(config.width).to.equal("80%");
  });

  it("lets explicit values win over environment overrides", () => {
    process.env.NETCANVAS_DEFAULT_HEIGHT = "300px";
    process.env.NETCANVAS_DEFAULT_WIDTH = "50%";
    process.env.NETCANVAS_CDN_URL = "https://cdn.example.test/vis-network.js";

    const config = resolveDisplayConfig({ height: "600px", width: undefined });

    expect(config.height).to.equal("600px");
    expect(config.width).to.equal("50%");
    expect(config.cdnUrl).to.equal("https://cdn.example.test/vis-network.js");
  });

  it("reads the notebook flag from the environment", () => {
    process.env.NETCANVAS_NOTEBOOK = "true";

    expect(resolveDisplayConfig().notebook).to.equal(true);
    expect(resolveDisplayConfig({ notebook: false }).notebook).to.equal(false);
  });

  it("rejects malformed lengths", () => {
    expect(() => resolveDisplayConfig({ height: "tall" })).to.throw(
      InvalidDisplayConfigError,
      "invalid display configuration: height: expected a CSS length such as 500px or 100%",
    );
  });
});
