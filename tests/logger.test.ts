import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "netcanvas-logger-"));
    const logFile = path.join(directory, "netcanvas.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3, stdout: false });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("netcanvas.log");
      expect(files).to.include("netcanvas.log.1");
      expect(files).to.not.include("netcanvas.log.3");

      const archived = await readFile(path.join(directory, "netcanvas.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("creates the log directory on demand and writes JSON lines", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "netcanvas-logger-"));
    const logFile = path.join(directory, "nested", "app.log");

    try {
      const logger = new StructuredLogger({ logFile, stdout: false });
      logger.warn("first", { count: 1 });
      logger.debug("second");
      await logger.flush();

      const entries = (await readFile(logFile, "utf8"))
        .trim()
        .split("\n")
        .map((line): LogEntry => JSON.parse(line));
      expect(entries.map((entry) => [entry.level, entry.message, entry.payload])).to.deep.equal([
        ["warn", "first", { count: 1 }],
        ["debug", "second", undefined],
      ]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("notifies the entry listener with detached copies", () => {
    const onEntry = sinon.spy((entry: LogEntry) => {
      entry.message = "mutated";
    });
    const payload = { nodes: 2 };
    const logger = new StructuredLogger({ stdout: false, onEntry });

    logger.error("export_failed", payload);

    sinon.assert.calledOnce(onEntry);
    const entry = onEntry.firstCall.args[0];
    expect(entry.level).to.equal("error");
    expect(entry.payload).to.deep.equal({ nodes: 2 });
    expect(entry.payload).to.not.equal(payload);
  });

  it("writes to stdout unless disabled", () => {
    const write = sinon.stub(process.stdout, "write").returns(true);
    try {
      new StructuredLogger().info("visible");
      new StructuredLogger({ stdout: false }).info("hidden");
    } finally {
      write.restore();
    }

    sinon.assert.calledOnce(write);
    const line = String(write.firstCall.args[0]);
    expect(JSON.parse(line)).to.include({ level: "info", message: "visible" });
  });
});
