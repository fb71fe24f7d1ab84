/* eslint-env mocha */
import { expect } from "chai";
import { describe, it } from "mocha";

import { UnknownNodeError } from "../../../src/errors/TopologyErrors";
import { loadTopologyFile } from "../../../src/io/TopologyIO";
import { MemoryFsAdapter } from "../../helpers/fs-stub";
import { fixturePath, readFixture } from "../../helpers/fixtures";

async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

describe("loadTopologyFile", () => {
  const fs = new MemoryFsAdapter({
    "/labs/sample.topo": readFixture("sample.topo"),
    "/labs/lab.topo": readFixture("lab.topo")
  });

  it("parses and validates a file", async () => {
    const result = await loadTopologyFile("/labs/lab.topo", { fs });
    expect(result.file).to.equal("/labs/lab.topo");
    expect(result.topology.size).to.deep.equal({ nodes: 3, ports: 5, links: 2 });
    expect(result.issues).to.deep.equal([]);
  });

  it("passes validation options through", async () => {
    const { issues } = await loadTopologyFile("/labs/lab.topo", { fs, supportedNodeTypes: ["host"] });
    expect(issues.map((i) => [i.line, i.code])).to.deep.equal([[6, "unsupported-node-type"]]);
  });

  it("attaches the file path to fatal parse errors", async () => {
    const err = await rejectionOf(loadTopologyFile("/labs/sample.topo", { fs }));
    expect(err).to.be.instanceOf(UnknownNodeError);
    expect(err).to.include({ file: "/labs/sample.topo", line: 21, nodeId: "hs2" });
    expect(err.message).to.equal("/labs/sample.topo:21: node 'hs2' is never declared");
  });

  it("fails on a missing file", async () => {
    const err = await rejectionOf(loadTopologyFile("/labs/missing.topo", { fs }));
    expect(err.message).to.equal("Topology file not found: /labs/missing.topo");
  });

  it("reads from disk by default", async () => {
    const { topology } = await loadTopologyFile(fixturePath("lab.topo"));
    expect(topology.getNode("sw1")?.type).to.equal("p4switch");
  });
});
