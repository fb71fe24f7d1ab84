/* eslint-env mocha */
import { expect } from "chai";
import { describe, it } from "mocha";

import { parseTopology } from "../../../src/parsing/TopologyParser";
import { validateTopology } from "../../../src/validation/TopologyValidator";
import { hasErrors } from "../../../src/validation/types";
import { readFixture } from "../../helpers/fixtures";

const SAMPLE_ACTIVE = readFixture("sample.topo").replace("sw1:2 -- hs2:1\n", "");

const MESSY = [
  "# topology-format: v2",
  "[type=router] r1",
  "[type=host] h1",
  "[type=host] h2",
  "[ipv4=10.0.1.1/24] r1:1",
  "[ipv4=10.0.2.1/24] h1:1",
  "[ipv4=300.1.1.1/24 up=yes] h2:1",
  "[ipv4=10.0.1.1/24] r1:2",
  "r1:1 -- h1:1",
  "r1:2 -- r1:3",
  "[type=host] lonely",
  ""
].join("\n");

describe("validateTopology", () => {
  it("reports nothing for a consistent topology", () => {
    expect(validateTopology(parseTopology(readFixture("lab.topo")))).to.deep.equal([]);
  });

  it("warns about linked ports that are not up when liveness is tracked", () => {
    const issues = validateTopology(parseTopology(SAMPLE_ACTIVE));
    expect(issues).to.deep.equal([
      {
        severity: "warning",
        code: "linked-port-down",
        subject: { kind: "port", nodeId: "sw1", port: "1" },
        message: "Port sw1:1 is linked on line 20 but not marked up=True",
        line: 20
      }
    ]);
    expect(hasErrors(issues)).to.be.false;
  });

  it("skips liveness when the document never mentions up", () => {
    const topology = parseTopology("a\nb\na:1 -- b:1\n");
    expect(validateTopology(topology)).to.deep.equal([]);
    expect(validateTopology(topology, { linkedPortLiveness: "always" }).map((i) => i.message)).to.deep.equal([
      "Port a:1 is linked on line 3 but not marked up=True",
      "Port b:1 is linked on line 3 but not marked up=True"
    ]);
  });

  it("can switch liveness checks off", () => {
    expect(validateTopology(parseTopology(SAMPLE_ACTIVE), { linkedPortLiveness: "never" })).to.deep.equal([]);
  });

  it("accumulates every issue, ordered by line", () => {
    const issues = validateTopology(parseTopology(MESSY), { linkedPortLiveness: "never" });

    expect(issues.map((i) => [i.line, i.severity, i.code])).to.deep.equal([
      [undefined, "warning", "unknown-format-version"],
      [2, "error", "unsupported-node-type"],
      [7, "error", "invalid-ipv4"],
      [7, "error", "invalid-up"],
      [8, "warning", "duplicate-ipv4"],
      [9, "warning", "subnet-mismatch"],
      [10, "warning", "loopback-link"],
      [11, "warning", "isolated-node"]
    ]);
    expect(issues.map((i) => i.message)).to.deep.equal([
      "Unknown topology format version 'v2', expected 'v1'",
      "Node r1 has unsupported type 'router'",
      "Port h2:1 has invalid ipv4 '300.1.1.1/24', expected a.b.c.d/len",
      "Port h2:1 has non-boolean up 'yes', expected True or False",
      "Port r1:2 reuses address 10.0.1.1 already assigned to r1:1",
      "Link h1:1--r1:1 joins different networks 10.0.1.0/24 and 10.0.2.0/24",
      "Link r1:2--r1:3 connects node r1 to itself",
      "Node lonely has no ports"
    ]);
    expect(hasErrors(issues)).to.be.true;
  });

  it("names the subject of each issue", () => {
    const issues = validateTopology(parseTopology(MESSY), { linkedPortLiveness: "never" });
    expect(issues[0].subject).to.deep.equal({ kind: "topology" });
    expect(issues[1].subject).to.deep.equal({ kind: "node", nodeId: "r1" });
    expect(issues[5].subject).to.deep.equal({ kind: "link", linkId: "h1:1--r1:1" });
  });

  it("honours a custom set of supported node types", () => {
    const issues = validateTopology(parseTopology("[type=router] r1\n[up=True] r1:1\n"), {
      supportedNodeTypes: ["router"]
    });
    expect(issues).to.deep.equal([]);
  });

  it("rejects non-string addresses", () => {
    const issues = validateTopology(parseTopology("[type=host] a\n[ipv4=5] a:1\n"));
    expect(issues.map((i) => i.message)).to.deep.equal([
      "Port a:1 has invalid ipv4 '5', expected a.b.c.d/len"
    ]);
  });
});
