/* eslint-env mocha */
import { expect } from "chai";
import { describe, it } from "mocha";

import { TopologySyntaxError } from "../../../src/errors/TopologyErrors";
import { coerceBareValue, isBareSafe, splitAttributeBag } from "../../../src/parsing/AttributeParser";

const at = (text: string) => ({ line: 3, text });

function syntaxErrorOf(source: string): TopologySyntaxError {
  try {
    splitAttributeBag(source, at(source));
  } catch (err) {
    if (err instanceof TopologySyntaxError) return err;
    throw err;
  }
  throw new Error(`expected '${source}' to be rejected`);
}

describe("splitAttributeBag", () => {
  it("returns the line untouched when there is no bag", () => {
    expect(splitAttributeBag("hs1:1 -- sw1:1", at(""))).to.deep.equal({
      attributes: {},
      rest: "hs1:1 -- sw1:1"
    });
  });

  it("splits quoted and bare values off the target", () => {
    const result = splitAttributeBag('[type=host name="Host 1"] hs1', at(""));
    expect(result.attributes).to.deep.equal({ type: "host", name: "Host 1" });
    expect(result.rest).to.equal("hs1");
  });

  it("types booleans and numbers, but keeps quoted values as strings", () => {
    const { attributes } = splitAttributeBag('[up=True down=False n=42 f=-1.5 s=abc q="True" k="7"] x', at(""));
    expect(attributes).to.deep.equal({ up: true, down: false, n: 42, f: -1.5, s: "abc", q: "True", k: "7" });
  });

  it("accepts commas and extra whitespace between pairs", () => {
    expect(splitAttributeBag("[a=1,b=2] x", at("")).attributes).to.deep.equal({ a: 1, b: 2 });
    expect(splitAttributeBag("[ a=1 , b=2 ] x", at("")).attributes).to.deep.equal({ a: 1, b: 2 });
  });

  it("accepts an empty bag", () => {
    expect(splitAttributeBag("[] x", at(""))).to.deep.equal({ attributes: {}, rest: "x" });
  });

  it("keeps CIDR addresses as bare strings", () => {
    expect(splitAttributeBag("[ipv4=10.0.10.1/24] hs1:1", at("")).attributes).to.deep.equal({
      ipv4: "10.0.10.1/24"
    });
  });

  it("rejects malformed bags with the line attached", () => {
    const err = syntaxErrorOf("[a=1");
    expect(err.detail).to.equal("unterminated attribute list, expected ']'");
    expect(err.line).to.equal(3);
    expect(err.text).to.equal("[a=1");
    expect(err.code).to.equal("SyntaxError");
    expect(err.message).to.equal("line 3: unterminated attribute list, expected ']'");
  });

  it("reports each grammar violation precisely", () => {
    expect(syntaxErrorOf("[a 1] x").detail).to.equal("expected '=' after attribute 'a'");
    expect(syntaxErrorOf("[a=] x").detail).to.equal("missing value for attribute 'a'");
    expect(syntaxErrorOf("[=1] x").detail).to.equal("expected attribute name at column 2");
    expect(syntaxErrorOf('[a="x] x').detail).to.equal("unterminated quoted value for 'a'");
    expect(syntaxErrorOf('[a="x]"] x').detail).to.equal("']' is not allowed inside the quoted value of 'a'");
    expect(syntaxErrorOf('[a="x"y] x').detail).to.equal("unexpected 'y' after value of 'a'");
    expect(syntaxErrorOf("[a=1 a=2] x").detail).to.equal("attribute 'a' is repeated");
  });
});

describe("coerceBareValue", () => {
  it("treats True/False case-sensitively", () => {
    expect(coerceBareValue("True")).to.equal(true);
    expect(coerceBareValue("False")).to.equal(false);
    expect(coerceBareValue("true")).to.equal("true");
  });

  it("parses integers and decimals only", () => {
    expect(coerceBareValue("1000")).to.equal(1000);
    expect(coerceBareValue("0.5")).to.equal(0.5);
    expect(coerceBareValue("1e3")).to.equal("1e3");
  });

  it("keeps numerals that would not print back the same as strings", () => {
    expect(coerceBareValue("100000000000000000000000")).to.equal("100000000000000000000000");
    expect(coerceBareValue("0.0000001")).to.equal("0.0000001");
    expect(coerceBareValue("9007199254740993")).to.equal("9007199254740993");
    expect(coerceBareValue("-0")).to.equal("-0");
  });

  it("still types safe integers and plain decimals", () => {
    expect(coerceBareValue("9007199254740991")).to.equal(9007199254740991);
    expect(coerceBareValue("-3")).to.equal(-3);
    expect(coerceBareValue("1.50")).to.equal(1.5);
  });
});

describe("isBareSafe", () => {
  it("accepts tokens that read back as the same string", () => {
    expect(isBareSafe("alpine")).to.be.true;
    expect(isBareSafe("10.0.10.1/24")).to.be.true;
    expect(isBareSafe("9007199254740993")).to.be.true;
  });

  it("rejects values that need quotes", () => {
    expect(isBareSafe("Host 1")).to.be.false;
    expect(isBareSafe("True")).to.be.false;
    expect(isBareSafe("42")).to.be.false;
    expect(isBareSafe("")).to.be.false;
    expect(isBareSafe("a,b")).to.be.false;
  });
});
