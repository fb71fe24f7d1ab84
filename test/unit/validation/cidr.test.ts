/* eslint-env mocha */
import { expect } from "chai";
import { describe, it } from "mocha";

import { parseIpv4Cidr } from "../../../src/validation/cidr";

describe("parseIpv4Cidr", () => {
  it("parses interface addresses and derives the network", () => {
    expect(parseIpv4Cidr("10.0.10.1/24")).to.deep.equal({
      address: "10.0.10.1",
      prefixLength: 24,
      network: "10.0.10.0/24"
    });
    expect(parseIpv4Cidr("192.168.1.130/25")?.network).to.equal("192.168.1.128/25");
    expect(parseIpv4Cidr("172.16.5.4/32")?.network).to.equal("172.16.5.4/32");
    expect(parseIpv4Cidr("255.255.255.255/32")?.network).to.equal("255.255.255.255/32");
    expect(parseIpv4Cidr("10.1.2.3/0")?.network).to.equal("0.0.0.0/0");
  });

  it("rejects malformed values", () => {
    for (const value of ["10.0.10.1", "10.0.10.256/24", "10.0.10.1/33", "10.0.10/24", "a.b.c.d/8", "10.0.10.1/24 "]) {
      expect(parseIpv4Cidr(value), value).to.be.undefined;
    }
  });
});
