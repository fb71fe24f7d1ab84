/* eslint-env mocha */
import { expect } from "chai";
import { describe, it } from "mocha";

import {
  ConfigError,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  resolveConfig
} from "../../../src/config/config";
import { MemoryFsAdapter } from "../../helpers/fs-stub";

async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

describe("parseConfig", () => {
  it("reads a partial configuration", () => {
    expect(parseConfig("logLevel: debug\nvalidation:\n  linkedPortLiveness: never\n", "x.yml")).to.deep.equal({
      logLevel: "debug",
      validation: { linkedPortLiveness: "never" }
    });
  });

  it("treats an empty file as no settings", () => {
    expect(parseConfig("", "x.yml")).to.deep.equal({});
  });

  it("rejects values outside the schema", () => {
    expect(() => parseConfig("logLevel: loud\n", "x.yml")).to.throw(
      ConfigError,
      "Invalid configuration in x.yml: data/logLevel must be equal to one of the allowed values"
    );
    expect(() => parseConfig("colour: red\n", "x.yml")).to.throw(ConfigError, "Invalid configuration in x.yml");
  });

  it("rejects malformed YAML", () => {
    expect(() => parseConfig("logLevel: [debug\n", "x.yml")).to.throw(ConfigError, "Invalid YAML in x.yml");
  });
});

describe("resolveConfig", () => {
  it("falls back to the defaults", () => {
    expect(resolveConfig({})).to.deep.equal({
      logLevel: "warn",
      strict: false,
      validation: { supportedNodeTypes: ["host", "switch", "p4switch"], linkedPortLiveness: "auto" }
    });
  });

  it("does not share the default type list", () => {
    resolveConfig({}).validation.supportedNodeTypes.push("router");
    expect(DEFAULT_CONFIG.validation.supportedNodeTypes).to.deep.equal(["host", "switch", "p4switch"]);
  });

  it("lets the environment override the file", () => {
    const config = resolveConfig(
      { logLevel: "debug", strict: false },
      { TOPOLOAD_LOG_LEVEL: "error", TOPOLOAD_STRICT: "true" }
    );
    expect(config.logLevel).to.equal("error");
    expect(config.strict).to.be.true;
  });

  it("rejects invalid environment values", () => {
    expect(() => resolveConfig({}, { TOPOLOAD_LOG_LEVEL: "loud" })).to.throw(ConfigError, "TOPOLOAD_LOG_LEVEL");
    expect(() => resolveConfig({}, { TOPOLOAD_STRICT: "maybe" })).to.throw(
      ConfigError,
      "TOPOLOAD_STRICT must be a boolean, got 'maybe'"
    );
  });
});

describe("loadConfig", () => {
  it("picks up topoload.config.yml from the working directory", async () => {
    const fs = new MemoryFsAdapter({ "/work/topoload.config.yml": "strict: true\n" });
    const config = await loadConfig({ cwd: "/work", fs });
    expect(config.strict).to.be.true;
  });

  it("uses the defaults when no file exists", async () => {
    const config = await loadConfig({ cwd: "/work", fs: new MemoryFsAdapter() });
    expect(config).to.deep.equal(resolveConfig({}));
  });

  it("requires an explicit path to exist", async () => {
    const err = await rejectionOf(loadConfig({ configPath: "/nope.yml", fs: new MemoryFsAdapter() }));
    expect(err).to.be.instanceOf(ConfigError);
    expect(err.message).to.equal("Configuration file not found: /nope.yml");
  });
});
