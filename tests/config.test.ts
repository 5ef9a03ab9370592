import { MAX_TIMEOUT_MS, checkTimeoutMs, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});
    expect(cfg.projectId).toBeUndefined();
    expect(cfg.publish.timeoutMs).toBe(60_000);
  });

  it("reads overrides", () => {
    const cfg = loadConfig({ PUBLISH_TIMEOUT_SECONDS: "5", GCP_PROJECT_ID: "dapla-kildomaten-p-zz" });
    expect(cfg).toEqual({ projectId: "dapla-kildomaten-p-zz", publish: { timeoutMs: 5000 } });
  });

  it("falls back to GOOGLE_CLOUD_PROJECT", () => {
    expect(loadConfig({ GOOGLE_CLOUD_PROJECT: "fallback-p-zz" }).projectId).toBe("fallback-p-zz");
  });

  it("treats a blank timeout as unset", () => {
    expect(loadConfig({ PUBLISH_TIMEOUT_SECONDS: "" }).publish.timeoutMs).toBe(60_000);
  });

  it("accepts the largest timeout a timer can hold", () => {
    expect(loadConfig({ PUBLISH_TIMEOUT_SECONDS: "2147483" }).publish.timeoutMs).toBe(2_147_483_000);
  });

  it.each([
    { PUBLISH_TIMEOUT_SECONDS: "abc" },
    { PUBLISH_TIMEOUT_SECONDS: "0" },
    { PUBLISH_TIMEOUT_SECONDS: "2147484" },
    { PUBLISH_TIMEOUT_SECONDS: "3000000" },
  ])("rejects %j", (env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });
});

describe("checkTimeoutMs", () => {
  it("passes valid delays through", () => {
    expect(checkTimeoutMs(1)).toBe(1);
    expect(checkTimeoutMs(MAX_TIMEOUT_MS)).toBe(MAX_TIMEOUT_MS);
  });

  it.each([0, -5, MAX_TIMEOUT_MS + 1, Number.POSITIVE_INFINITY, Number.NaN, 10.5])("rejects %s", (ms) => {
    expect(() => checkTimeoutMs(ms)).toThrow(ConfigError);
  });
});

describe("package import", () => {
  const prevEnv = process.env;
  afterEach(() => {
    process.env = prevEnv;
    vi.resetModules();
  });

  it("loads with an invalid PUBLISH_TIMEOUT_SECONDS", async () => {
    process.env = { ...prevEnv, PUBLISH_TIMEOUT_SECONDS: "abc" };
    vi.resetModules();
    const mod = await import("../src/index.js");
    expect(typeof mod.publishBatch).toBe("function");
  });
});
