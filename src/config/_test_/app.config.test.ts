import path from "path";
import { describe, it, expect } from "vitest";
import { DEFAULT_UPLOAD_LIMIT_BYTES, loadConfig } from "../app.config";
import { ConfigError } from "@/lib/errors/startup.errors";

const CWD = path.resolve("/srv/analyzer");

describe("loadConfig", () => {
  it("defaults to 0.0.0.0:10000", () => {
    expect(loadConfig({}, CWD)).toEqual({
      server: { host: "0.0.0.0", port: 10000 },
      corsOrigin: "*",
      uploadLimitBytes: DEFAULT_UPLOAD_LIMIT_BYTES,
      manifestPath: path.join(CWD, "package.json"),
      skipManifestCheck: false,
      nodeEnv: "production",
    });
  });

  it("reads host and port from the environment", () => {
    const config = loadConfig({ HOST: "127.0.0.1", PORT: "0" }, CWD);

    expect(config.server).toEqual({ host: "127.0.0.1", port: 0 });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ PORT: "", HOST: "" }, CWD).server).toEqual({
      host: "0.0.0.0",
      port: 10000,
    });
  });

  it("parses the preflight flag and manifest path", () => {
    const config = loadConfig(
      { SKIP_MANIFEST_CHECK: "true", MANIFEST_PATH: "deploy/package.json" },
      CWD,
    );

    expect(config.skipManifestCheck).toBe(true);
    expect(config.manifestPath).toBe(path.join(CWD, "deploy", "package.json"));
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" }, CWD)).toThrow(ConfigError);

    try {
      loadConfig({ PORT: "70000" }, CWD);
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^PORT: /);
        expect(err.code).toBe("CONFIG_INVALID");
      }
    }
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig({ PORT: "abc", SKIP_MANIFEST_CHECK: "yes", UPLOAD_LIMIT_BYTES: "-1" }, CWD);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
          "PORT",
          "SKIP_MANIFEST_CHECK",
          "UPLOAD_LIMIT_BYTES",
        ]);
      }
    }
  });
});
