import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("config loader", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});
    expect(cfg.POD_POLL_INTERVAL_MS).toBe(1000);
    expect(cfg.POD_TIMEOUT_MS).toBe(600000);
    expect(cfg.TOKEN_EXPIRATION_SECONDS).toBe(3600);
    expect(cfg.GCLOUD_IMAGE).toBe("google/cloud-sdk:latest");
    expect(cfg.CHECKER_IMAGE_PULL_POLICY).toBe("Always");
    expect(cfg.KUBECONFIG).toBeUndefined();
  });

  it("parses numeric knobs", () => {
    const cfg = loadConfig({ POD_POLL_INTERVAL_MS: "250", POD_TIMEOUT_MS: "5000" });
    expect(cfg.POD_POLL_INTERVAL_MS).toBe(250);
    expect(cfg.POD_TIMEOUT_MS).toBe(5000);
  });

  it("rejects non-positive intervals", () => {
    expect(() => loadConfig({ POD_POLL_INTERVAL_MS: "0" })).toThrow(
      /Invalid environment: POD_POLL_INTERVAL_MS/,
    );
  });

  it("rejects token lifetimes the token API would refuse", () => {
    expect(() => loadConfig({ TOKEN_EXPIRATION_SECONDS: "60" })).toThrow(
      /TOKEN_EXPIRATION_SECONDS must be at least 600/,
    );
  });

  it("rejects an unknown pull policy", () => {
    expect(() => loadConfig({ CHECKER_IMAGE_PULL_POLICY: "Sometimes" })).toThrow(
      /CHECKER_IMAGE_PULL_POLICY/,
    );
  });
});
