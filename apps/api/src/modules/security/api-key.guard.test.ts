import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { type ExecutionContext, UnauthorizedException } from "@nestjs/common";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigService } from "../config/config.service";
import { ApiKeyGuard } from "./api-key.guard";

function contextFor(reqPath: string, headers: Record<string, string> = {}): ExecutionContext {
  const req = { path: reqPath, url: reqPath, header: (name: string) => headers[name.toLowerCase()] };
  return { switchToHttp: () => ({ getRequest: () => req }) } as unknown as ExecutionContext;
}

describe("ApiKeyGuard", () => {
  let dataDir: string;
  let config: ConfigService;
  let guard: ApiKeyGuard;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "autopilot-guard-"));
    config = new ConfigService(dataDir);
    guard = new ApiKeyGuard(config);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("lets everything through when no key is configured", () => {
    expect(guard.canActivate(contextFor("/bot/status"))).toBe(true);
  });

  describe("with a key", () => {
    beforeEach(() => {
      config.update({ server: { apiKey: "test-secret-key-0001" } });
    });

    it("keeps /health open", () => {
      expect(guard.canActivate(contextFor("/health"))).toBe(true);
    });

    it("accepts the matching header", () => {
      expect(guard.canActivate(contextFor("/bot/status", { "x-api-key": "test-secret-key-0001" }))).toBe(true);
    });

    it("rejects a missing or wrong header", () => {
      expect(() => guard.canActivate(contextFor("/bot/status"))).toThrow(UnauthorizedException);
      expect(() => guard.canActivate(contextFor("/bot/status", { "x-api-key": "wrong" }))).toThrow("Invalid API key.");
    });
  });
});
