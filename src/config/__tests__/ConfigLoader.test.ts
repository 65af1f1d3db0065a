import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../ConfigErrors.js";
import { loadEndpointConfig, loadRunSettings, validateEndpointConfig } from "../ConfigLoader.js";

const endpoint = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  name: "Orders API",
  url: "https://api.example.test/orders",
  method: "GET",
  clientId: "client-1",
  clientSecret: "test-secret",
  tenantId: "tenant-1",
  scope: "api://orders/.default",
  ...overrides,
});

const writeConfig = (fileName: string, content: string): string => {
  const tmpDir = mkdtempSync(path.join(os.tmpdir(), "authprobe-config-"));
  const configPath = path.join(tmpDir, fileName);
  writeFileSync(configPath, content);
  return configPath;
};

const configError = (code: string, message: string) => (error: unknown) =>
  error instanceof ConfigError && error.code === code && error.message === message;

test("loadEndpointConfig reads endpoints from JSON in declared order", async () => {
  const configPath = writeConfig(
    "config.json",
    JSON.stringify({
      endpoints: [
        endpoint({ name: "first" }),
        endpoint({ name: "second", method: "POST", requestBody: { key1: "value1", key2: 123 } }),
      ],
    }),
  );
  const config = await loadEndpointConfig(configPath);
  assert.deepEqual(
    config.endpoints.map((entry) => entry.name),
    ["first", "second"],
  );
  assert.equal(config.endpoints[0]?.requestBody, undefined);
  assert.deepEqual(config.endpoints[1]?.requestBody, { key1: "value1", key2: 123 });
  assert.equal(config.endpoints[1]?.method, "POST");
  assert.equal(Object.isFrozen(config.endpoints[0]), true);
});

test("loadEndpointConfig reads YAML endpoint files", async () => {
  const configPath = writeConfig(
    "endpoints.yaml",
    [
      "endpoints:",
      "  - name: Orders API",
      "    url: https://api.example.test/orders",
      "    method: PATCH",
      "    clientId: client-1",
      "    clientSecret: test-secret",
      "    tenantId: tenant-1",
      "    scope: api://orders/.default",
      "    requestBody:",
      "      status: shipped",
      "",
    ].join("\n"),
  );
  const config = await loadEndpointConfig(configPath);
  assert.equal(config.endpoints.length, 1);
  assert.equal(config.endpoints[0]?.method, "PATCH");
  assert.deepEqual(config.endpoints[0]?.requestBody, { status: "shipped" });
});

test("loadEndpointConfig treats a null requestBody as absent", async () => {
  const configPath = writeConfig("config.json", JSON.stringify({ endpoints: [endpoint({ requestBody: null })] }));
  const config = await loadEndpointConfig(configPath);
  assert.equal("requestBody" in (config.endpoints[0] ?? {}), false);
});

test("loadEndpointConfig reports missing and malformed files", async () => {
  const missing = path.join(mkdtempSync(path.join(os.tmpdir(), "authprobe-config-")), "absent.json");
  await assert.rejects(
    loadEndpointConfig(missing),
    (error: unknown) =>
      error instanceof ConfigError &&
      error.code === "config_not_found" &&
      error.message.startsWith("failed to open config file: "),
  );

  const malformed = writeConfig("config.json", "{ not json");
  await assert.rejects(
    loadEndpointConfig(malformed),
    (error: unknown) =>
      error instanceof ConfigError &&
      error.code === "config_malformed" &&
      error.message.startsWith("failed to decode config file: "),
  );
});

test("loadEndpointConfig rejects a configuration without endpoints", async () => {
  const empty = writeConfig("config.json", JSON.stringify({ endpoints: [] }));
  await assert.rejects(
    loadEndpointConfig(empty),
    configError("config_invalid", "invalid configuration: no endpoints defined in configuration"),
  );
  const absent = writeConfig("config.json", "{}");
  await assert.rejects(
    loadEndpointConfig(absent),
    configError("config_invalid", "invalid configuration: no endpoints defined in configuration"),
  );
});

test("validateEndpointConfig names the first invalid field of the offending endpoint", () => {
  const cases: Array<[Record<string, unknown>, string]> = [
    [endpoint({ name: "" }), "endpoint 1 (): name is required"],
    [endpoint({ url: "" }), "endpoint 1 (Orders API): url is required"],
    [endpoint({ method: undefined }), "endpoint 1 (Orders API): method is required"],
    [
      endpoint({ method: "HEAD" }),
      "endpoint 1 (Orders API): invalid HTTP method: HEAD (must be GET, POST, PUT, PATCH, or DELETE)",
    ],
    [
      endpoint({ method: "get" }),
      "endpoint 1 (Orders API): invalid HTTP method: get (must be GET, POST, PUT, PATCH, or DELETE)",
    ],
    [endpoint({ clientId: "" }), "endpoint 1 (Orders API): clientId is required"],
    [endpoint({ clientSecret: undefined }), "endpoint 1 (Orders API): clientSecret is required"],
    [endpoint({ tenantId: "" }), "endpoint 1 (Orders API): tenantId is required"],
    [endpoint({ scope: "" }), "endpoint 1 (Orders API): scope is required"],
    [endpoint({ scope: 42 }), "endpoint 1 (Orders API): scope must be a string"],
    [endpoint({ requestBody: ["a"] }), "endpoint 1 (Orders API): requestBody must be a JSON object"],
  ];
  for (const [invalid, reason] of cases) {
    assert.throws(
      () => validateEndpointConfig({ endpoints: [endpoint(), invalid] }),
      configError("config_invalid", `invalid configuration: ${reason}`),
    );
  }
});

test("validateEndpointConfig rejects non-object documents", () => {
  assert.throws(
    () => validateEndpointConfig([]),
    configError("config_invalid", "invalid configuration: configuration must be an object with an endpoints array"),
  );
  assert.throws(
    () => validateEndpointConfig({ endpoints: "all" }),
    configError("config_invalid", "invalid configuration: endpoints must be an array"),
  );
});

test("loadRunSettings applies defaults", () => {
  const settings = loadRunSettings({ env: {} });
  assert.deepEqual(settings, {
    configPath: "config.json",
    verbose: false,
    json: false,
    authTimeoutMs: 30_000,
    requestTimeoutMs: 30_000,
    authorityHost: "https://login.microsoftonline.com",
  });
});

test("loadRunSettings merges cli over env over defaults", () => {
  const settings = loadRunSettings({
    env: {
      AUTHPROBE_CONFIG: "env.json",
      AUTHPROBE_VERBOSE: "yes",
      AUTHPROBE_AUTH_TIMEOUT_MS: "1500",
      AUTHPROBE_REQUEST_TIMEOUT_MS: "2500",
      AUTHPROBE_AUTHORITY_HOST: "https://login.example.test/",
    },
    cli: { configPath: "cli.json", requestTimeoutMs: 900, verbose: undefined },
  });
  assert.equal(settings.configPath, "cli.json");
  assert.equal(settings.verbose, true);
  assert.equal(settings.authTimeoutMs, 1500);
  assert.equal(settings.requestTimeoutMs, 900);
  assert.equal(settings.authorityHost, "https://login.example.test");
});

test("loadRunSettings rejects invalid values", () => {
  assert.throws(
    () => loadRunSettings({ env: { AUTHPROBE_AUTH_TIMEOUT_MS: "soon" } }),
    configError("settings_invalid", "Invalid AUTHPROBE_AUTH_TIMEOUT_MS: expected number."),
  );
  assert.throws(
    () => loadRunSettings({ env: { AUTHPROBE_VERBOSE: "maybe" } }),
    configError("settings_invalid", "Invalid AUTHPROBE_VERBOSE: expected boolean."),
  );
  assert.throws(
    () => loadRunSettings({ env: {}, cli: { requestTimeoutMs: 0 } }),
    configError("settings_invalid", "Invalid request timeout: expected a positive number."),
  );
  assert.throws(
    () => loadRunSettings({ env: {}, cli: { authTimeoutMs: 3_000_000_000 } }),
    configError("settings_invalid", "Invalid auth timeout: expected whole milliseconds no greater than 2147483647."),
  );
  assert.throws(
    () => loadRunSettings({ env: { AUTHPROBE_REQUEST_TIMEOUT_MS: "1500.5" } }),
    configError("settings_invalid", "Invalid request timeout: expected whole milliseconds no greater than 2147483647."),
  );
  assert.equal(loadRunSettings({ env: {}, cli: { authTimeoutMs: 2_147_483_647 } }).authTimeoutMs, 2_147_483_647);
  assert.throws(
    () => loadRunSettings({ env: {}, cli: { authorityHost: "login" } }),
    configError("settings_invalid", "Invalid authority host: expected an absolute URL."),
  );
});
