import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  DEFAULT_RUN_SETTINGS,
  HTTP_METHODS,
  MAX_TIMEOUT_MS,
  isHttpMethod,
  type EndpointConfig,
  type EndpointDefinition,
  type JsonObject,
  type RunSettings,
} from "./Config.js";
import { ConfigError, createInvalidConfigError } from "./ConfigErrors.js";

export interface LoadRunSettingsOptions {
  env?: NodeJS.ProcessEnv;
  cli?: Partial<RunSettings>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isMissingFileError = (error: unknown): boolean =>
  isRecord(error) && (error.code === "ENOENT" || error.code === "ENOTDIR");

const isYamlPath = (filePath: string): boolean => {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
};

const readStringField = (entry: Record<string, unknown>, field: string): string => {
  const value = entry[field];
  if (value === undefined || value === null || value === "") {
    throw new Error(`${field} is required`);
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return value;
};

const readRequestBody = (entry: Record<string, unknown>): JsonObject | undefined => {
  const value = entry.requestBody;
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new Error("requestBody must be a JSON object");
  }
  return value;
};

const validateEndpoint = (entry: unknown): EndpointDefinition => {
  if (!isRecord(entry)) {
    throw new Error("endpoint must be an object");
  }
  const name = readStringField(entry, "name");
  const url = readStringField(entry, "url");
  const method = readStringField(entry, "method");
  if (!isHttpMethod(method)) {
    throw new Error(`invalid HTTP method: ${method} (must be ${HTTP_METHODS.slice(0, -1).join(", ")}, or DELETE)`);
  }
  const clientId = readStringField(entry, "clientId");
  const clientSecret = readStringField(entry, "clientSecret");
  const tenantId = readStringField(entry, "tenantId");
  const scope = readStringField(entry, "scope");
  const requestBody = readRequestBody(entry);
  return Object.freeze({
    name,
    url,
    method,
    clientId,
    clientSecret,
    tenantId,
    scope,
    ...(requestBody ? { requestBody: Object.freeze({ ...requestBody }) } : {}),
  });
};

const describeEntryName = (entry: unknown): string =>
  isRecord(entry) && typeof entry.name === "string" ? entry.name : "";

export const validateEndpointConfig = (raw: unknown): EndpointConfig => {
  if (!isRecord(raw)) {
    throw createInvalidConfigError("configuration must be an object with an endpoints array");
  }
  const entries = raw.endpoints ?? [];
  if (!Array.isArray(entries)) {
    throw createInvalidConfigError("endpoints must be an array");
  }
  if (entries.length === 0) {
    throw createInvalidConfigError("no endpoints defined in configuration");
  }
  const endpoints = entries.map((entry: unknown, index) => {
    try {
      return validateEndpoint(entry);
    } catch (error) {
      const name = describeEntryName(entry);
      throw createInvalidConfigError(`endpoint ${index} (${name}): ${errorMessage(error)}`, { index, name });
    }
  });
  return Object.freeze({ endpoints: Object.freeze(endpoints) });
};

const parseConfigText = (filePath: string, raw: string): unknown => {
  try {
    return isYamlPath(filePath) ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    throw new ConfigError({
      code: "config_malformed",
      message: `failed to decode config file: ${errorMessage(error)}`,
      details: { path: filePath },
    });
  }
};

export const loadEndpointConfig = async (filePath: string): Promise<EndpointConfig> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError({
      code: isMissingFileError(error) ? "config_not_found" : "config_unreadable",
      message: `failed to open config file: ${errorMessage(error)}`,
      details: { path: filePath },
    });
  }
  return validateEndpointConfig(parseConfigText(filePath, raw));
};

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError({ code: "settings_invalid", message: `Invalid ${label}: expected number.` });
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError({ code: "settings_invalid", message: `Invalid ${label}: expected boolean.` });
};

const requireTimeoutMs = (value: number, label: string): number => {
  if (!(value > 0)) {
    throw new ConfigError({ code: "settings_invalid", message: `Invalid ${label}: expected a positive number.` });
  }
  if (!Number.isInteger(value) || value > MAX_TIMEOUT_MS) {
    throw new ConfigError({
      code: "settings_invalid",
      message: `Invalid ${label}: expected whole milliseconds no greater than ${MAX_TIMEOUT_MS}.`,
    });
  }
  return value;
};

const requireHttpUrl = (value: string, label: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError({ code: "settings_invalid", message: `Invalid ${label}: expected an absolute URL.` });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError({ code: "settings_invalid", message: `Invalid ${label}: expected an http(s) URL.` });
  }
  return value.replace(/\/+$/, "");
};

const readEnvSettings = (env: NodeJS.ProcessEnv): Partial<RunSettings> => {
  const settings: Partial<RunSettings> = {};
  if (env.AUTHPROBE_CONFIG) settings.configPath = env.AUTHPROBE_CONFIG;
  const verbose = parseBooleanStrict(env.AUTHPROBE_VERBOSE, "AUTHPROBE_VERBOSE");
  if (verbose !== undefined) settings.verbose = verbose;
  const authTimeoutMs = parseNumberStrict(env.AUTHPROBE_AUTH_TIMEOUT_MS, "AUTHPROBE_AUTH_TIMEOUT_MS");
  if (authTimeoutMs !== undefined) settings.authTimeoutMs = authTimeoutMs;
  const requestTimeoutMs = parseNumberStrict(env.AUTHPROBE_REQUEST_TIMEOUT_MS, "AUTHPROBE_REQUEST_TIMEOUT_MS");
  if (requestTimeoutMs !== undefined) settings.requestTimeoutMs = requestTimeoutMs;
  if (env.AUTHPROBE_AUTHORITY_HOST) settings.authorityHost = env.AUTHPROBE_AUTHORITY_HOST;
  return settings;
};

const definedOnly = (source: Partial<RunSettings>): Partial<RunSettings> => {
  const result: Partial<RunSettings> = {};
  if (source.configPath !== undefined) result.configPath = source.configPath;
  if (source.verbose !== undefined) result.verbose = source.verbose;
  if (source.json !== undefined) result.json = source.json;
  if (source.authTimeoutMs !== undefined) result.authTimeoutMs = source.authTimeoutMs;
  if (source.requestTimeoutMs !== undefined) result.requestTimeoutMs = source.requestTimeoutMs;
  if (source.authorityHost !== undefined) result.authorityHost = source.authorityHost;
  return result;
};

export const loadRunSettings = (options: LoadRunSettingsOptions = {}): RunSettings => {
  const env = options.env ?? process.env;
  const merged: RunSettings = {
    ...DEFAULT_RUN_SETTINGS,
    ...readEnvSettings(env),
    ...definedOnly(options.cli ?? {}),
  };
  return {
    ...merged,
    authTimeoutMs: requireTimeoutMs(merged.authTimeoutMs, "auth timeout"),
    requestTimeoutMs: requireTimeoutMs(merged.requestTimeoutMs, "request timeout"),
    authorityHost: requireHttpUrl(merged.authorityHost, "authority host"),
  };
};
