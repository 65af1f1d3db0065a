export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type JsonObject = Record<string, unknown>;

export interface EndpointDefinition {
  readonly name: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly tenantId: string;
  readonly scope: string;
  readonly requestBody?: Readonly<JsonObject>;
}

export interface EndpointConfig {
  readonly endpoints: readonly EndpointDefinition[];
}

export interface RunSettings {
  configPath: string;
  verbose: boolean;
  json: boolean;
  authTimeoutMs: number;
  requestTimeoutMs: number;
  authorityHost: string;
}

export const DEFAULT_CONFIG_PATH = "config.json";
export const DEFAULT_AUTHORITY_HOST = "https://login.microsoftonline.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay `setTimeout` honors; longer delays fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  configPath: DEFAULT_CONFIG_PATH,
  verbose: false,
  json: false,
  authTimeoutMs: DEFAULT_TIMEOUT_MS,
  requestTimeoutMs: DEFAULT_TIMEOUT_MS,
  authorityHost: DEFAULT_AUTHORITY_HOST,
};

export const isHttpMethod = (value: string): value is HttpMethod =>
  HTTP_METHODS.some((method) => method === value);
