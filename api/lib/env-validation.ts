/**
 * Environment Variable Validation
 *
 * Validates the GitHub App credentials the webhook server needs and the
 * HTTP port it listens on. Release settings (projects, storage credentials)
 * are validated separately by release-config.ts.
 */

type Env = NodeJS.ProcessEnv;

/**
 * Result of environment validation
 */
export interface EnvValidationResult {
  valid: boolean;
  missing: string[];
}

/**
 * Validated environment configuration
 */
export interface AppConfig {
  appId: number;
  privateKey: string;
  webhookSecret?: string;
}

export const DEFAULT_PORT = 3000;

/**
 * Private key can be provided via either name (Probot default or our standardized name)
 */
const PRIVATE_KEY_VARS = ["PRIVATE_KEY", "APP_PRIVATE_KEY"] as const;

export function hasPrivateKey(env: Env = process.env): boolean {
  return PRIVATE_KEY_VARS.some((key) => !!env[key]);
}

/**
 * Empty strings are treated as unset, consistent with hasPrivateKey().
 */
export function getPrivateKey(env: Env = process.env): string | undefined {
  return env.PRIVATE_KEY || env.APP_PRIVATE_KEY || undefined;
}

/**
 * Check that the GitHub App credentials are present.
 *
 * @param requireWebhookSecret - true for the webhook server
 */
export function validateEnv(requireWebhookSecret = false, env: Env = process.env): EnvValidationResult {
  const missing: string[] = [];

  if (!env.APP_ID) {
    missing.push("APP_ID");
  }
  if (!hasPrivateKey(env)) {
    missing.push("PRIVATE_KEY or APP_PRIVATE_KEY");
  }
  if (requireWebhookSecret && !env.WEBHOOK_SECRET) {
    missing.push("WEBHOOK_SECRET");
  }

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * @throws Error if APP_ID is missing or not a positive integer
 */
export function getAppId(env: Env = process.env): number {
  const raw = env.APP_ID;
  if (!raw) {
    throw new Error("APP_ID environment variable is not set");
  }

  const appId = Number(raw);
  if (!Number.isInteger(appId) || appId <= 0) {
    throw new Error(`APP_ID must be a positive integer, got: ${raw}`);
  }

  return appId;
}

/**
 * @throws Error if the key doesn't appear to be PEM-encoded
 */
export function validatePrivateKeyFormat(key: string): void {
  if (!key.includes("-----BEGIN") || !key.includes("-----END")) {
    throw new Error("Private key does not appear to be a valid PEM-encoded key");
  }
}

/**
 * Port the webhook server listens on, from PORT.
 *
 * @throws Error if PORT is set but not a valid TCP port
 */
export function getServerPort(env: Env = process.env): number {
  const raw = env.PORT?.trim();
  if (!raw) {
    return DEFAULT_PORT;
  }

  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got: ${raw}`);
  }
  return port;
}

/**
 * Get validated app configuration.
 *
 * @throws Error listing missing variables, or describing the invalid one
 */
export function getAppConfig(requireWebhookSecret = false, env: Env = process.env): AppConfig {
  const validation = validateEnv(requireWebhookSecret, env);
  if (!validation.valid) {
    throw new Error(`Missing required environment variables: ${validation.missing.join(", ")}`);
  }

  const privateKey = getPrivateKey(env);
  if (!privateKey) {
    throw new Error("Private key is not set");
  }
  validatePrivateKeyFormat(privateKey);

  return {
    appId: getAppId(env),
    privateKey,
    webhookSecret: env.WEBHOOK_SECRET,
  };
}
