/**
 * Application configuration
 *
 * Routing tunables come from @chatrouter/core; this adds what only the HTTP
 * edge needs: API keys, request rate limits and proxy trust.
 */

import { ValidationError, loadRoutingConfig, type RoutingConfig } from "@chatrouter/core";
import { z } from "zod";

const csv = () =>
  z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    );

const apiEnvSchema = z.object({
  API_KEY_AGENT: z.string().min(1).optional(),
  API_KEY_ADMIN: z.string().min(1).optional(),
  RATE_LIMIT_GLOBAL: z.coerce.number().int().min(1).default(500),
  RATE_LIMIT_WIDGET: z.coerce.number().int().min(1).default(120),
  RATE_LIMIT_ALLOWLIST: csv(),
  RATE_LIMIT_HEADERS: z.enum(["true", "false"]).default("true"),
  TRUSTED_PROXIES: z.string().optional(),
});

export interface ApiConfig extends RoutingConfig {
  isDev: boolean;
  isProd: boolean;
  isTest: boolean;
  apiKeys: { agent: string | undefined; admin: string | undefined };
  httpRateLimit: {
    globalLimit: number;
    widgetLimit: number;
    allowlist: string[];
    addHeaders: boolean;
  };
  trustProxy: boolean | string[];
}

/**
 * In production only listed proxies (or private ranges) are trusted, so the
 * client IP feeding the widget throttle cannot be spoofed
 */
function parseTrustedProxies(raw: string | undefined, isProd: boolean): boolean | string[] {
  if (!isProd) return true;
  if (!raw) return ["127.0.0.1", "10.0.0.0/8", "172.16.0.0/12", "192.168.0.0/16"];
  if (raw === "true") return true;
  if (raw === "false") return false;
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

/**
 * @throws ValidationError listing every invalid variable
 */
export function loadApiConfig(source: Record<string, string | undefined> = process.env): ApiConfig {
  const routing = loadRoutingConfig(source);
  const parsed = apiEnvSchema.safeParse(source);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    throw new ValidationError(
      `Invalid environment configuration: ${Object.keys(fieldErrors).join(", ")}`,
      fieldErrors
    );
  }

  const env = parsed.data;
  const isProd = routing.nodeEnv === "production";

  return {
    ...routing,
    isDev: routing.nodeEnv === "development",
    isProd,
    isTest: routing.nodeEnv === "test",
    apiKeys: { agent: env.API_KEY_AGENT, admin: env.API_KEY_ADMIN },
    httpRateLimit: {
      globalLimit: env.RATE_LIMIT_GLOBAL,
      widgetLimit: env.RATE_LIMIT_WIDGET,
      allowlist: env.RATE_LIMIT_ALLOWLIST,
      addHeaders: env.RATE_LIMIT_HEADERS === "true",
    },
    trustProxy: parseTrustedProxies(env.TRUSTED_PROXIES, isProd),
  };
}
