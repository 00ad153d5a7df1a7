import helmet, { type HelmetOptions } from "helmet";
import type { RequestHandler } from "express";
import type { AppConfig, SecurityHeadersConfig } from "../config";
import { normalizeCspSource } from "../config";

const PERMISSIONS_POLICY_VALUE = "geolocation=(), microphone=(), camera=(), payment=()";
const DEFAULT_FRAME_ANCESTORS = ["'none'"];
const DEFAULT_CONNECT_SRC = ["'self'"];
const DEFAULT_IMG_SRC = ["'self'", "data:", "https:"];

type CspDirectives = NonNullable<Exclude<HelmetOptions["contentSecurityPolicy"], boolean | undefined>["directives"]>;

function normalizeCspSources(sources: string[] | undefined, fallback: string[]): string[] {
  const normalized = (sources ?? [])
    .map((source) => source.trim())
    .filter((source) => source.length > 0)
    .map(normalizeCspSource);

  return normalized.length > 0 ? normalized : fallback;
}

export function resolveSecurityHeadersConfig(config: AppConfig): SecurityHeadersConfig {
  const configured = config.securityHeaders;
  const isProduction = configured?.isProduction ?? (process.env.NODE_ENV ?? "").toLowerCase() === "production";

  return {
    isProduction,
    cspReportOnly: configured?.cspReportOnly ?? !isProduction,
    cspFrameAncestors: normalizeCspSources(configured?.cspFrameAncestors, DEFAULT_FRAME_ANCESTORS),
    cspConnectSrc: normalizeCspSources(configured?.cspConnectSrc, DEFAULT_CONNECT_SRC),
    cspImgSrc: normalizeCspSources(configured?.cspImgSrc, DEFAULT_IMG_SRC)
  };
}

function buildCspDirectives(config: SecurityHeadersConfig): CspDirectives {
  const directives: CspDirectives = {
    defaultSrc: ["'none'"],
    baseUri: ["'none'"],
    objectSrc: ["'none'"],
    frameAncestors: config.cspFrameAncestors,
    frameSrc: ["'none'"],
    formAction: ["'self'"],
    scriptSrc: ["'none'"],
    styleSrc: ["'self'"],
    imgSrc: config.cspImgSrc,
    fontSrc: ["'self'", "data:"],
    connectSrc: config.cspConnectSrc
  };

  if (config.isProduction) {
    directives.upgradeInsecureRequests = [];
  }

  return directives;
}

// Blog pages ship no scripts, so script-src stays closed.
export function createHtmlSecurityHeaders(config: AppConfig): RequestHandler {
  const resolved = resolveSecurityHeadersConfig(config);
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      reportOnly: resolved.cspReportOnly,
      directives: buildCspDirectives(resolved)
    },
    referrerPolicy: { policy: "strict-origin-when-cross-origin" },
    xFrameOptions: { action: "deny" },
    crossOriginOpenerPolicy: { policy: "same-origin" },
    crossOriginResourcePolicy: { policy: "same-site" },
    crossOriginEmbedderPolicy: false,
    hsts: resolved.isProduction ? { maxAge: 31536000, includeSubDomains: true } : false
  });

  return (req, res, next) => {
    if (!res.getHeader("Permissions-Policy")) {
      res.setHeader("Permissions-Policy", PERMISSIONS_POLICY_VALUE);
    }
    helmetMiddleware(req, res, next);
  };
}
