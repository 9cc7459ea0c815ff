import helmet from "helmet";
import { getEnv } from "../config/env.js";

// JSON-only API.
export function createHelmet() {
  const env = getEnv();

  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: "same-site" },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
    } : false,
  });
}
