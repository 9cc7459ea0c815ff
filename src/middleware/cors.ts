import cors from "cors";
import { getEnv } from "../config/env.js";

export function createCors() {
  const env = getEnv();
  const origins = env.CORS_ORIGIN.split(",").map((origin) => origin.trim()).filter(Boolean);

  return cors({
    origin: origins.length === 1 ? origins[0] : origins,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID"],
    exposedHeaders: ["RateLimit-Limit", "RateLimit-Remaining", "RateLimit-Reset"],
    maxAge: 86400,
  });
}
