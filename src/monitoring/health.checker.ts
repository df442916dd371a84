/**
 * Health Checker
 *
 * Performs connectivity checks against the external dependencies:
 * - Registration site (GET BASE_URL)
 * - Captcha solver configuration
 * - Telegram operator channel
 *
 * Only the site is critical; without a solver the operator answers
 * captchas, and without Telegram runs are driven through the admin API.
 *
 * Exposed via GET /api/registration/v1/health
 */
import axios, { AxiosInstance } from "axios";
import { logger } from "./logger";
import { errorMessage } from "../shared/utils/errors";

interface HealthCheck {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  uptime: number;
  checks: {
    site: HealthCheck;
    solver: { configured: boolean };
    telegram: { enabled: boolean };
  };
}

export interface HealthCheckOptions {
  siteUrl: string;
  solverConfigured: boolean;
  telegramEnabled: boolean;
  timeoutMs?: number;
  http?: AxiosInstance;
}

const startTime = Date.now();

/**
 * Run all health checks and produce a report.
 */
export async function checkHealth(options: HealthCheckOptions): Promise<HealthReport> {
  const siteCheck = await checkSite(options);

  return {
    status: siteCheck.status === "up" ? "healthy" : "unhealthy",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      site: siteCheck,
      solver: { configured: options.solverConfigured },
      telegram: { enabled: options.telegramEnabled },
    },
  };
}

async function checkSite(options: HealthCheckOptions): Promise<HealthCheck> {
  const http = options.http ?? axios;
  const start = Date.now();
  try {
    await http.get(options.siteUrl, { timeout: options.timeoutMs ?? 5000, responseType: "text" });
    return { status: "up", latency: Date.now() - start };
  } catch (error) {
    const msg = errorMessage(error);
    logger.error({ error: msg }, "Site health check failed");
    return { status: "down", latency: Date.now() - start, error: msg };
  }
}
