/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Server: Express admin API settings
 * - Site: Target registration form and HTTP behaviour
 * - Orchestration: Day worker concurrency, assignment and release policy
 * - Captcha: 2Captcha solver switch, credentials and polling
 * - Telegram: Operator channel
 * - Scheduler: Periodic rescan of the form
 * - Auth: Admin API bearer secret
 */
import dotenv from "dotenv";
import { AssignmentMode, DayReleasePolicy } from "../shared/types/registration.types";

dotenv.config();

function parseAssignmentMode(value: string | undefined): AssignmentMode {
  return value === "all" ? "all" : "round-robin";
}

function parseReleasePolicy(value: string | undefined): DayReleasePolicy {
  return value === "retry-on-failure" ? "retry-on-failure" : "never-retry";
}

function parseList(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const config = {
  // --- Server ---
  env: process.env.NODE_ENV || "development",
  port: parseInt(process.env.PORT || "4000", 10),
  logLevel: process.env.LOG_LEVEL || "info",

  // --- Target site ---
  siteBaseUrl: (process.env.BASE_URL || "https://popmartstt.com").replace(/\/+$/, ""),
  siteFormPath: process.env.SITE_FORM_PATH || "/popmart",
  siteAjaxPath: process.env.SITE_AJAX_PATH || "/Ajax.aspx",
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT || "30", 10) * 1000,
  gatewayRetryAttempts: parseInt(process.env.GATEWAY_RETRY_ATTEMPTS || "3", 10),
  gatewayRetryDelayMs: parseInt(process.env.GATEWAY_RETRY_DELAY_MS || "1000", 10),

  // --- Orchestration ---
  maxWorkers: parseInt(process.env.MAX_WORKERS || "10", 10),
  assignmentMode: parseAssignmentMode(process.env.ASSIGNMENT_MODE),
  dayReleasePolicy: parseReleasePolicy(process.env.DAY_RELEASE_POLICY),
  maxRecordedRuns: parseInt(process.env.MAX_RECORDED_RUNS || "100", 10),

  // --- 2Captcha ---
  useTwoCaptcha: (process.env.USE_2CAPTCHA || "0").trim() === "1",
  twoCaptchaApiKey: (process.env.TWO_CAPTCHA_API_KEY || "").trim(),
  captchaSoftTimeoutMs: parseInt(process.env.CAPTCHA_SOFT_TIMEOUT || "120", 10) * 1000,
  captchaPollIntervalMs: parseInt(process.env.CAPTCHA_POLL_INTERVAL || "5", 10) * 1000,
  captchaMaxTries: parseInt(process.env.CAPTCHA_MAX_TRIES || "4", 10),
  manualFallbackOnExhaustion:
    (process.env.MANUAL_FALLBACK_ON_EXHAUSTION || "0").trim() === "1",

  // --- Telegram ---
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN || "",
  admins: parseList(process.env.ADMINS),

  // --- Scheduler ---
  rescanIntervalMinutes: parseInt(process.env.RESCAN_INTERVAL_MINUTES || "0", 10),

  // --- Admin API Authentication ---
  serviceSecret: process.env.SERVICE_SECRET || "change-this-to-a-strong-secret",
};

export type AppConfig = typeof config;

export default config;
