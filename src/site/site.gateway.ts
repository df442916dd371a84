/**
 * Site Gateway
 *
 * HTTP façade over the registration form. One instance is one browsing
 * session: it owns a cookie jar, so two instances never share the server's
 * session identity (and therefore never share a captcha challenge).
 *
 * Every network call is retried with exponential backoff; once the budget
 * is spent the caller sees a SiteUnreachableError.
 */
import axios, { AxiosInstance } from "axios";
import { CookieJar } from "tough-cookie";
import config from "../config";
import { SITE } from "../config/constants";
import { logger } from "../monitoring/logger";
import { SiteUnreachableError } from "../shared/errors/registration.errors";
import { Session } from "../shared/types/registration.types";
import { errorMessage } from "../shared/utils/errors";
import { retryWithBackoff } from "../shared/utils/retry";
import {
  extractSalesDayLabels,
  mapLabelToId,
  parseCaptchaImageRef,
  parseSessionOptions,
} from "./form.parser";
import { RegistrationPayload } from "./payload.builder";

/**
 * Contract the orchestrator needs from the registration site.
 */
export interface SiteGateway {
  fetchFormPage(): Promise<string>;
  extractSalesDayLabels(html: string): string[];
  mapLabelToId(html: string, label: string): string | null;
  loadSessions(dayId: string): Promise<Session[]>;
  fetchCaptchaChallengeImageRef(): Promise<string | null>;
  downloadImage(ref: string): Promise<Buffer>;
  submitRegistration(fields: RegistrationPayload): Promise<string>;
}

/** Opens a fresh gateway session */
export type SiteGatewayFactory = () => SiteGateway;

export interface HttpSiteGatewayOptions {
  baseUrl: string;
  formPath: string;
  ajaxPath: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  /** Pre-built axios instance; its interceptors are extended with the cookie jar */
  http?: AxiosInstance;
}

export function defaultGatewayOptions(): HttpSiteGatewayOptions {
  return {
    baseUrl: config.siteBaseUrl,
    formPath: config.siteFormPath,
    ajaxPath: config.siteAjaxPath,
    timeoutMs: config.requestTimeoutMs,
    retryAttempts: config.gatewayRetryAttempts,
    retryDelayMs: config.gatewayRetryDelayMs,
  };
}

export class HttpSiteGateway implements SiteGateway {
  private readonly http: AxiosInstance;
  private readonly jar = new CookieJar();
  private readonly options: HttpSiteGatewayOptions;

  constructor(options: HttpSiteGatewayOptions = defaultGatewayOptions()) {
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, "") };
    this.http =
      options.http ??
      axios.create({
        baseURL: this.options.baseUrl,
        timeout: this.options.timeoutMs,
        headers: { "User-Agent": SITE.USER_AGENT },
      });
    this.attachCookieJar();
  }

  async fetchFormPage(): Promise<string> {
    return this.getText("fetchFormPage", this.options.formPath);
  }

  extractSalesDayLabels(html: string): string[] {
    return extractSalesDayLabels(html);
  }

  mapLabelToId(html: string, label: string): string | null {
    return mapLabelToId(html, label);
  }

  async loadSessions(dayId: string): Promise<Session[]> {
    const raw = await this.getText("loadSessions", this.options.ajaxPath, {
      Action: SITE.ACTIONS.LOAD_SESSIONS,
      idNgayBanHang: dayId,
    });
    return parseSessionOptions(raw);
  }

  async fetchCaptchaChallengeImageRef(): Promise<string | null> {
    const html = await this.getText("fetchCaptcha", this.options.ajaxPath, {
      Action: SITE.ACTIONS.LOAD_CAPTCHA,
    });
    return parseCaptchaImageRef(html, this.options.baseUrl);
  }

  async downloadImage(ref: string): Promise<Buffer> {
    return this.withRetry("downloadImage", async () => {
      const response = await this.http.get<ArrayBuffer>(ref, { responseType: "arraybuffer" });
      return Buffer.from(response.data);
    });
  }

  async submitRegistration(fields: RegistrationPayload): Promise<string> {
    return this.getText("submitRegistration", this.options.ajaxPath, { ...fields });
  }

  private async getText(
    operation: string,
    url: string,
    params?: Record<string, string>
  ): Promise<string> {
    return this.withRetry(operation, async () => {
      const response = await this.http.get<string>(url, { params, responseType: "text" });
      return String(response.data).trim();
    });
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(fn, {
        maxAttempts: this.options.retryAttempts,
        initialDelayMs: this.options.retryDelayMs,
        label: `site.${operation}`,
      });
    } catch (error) {
      throw new SiteUnreachableError(operation, errorMessage(error));
    }
  }

  /**
   * Send stored cookies on every request and store whatever the site sets.
   */
  private attachCookieJar(): void {
    this.http.interceptors.request.use(async (request) => {
      const url = this.http.getUri(request);
      const cookie = await this.jar.getCookieString(url);
      if (cookie) {
        request.headers.set("Cookie", cookie);
      }
      return request;
    });

    this.http.interceptors.response.use(async (response) => {
      const setCookie = response.headers["set-cookie"];
      if (Array.isArray(setCookie) && setCookie.length > 0) {
        const url = this.http.getUri(response.config);
        for (const header of setCookie) {
          try {
            await this.jar.setCookie(header, url);
          } catch (error) {
            logger.warn({ error: errorMessage(error) }, "Rejected cookie from site");
          }
        }
      }
      return response;
    });
  }
}

/** Factory used by workers: one gateway (cookie jar) per day or manual row */
export const createHttpSiteGateway: SiteGatewayFactory = () => new HttpSiteGateway();
