/**
 * Form Parser
 *
 * Reads the registration form's HTML fragments with cheerio:
 * the sale day <select>, the session options returned by LoadPhien and the
 * captcha <img> returned by LoadCaptcha.
 */
import * as cheerio from "cheerio";
import { SITE } from "../config/constants";
import { Session } from "../shared/types/registration.types";

interface SelectOption {
  label: string;
  value: string;
}

function readOptions($: cheerio.CheerioAPI, scope: string | null): SelectOption[] {
  const options = scope ? $(scope).find(SITE.SELECTORS.OPTION) : $(SITE.SELECTORS.OPTION);
  return options.toArray().map((el) => ({
    label: $(el).text().trim(),
    value: ($(el).attr("value") || "").trim(),
  }));
}

/**
 * All visible sale day labels (dd/mm/yyyy), in document order.
 * Placeholder options without a label or a value are skipped.
 */
export function extractSalesDayLabels(html: string): string[] {
  const $ = cheerio.load(html);
  return readOptions($, SITE.SELECTORS.SALES_DAY_SELECT)
    .filter((opt) => opt.label.length > 0 && opt.value.length > 0)
    .map((opt) => opt.label);
}

/** Resolve a sale day label to the form's internal id */
export function mapLabelToId(html: string, label: string): string | null {
  const $ = cheerio.load(html);
  const match = readOptions($, SITE.SELECTORS.SALES_DAY_SELECT).find(
    (opt) => opt.label === label.trim() && opt.value.length > 0
  );
  return match ? match.value : null;
}

/**
 * Parse a LoadPhien response. The options HTML precedes the separator;
 * options without a value (the "choose a session" placeholder) are dropped.
 */
export function parseSessionOptions(raw: string): Session[] {
  const optionsHtml = raw.trim().split(SITE.SESSION_RESPONSE_SEPARATOR)[0] || "";
  const $ = cheerio.load(optionsHtml);
  return readOptions($, null)
    .filter((opt) => opt.value.length > 0)
    .map((opt) => ({ id: opt.value, label: opt.label }));
}

/**
 * Extract the captcha image URL from a LoadCaptcha fragment.
 * Relative sources are resolved against the site's base URL.
 */
export function parseCaptchaImageRef(html: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  const src = ($(SITE.SELECTORS.CAPTCHA_IMAGE).first().attr("src") || "").trim();
  if (!src) return null;
  if (/^https?:\/\//i.test(src)) return src;
  return `${baseUrl.replace(/\/+$/, "")}/${src.replace(/^[./]+/, "")}`;
}
