/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes the registration form's selectors and Ajax actions, the
 * response markers used to classify submissions, and error codes.
 */

// --- Registration Form ---
export const SITE = {
  /** Ajax actions understood by the form's handler */
  ACTIONS: {
    LOAD_SESSIONS: "LoadPhien",
    LOAD_CAPTCHA: "LoadCaptcha",
    REGISTER: "DangKyThamDu",
  },
  /** Selectors used by the form parser */
  SELECTORS: {
    SALES_DAY_SELECT: "select#slNgayBanHang",
    OPTION: "option",
    CAPTCHA_IMAGE: "img",
  },
  /** Separator between the options HTML and trailing data in LoadPhien responses */
  SESSION_RESPONSE_SEPARATOR: "||@@||",
  USER_AGENT:
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36",
} as const;

// --- Submission Response Markers ---
// Literal markers the form's handler writes into its plain-text response.
// Matched in order: success, session full, captcha, anything else.
export const RESPONSE_MARKERS = {
  SUCCESS: "!!!True|~~|",
  /** Matched case-insensitively; Vietnamese with and without diacritics, plus English */
  SESSION_FULL: [
    "hết chỗ",
    "hết suất",
    "đã đủ số lượng",
    "đã đầy",
    "het cho",
    "het suat",
    "da du so luong",
    "session is full",
    "fully booked",
    "sold out",
  ],
  CAPTCHA: "captcha",
} as const;

// --- Telegram ---
export const TELEGRAM = {
  /** Telegram rejects messages over 4096 characters; leave room for markup */
  MAX_MESSAGE_LENGTH: 3800,
  CHUNK_DELAY_MS: 80,
} as const;

// --- Error Codes ---
// Classified error types for row and day results.
export const ERROR_CODES = {
  SITE_UNREACHABLE: "SITE_UNREACHABLE",
  UNRESOLVED_DAY: "UNRESOLVED_DAY",
  INVALID_ROW: "INVALID_ROW",
  ROSTER_FORMAT: "ROSTER_FORMAT",
  SOLVER_API: "SOLVER_API",
} as const;

// --- Roster ---
export const ROSTER = {
  REQUIRED_COLUMNS: [
    "FullName",
    "DOB_Day",
    "DOB_Month",
    "DOB_Year",
    "Phone",
    "Email",
    "IDNumber",
  ],
  OPTIONAL_COLUMNS: ["SessionName"],
  /** How many row problems are listed back to the operator */
  MAX_REPORTED_ERRORS: 10,
} as const;
