/**
 * Submission Response Classifier
 *
 * The form's handler answers a registration with plain text. This is the
 * only place that interprets it; the attempt loop and the manual resolver
 * receive a classifier function and never look at the markers themselves.
 */
import { RESPONSE_MARKERS } from "../config/constants";
import { SubmissionOutcome } from "../shared/types/registration.types";

export interface ResponseMarkers {
  success: string;
  sessionFull: readonly string[];
  captcha: string;
}

export type ResponseClassifier = (raw: string) => SubmissionOutcome;

export const DEFAULT_RESPONSE_MARKERS: ResponseMarkers = {
  success: RESPONSE_MARKERS.SUCCESS,
  sessionFull: RESPONSE_MARKERS.SESSION_FULL,
  captcha: RESPONSE_MARKERS.CAPTCHA,
};

function fold(text: string): string {
  return text.normalize("NFC").toLowerCase();
}

/**
 * Build a classifier over a set of markers.
 * Precedence: success, session full, captcha, anything else.
 */
export function createResponseClassifier(
  markers: ResponseMarkers = DEFAULT_RESPONSE_MARKERS
): ResponseClassifier {
  const sessionFull = markers.sessionFull.map(fold);
  const captcha = fold(markers.captcha);

  return (raw: string): SubmissionOutcome => {
    if (raw.includes(markers.success)) return "SUCCESS";

    const folded = fold(raw);
    if (sessionFull.some((phrase) => folded.includes(phrase))) return "SESSION_FULL";
    if (folded.includes(captcha)) return "CAPTCHA_REJECTED";

    return "OTHER_FAILURE";
  };
}

export const classifySubmissionResponse = createResponseClassifier();
