/**
 * CAPTCHA-Specific Error Classes
 *
 * Granular errors for the captcha solving pipeline.
 * The attempt loop counts a solver error as a consumed attempt.
 */
import { ERROR_CODES } from "../../config/constants";
import { RegistrationError } from "./registration.errors";

/** 2Captcha API returned an error or the request failed */
export class TwoCaptchaApiError extends RegistrationError {
  constructor(message: string = "2Captcha API error") {
    super(message, ERROR_CODES.SOLVER_API, true);
    this.name = "TwoCaptchaApiError";
  }
}

