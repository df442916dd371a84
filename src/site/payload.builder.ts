/**
 * Registration Payload Builder
 *
 * Maps a registrant row plus the resolved day, session and captcha answer
 * onto the exact query parameters of the DangKyThamDu action.
 */
import { SITE } from "../config/constants";
import { InvalidRowError } from "../shared/errors/registration.errors";
import { RegistrantRow } from "../shared/types/registration.types";

export interface RegistrationPayload {
  Action: string;
  idNgayBanHang: string;
  idPhien: string;
  HoTen: string;
  NgaySinh_Ngay: string;
  NgaySinh_Thang: string;
  NgaySinh_Nam: string;
  SoDienThoai: string;
  Email: string;
  CCCD: string;
  Captcha: string;
}

/**
 * Coerce a spreadsheet number (5, 5.0, "5", "05") to an integer string.
 */
export function toIntegerString(value: number | string, rowIndex: number, field: string): string {
  const numeric = typeof value === "number" ? value : Number(String(value).trim());
  if (!Number.isFinite(numeric) || String(value).trim() === "") {
    throw new InvalidRowError(rowIndex, `${field} is not a number: "${value}"`);
  }
  return String(Math.trunc(numeric));
}

export function buildRegistrationPayload(
  dayId: string,
  sessionId: string,
  row: RegistrantRow,
  captchaText: string
): RegistrationPayload {
  const { fields } = row;
  return {
    Action: SITE.ACTIONS.REGISTER,
    idNgayBanHang: dayId,
    idPhien: sessionId,
    HoTen: String(fields.FullName).trim(),
    NgaySinh_Ngay: toIntegerString(fields.DOB_Day, row.index, "DOB_Day"),
    NgaySinh_Thang: toIntegerString(fields.DOB_Month, row.index, "DOB_Month"),
    NgaySinh_Nam: toIntegerString(fields.DOB_Year, row.index, "DOB_Year"),
    SoDienThoai: String(fields.Phone).trim(),
    Email: String(fields.Email).trim(),
    CCCD: String(fields.IDNumber).trim(),
    Captcha: captchaText.trim(),
  };
}
