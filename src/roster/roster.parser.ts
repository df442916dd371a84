/**
 * Roster Parser
 *
 * Turns the operator's spreadsheet into validated registrant rows.
 * The first worksheet is read; its first row holds the column names.
 * One invalid row rejects the whole roster so that nothing is registered
 * from a half-correct file.
 */
import { Readable } from "node:stream";
import * as ExcelJS from "exceljs";
import Joi from "joi";
import moment from "moment-timezone";
import { ROSTER } from "../config/constants";
import { logger } from "../monitoring/logger";
import { RosterFormatError } from "../shared/errors/registration.errors";
import { RegistrantRow } from "../shared/types/registration.types";
import { isValidBirthDate } from "../shared/utils/date";
import { errorMessage } from "../shared/utils/errors";

type CellPrimitive = string | number | null;

/** One data row keyed by column name, before validation */
export type RosterRecord = Record<string, unknown>;

interface ValidatedRecord {
  FullName: string;
  DOB_Day: number;
  DOB_Month: number;
  DOB_Year: number;
  Phone: string;
  Email: string;
  IDNumber: string;
  SessionName?: string | null;
}

const TEXT_COLUMNS: readonly string[] = ["FullName", "Phone", "Email", "IDNumber", ...ROSTER.OPTIONAL_COLUMNS];

const recordSchema = Joi.object<ValidatedRecord>({
  FullName: Joi.string().trim().min(1).required(),
  DOB_Day: Joi.number().integer().min(1).max(31).required(),
  DOB_Month: Joi.number().integer().min(1).max(12).required(),
  DOB_Year: Joi.number().integer().min(1900).max(2100).required(),
  Phone: Joi.string().trim().min(1).required(),
  Email: Joi.string().trim().email({ tlds: { allow: false } }).required(),
  IDNumber: Joi.string().trim().min(1).required(),
  SessionName: Joi.string().trim().allow("", null),
}).unknown(true);

/**
 * Read an .xlsx workbook and validate its rows.
 * Throws RosterFormatError listing what is wrong.
 */
export async function parseRoster(data: Buffer): Promise<RegistrantRow[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(data));
  } catch (error) {
    throw new RosterFormatError([
      `Not a readable .xlsx file (${errorMessage(error)})`,
    ]);
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new RosterFormatError(["The workbook has no worksheet"]);
  }

  const headers = new Map<number, string>();
  worksheet.getRow(1).eachCell((cell, colNumber) => {
    const name = String(cellToPrimitive(cell.value) ?? "").trim();
    if (name) headers.set(colNumber, name);
  });

  const missing = ROSTER.REQUIRED_COLUMNS.filter(
    (column) => !Array.from(headers.values()).includes(column)
  );
  if (missing.length > 0) {
    throw new RosterFormatError([`Missing column(s): ${missing.join(", ")}`]);
  }

  const records: RosterRecord[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;

    const record: RosterRecord = {};
    let hasValue = false;
    for (const [colNumber, name] of headers) {
      const value = cellToPrimitive(row.getCell(colNumber).value);
      if (value !== null && value !== "") hasValue = true;
      record[name] = value;
    }
    if (hasValue) records.push(record);
  });

  const rows = validateRosterRecords(records);
  logger.info({ rows: rows.length, worksheet: worksheet.name }, "Roster parsed");
  return rows;
}

/**
 * Validate plain records (from a spreadsheet or the admin API).
 * Row indexes follow the record order, starting at 0.
 */
export function validateRosterRecords(records: readonly RosterRecord[]): RegistrantRow[] {
  if (records.length === 0) {
    throw new RosterFormatError(["The roster has no data rows"]);
  }

  const rows: RegistrantRow[] = [];
  const problems: string[] = [];

  records.forEach((record, index) => {
    const { error, value } = recordSchema.validate(normalizeTextColumns(record), {
      abortEarly: false,
    });

    if (error || !value) {
      for (const detail of error?.details ?? []) {
        problems.push(`Row ${index + 1}: ${detail.message}`);
      }
      return;
    }

    if (!isValidBirthDate(value.DOB_Day, value.DOB_Month, value.DOB_Year)) {
      problems.push(
        `Row ${index + 1}: ${value.DOB_Day}/${value.DOB_Month}/${value.DOB_Year} is not a valid birth date`
      );
      return;
    }

    const sessionName = value.SessionName?.trim();
    rows.push({
      index,
      fields: {
        FullName: value.FullName,
        DOB_Day: value.DOB_Day,
        DOB_Month: value.DOB_Month,
        DOB_Year: value.DOB_Year,
        Phone: value.Phone,
        Email: value.Email,
        IDNumber: value.IDNumber,
      },
      ...(sessionName ? { sessionName } : {}),
    });
  });

  if (problems.length > 0) {
    const reported = problems.slice(0, ROSTER.MAX_REPORTED_ERRORS);
    if (problems.length > reported.length) {
      reported.push(`…and ${problems.length - reported.length} more`);
    }
    logger.warn({ problems: problems.length }, "Roster validation failed");
    throw new RosterFormatError(reported);
  }

  return rows;
}

/** Phone numbers and ids typed as numbers in the sheet are still text */
function normalizeTextColumns(record: RosterRecord): RosterRecord {
  const normalized: RosterRecord = { ...record };
  for (const column of TEXT_COLUMNS) {
    const value = normalized[column];
    if (typeof value === "number") normalized[column] = String(value);
  }
  return normalized;
}

/** Reduce a cell to the text or number a person sees in it */
export function cellToPrimitive(value: ExcelJS.CellValue): CellPrimitive {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date) return moment.utc(value).format("DD/MM/YYYY");
  if ("error" in value) return null;
  if ("richText" in value) return value.richText.map((part) => part.text).join("");
  if ("hyperlink" in value) return value.text;
  return value.result === undefined ? null : cellToPrimitive(value.result);
}
