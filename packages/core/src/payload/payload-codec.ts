import type { EmployeeInput, EmployeeRecord, Result } from "@qr-pass/shared";
import {
  MIN_DEPARTMENT_LENGTH,
  MIN_NAME_LENGTH,
  PAYLOAD_LABEL_DEPARTMENT,
  PAYLOAD_LABEL_ID,
  PAYLOAD_LABEL_NAME,
  PAYLOAD_LABEL_NOTES,
  PAYLOAD_LABEL_SEPARATOR,
  QrPassError,
  employeeInputSchema,
  err,
  ok,
} from "@qr-pass/shared";

const EMPLOYEE_ID_REGEX = /^\p{Nd}+$/u;
const LINE_BREAK_REGEX = /[\r\n]/;

function labelled(label: string, value: string): string {
  return `${label}${PAYLOAD_LABEL_SEPARATOR}${value}`;
}

/** Length in code points, so one astral character counts once. */
function hasMinLength(value: string, min: number): boolean {
  return [...value.trim()].length >= min && !LINE_BREAK_REGEX.test(value);
}

function fieldTypeError(field: PropertyKey | undefined, input: EmployeeInput): QrPassError {
  switch (field) {
    case "name":
      return QrPassError.invalidName();
    case "employeeId":
      return QrPassError.invalidId();
    case "department":
      return QrPassError.invalidDepartment();
    default:
      return QrPassError.invalidSetting("notes", input.notes);
  }
}

/**
 * Check raw UI values in a fixed order and stop at the first failure:
 * name, employee ID, department. Values are kept exactly as entered.
 */
export function validateEmployeeInput(input: EmployeeInput): Result<EmployeeRecord> {
  // Field types first; an untyped bridge can hand over anything.
  const shape = employeeInputSchema.safeParse(input);
  if (!shape.success) {
    return err(fieldTypeError(shape.error.issues[0]?.path[0], input));
  }
  const fields = shape.data;

  if (!hasMinLength(fields.name, MIN_NAME_LENGTH)) {
    return err(QrPassError.invalidName());
  }
  // Any decimal digit script (0-9, ٠-٩, ...); no whitespace tolerance.
  if (!EMPLOYEE_ID_REGEX.test(fields.employeeId)) {
    return err(QrPassError.invalidId());
  }
  if (!hasMinLength(fields.department, MIN_DEPARTMENT_LENGTH)) {
    return err(QrPassError.invalidDepartment());
  }

  return ok({
    name: fields.name,
    employeeId: fields.employeeId,
    department: fields.department,
    notes: fields.notes ?? "",
  });
}

/**
 * Canonical plaintext: name, ID and department lines, plus a notes line only
 * when notes is non-empty. Decoders parse this exact layout.
 */
export function serializePayload(record: EmployeeRecord): string {
  const lines = [
    labelled(PAYLOAD_LABEL_NAME, record.name),
    labelled(PAYLOAD_LABEL_ID, record.employeeId),
    labelled(PAYLOAD_LABEL_DEPARTMENT, record.department),
  ];
  if (record.notes) {
    lines.push(labelled(PAYLOAD_LABEL_NOTES, record.notes));
  }
  return lines.join("\n");
}

function stripLabel(line: string | undefined, label: string): string | null {
  const prefix = `${label}${PAYLOAD_LABEL_SEPARATOR}`;
  if (line === undefined || !line.startsWith(prefix)) {
    return null;
  }
  return line.slice(prefix.length);
}

/**
 * Inverse of `serializePayload`. Notes may span several lines; everything
 * after the notes label is returned verbatim.
 */
export function parsePayload(text: string): Result<EmployeeRecord> {
  const lines = text.split("\n");
  const [nameLine, idLine, departmentLine, notesLine, ...rest] = lines;

  const name = stripLabel(nameLine, PAYLOAD_LABEL_NAME);
  if (name === null) return err(QrPassError.invalidName());

  const employeeId = stripLabel(idLine, PAYLOAD_LABEL_ID);
  if (employeeId === null) return err(QrPassError.invalidId());

  const department = stripLabel(departmentLine, PAYLOAD_LABEL_DEPARTMENT);
  if (department === null) return err(QrPassError.invalidDepartment());

  if (notesLine === undefined) {
    return ok({ name, employeeId, department, notes: "" });
  }

  const notesHead = stripLabel(notesLine, PAYLOAD_LABEL_NOTES);
  if (notesHead === null) {
    return err(QrPassError.invalidEnvelope("unexpected line after department"));
  }
  return ok({ name, employeeId, department, notes: [notesHead, ...rest].join("\n") });
}

/** Lines shown beside a generated code. */
export function describeEmployee(record: EmployeeRecord): string[] {
  return [
    labelled(PAYLOAD_LABEL_NAME, record.name),
    labelled(PAYLOAD_LABEL_ID, record.employeeId),
    labelled(PAYLOAD_LABEL_DEPARTMENT, record.department),
  ];
}
