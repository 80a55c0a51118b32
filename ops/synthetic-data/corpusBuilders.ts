import { AppError } from "../../shared/utils/errors";
import type { ReferenceLists } from "./corpusReferenceData";
import type { Rng } from "./corpusRng";

export type SalaryRange = {
  min: number;
  max: number;
};

export const DEFAULT_SALARY_RANGE: SalaryRange = Object.freeze({ min: 800, max: 1200 });

export type PayrollRecord = {
  lastName: string;
  firstName: string;
  agency: string;
  salary: number;
  city: string;
  // Drawn only when requested; not part of the rendered line.
  title?: string;
};

export type RecordOptions = {
  salaryRange: SalaryRange;
  drawTitle: boolean;
};

export const roundToCents = (value: number) => Math.round(value * 100) / 100;

// Ranges bounded by whole cents keep every rounded draw inside the range.
export const isWholeCents = (value: number) => Number.isFinite(value) && roundToCents(value) === value;

const ensureWithin = (value: number, range: SalaryRange) => {
  if (value < range.min || value > range.max) {
    throw new AppError(`Salary ${value} out of range ${range.min}-${range.max}`, {
      code: "GEN_RANGE"
    });
  }
};

export const buildPayrollRecord = (
  rng: Rng,
  lists: ReferenceLists,
  options: RecordOptions
): PayrollRecord => {
  const lastName = rng.pick(lists.lastNames);
  const firstName = rng.pick(lists.firstNames);
  const title = options.drawTitle ? rng.pick(lists.titles) : undefined;
  const agency = rng.pick(lists.agencies);
  const salary = roundToCents(rng.uniform(options.salaryRange.min, options.salaryRange.max));
  ensureWithin(salary, options.salaryRange);
  const city = rng.pick(lists.cities);

  const record: PayrollRecord = { lastName, firstName, agency, salary, city };
  if (title !== undefined) record.title = title;
  return record;
};

export const formatSalary = (salary: number) => salary.toFixed(2);

export const formatRecordLine = (record: PayrollRecord) =>
  `${record.lastName}, ${record.firstName}, ${record.agency} $${formatSalary(record.salary)} ${record.city}`;
