import { z } from "zod";
import { BadRequestError } from "./errors";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// A real calendar day: "2024-02-30" matches the pattern but rolls over.
export const isIsoDate = (value: string): boolean => {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

export const isoDate = z
  .string()
  .refine(isIsoDate, { message: "Must be an ISO date (YYYY-MM-DD)" });

// VARCHAR(n) limits characters, not UTF-16 code units, so count code points.
export const text = (min: number, max: number) =>
  z.string().refine(
    (value) => {
      const length = [...value].length;
      return length >= min && length <= max;
    },
    { message: min > 0 ? `Must be ${min} to ${max} characters` : `Must be at most ${max} characters` },
  );

export const customerSchema = z.object({
  name: text(1, 63),
  address: text(0, 255),
  email: text(0, 255),
  phone_number: text(0, 32),
  member_since: isoDate,
  status: text(1, 32),
});

const filterValue = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

// A repeated query param arrives as an array and fails as a non-string.
export const customerQuerySchema = z.object({
  name: filterValue,
  address: filterValue,
  email: filterValue,
  phone_number: filterValue,
  member_since: isoDate.optional().or(z.literal("").transform(() => undefined)),
  status: filterValue,
});

export const validate = <T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestError("Invalid payload", result.error.flatten());
  }
  return result.data;
};
