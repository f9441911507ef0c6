import { z } from "zod";
import { ValidationError } from "./errors.js";
import { isIsoDate } from "./dates.js";

export const IsoDate = z.string().refine(isIsoDate, { message: "must be a calendar date in YYYY-MM-DD form" });

export const Quantity = z.number({ invalid_type_error: "quantity must be a number" })
  .int("quantity must be a whole number")
  .min(1, "quantity must be at least 1");

export const WorkerInputSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  email: z.string().trim().email("email must be a valid address"),
  phone: z.string().optional()
});

export const HouseInputSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  comment: z.string().optional()
});

export const SelectionSchema = z.object({
  houseId: z.string().min(1),
  quantity: Quantity,
  comment: z.string().optional()
});

/** Parses `raw` or throws a ValidationError listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const res = schema.safeParse(raw);
  if (res.success) return res.data;
  const issues = res.error.issues.map(i => ({ path: i.path.join("."), message: i.message }));
  const first = issues[0];
  const msg = first ? (first.path ? `${first.path}: ${first.message}` : first.message) : "invalid input";
  throw new ValidationError(msg, { issues });
}
