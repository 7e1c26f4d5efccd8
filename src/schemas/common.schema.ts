import { z } from "zod";
import { toNaiveDateTime } from "../utils/time";

/**
 * Any ISO-like date/datetime string, normalized to timezone-naive `YYYY-MM-DD HH:MM:SS`.
 */
export const naiveDateTime = z.string().transform((value, ctx) => {
  const normalized = toNaiveDateTime(value);

  if (!normalized) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid datetime: "${value}"`,
    });
    return z.NEVER;
  }

  return normalized;
});
