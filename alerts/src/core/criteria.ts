import { z, ZodIssue } from "zod";
import { AlertCriteria } from "./dto";

export class CriteriaValidationError extends Error {
  constructor(readonly issues: ZodIssue[]) {
    super(
      `Invalid alert criteria: ${issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`
    );
    this.name = "CriteriaValidationError";
  }
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((s) => (s ? s : undefined));

const rangeSchema = z
  .object({
    min: z.number().nonnegative().optional(),
    max: z.number().nonnegative().optional(),
  })
  .strict()
  .refine((r) => r.min === undefined || r.max === undefined || r.min <= r.max, {
    message: "min must not exceed max",
  });

export const criteriaSchema = z
  .object({
    make: optionalText,
    model: optionalText,
    year: rangeSchema.optional(),
    price: rangeSchema.optional(),
    maxMileage: z.number().int().nonnegative().optional(),
    fuelType: optionalText,
    transmission: optionalText,
    bodyType: optionalText,
    condition: optionalText,
    city: optionalText,
    radiusKm: z.number().nonnegative().optional(),
    origin: z
      .object({
        lat: z.number().min(-90).max(90),
        lng: z.number().min(-180).max(180),
      })
      .optional(),
    enginePowerKw: rangeSchema.optional(),
  })
  .strict()
  .superRefine((c, ctx) => {
    if (c.radiusKm !== undefined && !c.city) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["radiusKm"],
        message: "radiusKm requires city",
      });
    }
  });

export const frequencySchema = z.enum(["immediate", "daily", "weekly"]);

export function validateCriteria(input: unknown): AlertCriteria {
  const result = criteriaSchema.safeParse(input);
  if (!result.success) throw new CriteriaValidationError(result.error.issues);
  return result.data;
}
