import { z } from "zod";
import { ScrapedListing } from "./dto";
import { MalformedListingError } from "./errors";

const text = z.string().trim().min(1);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((s) => (s ? s : undefined));

const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

// normalizers emit null for unknown fields
function dropNulls(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
  return Object.fromEntries(Object.entries(raw).filter(([, v]) => v !== null));
}

const listingObject = z
  .object({
    sourceWebsite: text,
    externalId: z
      .union([z.string(), z.number()])
      .transform((v) => String(v).trim())
      .optional(),
    // a malformed URL is dropped rather than failing the record
    listingUrl: z.string().trim().url().optional().catch(undefined),
    make: text,
    model: text,
    year: z.number().int().min(1886).max(2100).optional(),
    price: z.number().int().nonnegative(),
    currency: z
      .string()
      .trim()
      .length(3)
      .transform((c) => c.toUpperCase())
      .default("EUR"),
    mileage: z.number().int().nonnegative().optional(),
    fuelType: optionalText,
    transmission: optionalText,
    bodyType: optionalText,
    condition: optionalText,
    enginePowerKw: z.number().nonnegative().optional(),
    city: optionalText,
    region: optionalText,
    location: geoPointSchema.optional(),
  })
  .transform((v, ctx): ScrapedListing => {
    // the normalizer may only know the URL; it doubles as the external id
    const externalId = v.externalId || v.listingUrl;
    if (!externalId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["externalId"],
        message: "externalId or listingUrl is required",
      });
      return z.NEVER;
    }
    return { ...v, externalId };
  });

export const scrapedListingSchema = z.preprocess(dropNulls, listingObject);

export function parseScrapedListing(raw: unknown): ScrapedListing {
  const result = scrapedListingSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedListingError(result.error.issues, raw);
  }
  return result.data;
}
