import { z } from 'zod';

/**
 * A place prayer times are calculated for.
 * Persisted inside the settings file and in the built-in catalogue.
 */
export const locationSchema = z.object({
  city: z.string().min(1),
  country: z.string().min(1),

  /** ISO 3166-1 alpha-2, stored upper-case */
  countryCode: z
    .string()
    .min(2)
    .max(3)
    .transform((v) => v.toUpperCase()),

  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),

  /** Free-form label, e.g. the geocoder's display name */
  addressLabel: z.string().min(1).optional(),

  /** Diyanet district (ilce) id, only meaningful for locations in Turkey */
  diyanetIlceId: z.string().regex(/^\d+$/, 'must be numeric').optional(),
});

export type Location = z.infer<typeof locationSchema>;

export const locationCatalogueSchema = z.array(locationSchema).min(1);
