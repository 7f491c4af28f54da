import { z } from 'zod';

const CoordinatesSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

const ComponentsSchema = z
  .object({
    _type: z.string().optional(),
    _category: z.string().optional(),
    _normalized_city: z.string().optional(),
    ISO_3166_1_alpha_2: z.string().optional(),
    ISO_3166_1_alpha_3: z.string().optional(),
    city: z.string().optional(),
    country: z.string().optional(),
    country_code: z.string().optional(),
    county: z.string().optional(),
    house_number: z.string().optional(),
    postcode: z.string().optional(),
    road: z.string().optional(),
    state: z.string().optional(),
    suburb: z.string().optional(),
    town: z.string().optional(),
    village: z.string().optional(),
  })
  .passthrough();

/** One result. Unknown keys are kept so `raw_json` output carries everything the API sent. */
export const GeocodeResultSchema = z
  .object({
    formatted: z.string().optional(),
    geometry: CoordinatesSchema.optional(),
    bounds: z.object({ northeast: CoordinatesSchema, southwest: CoordinatesSchema }).optional(),
    components: ComponentsSchema.optional(),
    confidence: z.number().optional(),
    annotations: z.record(z.unknown()).optional(),
    distance_from_q: z.record(z.number()).optional(),
  })
  .passthrough();

export const RateInfoSchema = z.object({
  limit: z.number().optional(),
  remaining: z.number().optional(),
  reset: z.number().optional(),
});

export const GeocodeResponseSchema = z.object({
  status: z.object({ code: z.number(), message: z.string() }),
  results: z.array(GeocodeResultSchema),
  rate: RateInfoSchema.optional(),
  total_results: z.number().optional(),
});

/** Error bodies: only the status message and rate block matter. */
export const ErrorBodySchema = z.object({
  status: z.object({ message: z.string() }).optional(),
  rate: RateInfoSchema.optional(),
});
