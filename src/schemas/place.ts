import { z } from 'zod';

export const PlaceSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  price: z.string().optional(),
  hours: z.string().optional(),
  rating: z.string().optional(),
  cuisine: z.string().optional(),
  amenities: z.string().optional(),
  sourceUrl: z.string().optional(),
});

export type Place = z.infer<typeof PlaceSchema>;

// Models return numbers, lists or null where a string is asked for
const LooseText = z
  .union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return undefined;
    const text = Array.isArray(v) ? v.join(', ') : String(v);
    return text.trim() || undefined;
  });

/** One entry of a model-produced place list. Unknown keys are ignored. */
export const ModelPlaceSchema = z
  .object({
    name: z.string().trim().min(1),
    description: LooseText,
    price: LooseText,
    price_range: LooseText,
    hours: LooseText,
    rating: LooseText,
    cuisine: LooseText,
    amenities: LooseText,
  })
  .transform(
    (p): Place => ({
      name: p.name,
      description: p.description ?? '',
      price: p.price ?? p.price_range,
      hours: p.hours,
      rating: p.rating,
      cuisine: p.cuisine,
      amenities: p.amenities,
    }),
  );

/** Envelope of a place list; entries are validated one by one. */
export const ModelPlacesPayloadSchema = z.object({
  places: z.array(z.unknown()),
});
