import { z } from 'zod';

export interface Meals {
  breakfast: string;
  lunch: string;
  dinner: string;
}

export interface DayPlan {
  day: number;
  morning: string;
  afternoon: string;
  evening: string;
  meals: Meals;
  estimatedCost: number;
}

export type BudgetType = 'budget' | 'balanced' | 'luxury';

export interface Itinerary {
  title: string;
  budgetType: BudgetType;
  totalCost: number;
  currency: string;
  days: DayPlan[];
  accommodationSuggestions: string[];
  packingList: string[];
  tips: string[];
}

export const TripPlanInput = z
  .object({
    destination: z.string().trim().min(2).max(100),
    duration_days: z.number().int().min(1).max(30),
    budget: z.number().positive().finite(),
    currency: z.string().trim().min(3).max(3).toUpperCase().default('USD'),
    interests: z.array(z.string().trim().min(1)).max(20).default([]),
    dietary_preferences: z.array(z.string().trim().min(1)).max(20).default([]),
    session_id: z.string().min(1).max(64).optional(),
  })
  .transform((v) => ({
    destination: v.destination,
    durationDays: v.duration_days,
    budget: v.budget,
    currency: v.currency,
    interests: v.interests,
    dietaryPreferences: v.dietary_preferences,
    sessionId: v.session_id,
  }));

export type TripPlanRequest = z.output<typeof TripPlanInput>;

const ModelText = z.union([z.string(), z.number()]).transform(String);

const ModelCost = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string') {
      const n = Number.parseFloat(v.replace(/[^0-9.-]/g, ''));
      return Number.isNaN(n) ? undefined : n;
    }
    return undefined;
  });

const ModelDay = z.object({
  day: z.coerce.number().int().optional(),
  morning: ModelText,
  afternoon: ModelText,
  evening: ModelText,
  meals: z
    .object({
      breakfast: ModelText.optional(),
      lunch: ModelText.optional(),
      dinner: ModelText.optional(),
    })
    .optional(),
  estimated_cost: ModelCost,
});

/** The itinerary JSON a model is asked to produce. */
export const ModelItinerarySchema = z.object({
  title: z.string().optional(),
  days: z.array(ModelDay).min(1),
  accommodation_suggestions: z.array(ModelText).optional(),
  packing_list: z.array(ModelText).optional(),
  tips: z.array(ModelText).optional(),
});

export type ModelDayPlan = z.output<typeof ModelDay>;
