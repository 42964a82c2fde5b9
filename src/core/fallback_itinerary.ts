import curated from '../data/fallback_places.json';
import type { Place } from '../schemas/place.js';
import type { BudgetType, DayPlan, Itinerary } from '../schemas/itinerary.js';

export const PACKING_LIST: readonly string[] = [
  'Comfortable walking shoes',
  'Weather-appropriate clothing',
  'Travel documents and copies',
  'Camera/smartphone with charger',
  'Universal power adapter',
  'Personal toiletries',
  'Daypack for excursions',
  'Reusable water bottle',
  'Sunscreen and sunglasses',
  'Light rain jacket',
];

export function genericTips(destination: string): string[] {
  return [
    `Book ${destination} attractions in advance to save time`,
    'Download offline maps before arrival',
    'Try authentic local cuisine',
    'Use local transportation to save money',
    'Respect local customs and dress codes',
    'Keep copies of important documents',
    `Check visa requirements for ${destination}`,
  ];
}

type CuratedKind = keyof typeof curated;

/** Hand-picked places for a few well-known destinations. */
export function curatedPlaces(kind: CuratedKind, destination: string): Place[] {
  const lowered = destination.toLowerCase();
  const hit = Object.entries(curated[kind]).find(([key]) => lowered.includes(key));
  return hit ? hit[1].map((p) => ({ ...p })) : [];
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * The budget in per-day shares rounded to cents. The last day takes the
 * remainder so the shares add up to the budget.
 */
export function splitBudget(budget: number, days: number): number[] {
  const daily = roundMoney(budget / days);
  const shares = Array.from({ length: days }, () => daily);
  shares[days - 1] = roundMoney(budget - daily * (days - 1));
  return shares;
}

export function sumCosts(days: readonly DayPlan[]): number {
  return roundMoney(days.reduce((total, day) => total + day.estimatedCost, 0));
}

function capitalise(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export interface FallbackInput {
  destination: string;
  durationDays: number;
  budget: number;
  currency: string;
  budgetType?: BudgetType;
  attractions: readonly Place[];
  restaurants: readonly Place[];
  hotels: readonly Place[];
}

/** The plan for one day, rotating through the available places. */
export function fallbackDay(
  day: number,
  attractions: readonly Place[],
  restaurants: readonly Place[],
  dailyCost: number,
): DayPlan {
  const pick = (list: readonly Place[], index: number): Place => list[index % list.length] ?? { name: 'Local spot', description: '' };
  const morning = pick(attractions, (day - 1) * 2);
  const afternoon = pick(attractions, (day - 1) * 2 + 1);
  const breakfast = pick(restaurants, (day - 1) * 3);
  const lunch = pick(restaurants, (day - 1) * 3 + 1);
  const dinner = pick(restaurants, (day - 1) * 3 + 2);

  return {
    day,
    morning: `9 AM: Visit ${morning.name} - ${morning.description || 'Sightseeing and exploration'}`,
    afternoon: `2 PM: Explore ${afternoon.name} - ${afternoon.description || 'Continue exploring'}`,
    evening: `7 PM: Dinner at ${dinner.name} followed by evening stroll`,
    meals: {
      breakfast: `${breakfast.name} - Local breakfast`,
      lunch: `${lunch.name} - Lunch`,
      dinner: `${dinner.name} - Dinner`,
    },
    estimatedCost: dailyCost,
  };
}

export function withPlaceholders(input: FallbackInput): { attractions: readonly Place[]; restaurants: readonly Place[] } {
  return {
    attractions:
      input.attractions.length > 0
        ? input.attractions
        : [{ name: `Popular attraction in ${input.destination}`, description: 'Must-see location' }],
    restaurants:
      input.restaurants.length > 0 ? input.restaurants : [{ name: 'Local restaurant', description: 'Traditional cuisine' }],
  };
}

/**
 * A complete itinerary built without the model, from whatever places were
 * gathered. Always has `durationDays` days whose costs add up to the budget.
 */
export function buildFallbackItinerary(input: FallbackInput): Itinerary {
  const budgetType = input.budgetType ?? 'balanced';
  const { attractions, restaurants } = withPlaceholders(input);
  const days = splitBudget(input.budget, input.durationDays).map((cost, i) =>
    fallbackDay(i + 1, attractions, restaurants, cost),
  );

  const accommodationSuggestions = input.hotels
    .slice(0, 5)
    .map((h) => `${h.name} - ${h.description || 'Good location'}`);

  return {
    title: `${capitalise(budgetType)} Trip to ${input.destination}`,
    budgetType,
    totalCost: sumCosts(days),
    currency: input.currency,
    days,
    accommodationSuggestions:
      accommodationSuggestions.length > 0 ? accommodationSuggestions : [`${capitalise(budgetType)} hotel in ${input.destination}`],
    packingList: [...PACKING_LIST],
    tips: genericTips(input.destination),
  };
}
