import type { ContextBundle } from '../schemas/context.js';
import type { Place } from '../schemas/place.js';
import { ModelItinerarySchema, type DayPlan, type Itinerary, type ModelDayPlan, type TripPlanRequest } from '../schemas/itinerary.js';
import { incFallback } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';
import {
  PACKING_LIST,
  buildFallbackItinerary,
  curatedPlaces,
  genericTips,
  roundMoney,
  sumCosts,
} from './fallback_itinerary.js';
import { parseModelJson } from './json_extract.js';
import type { TextGenerator } from './llm.js';
import { getPrompt, renderPrompt } from './prompts.js';
import type { Msg } from './session_store.js';

const CHAT_MAX_TOKENS = 1000;
const PLAN_MAX_TOKENS = 3000;
const TEMPERATURE = 0.7;
const HISTORY_TURNS = 6;
const PLACES_PER_SECTION = 10;

function clip(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

function placeLine(index: number, place: Place, parts: Array<string | undefined>): string {
  const extras = parts.filter((p): p is string => Boolean(p));
  return `${index + 1}. ${place.name}${extras.map((e) => ` - ${e}`).join('')}`;
}

/** The bundle as labelled plain-text sections for a prompt. */
export function formatContext(bundle: ContextBundle): string {
  const lines: string[] = [];

  if (bundle.documentExcerpts.length > 0) {
    lines.push('=== FROM YOUR UPLOADED DOCUMENTS ===');
    for (const excerpt of bundle.documentExcerpts) lines.push(`- ${clip(excerpt.content, 300)}`);
    lines.push('');
  }

  const { weather, attractions, restaurants, hotels, tips } = bundle.categoryResults;
  if (weather || attractions || restaurants || hotels || tips) {
    lines.push('=== REAL-TIME INFORMATION ===');
    if (weather) {
      lines.push('', `Weather in ${weather.city}:`, weather.summary);
    }
    if (attractions) {
      lines.push('', `Top Attractions (${attractions.length} found):`);
      attractions.slice(0, PLACES_PER_SECTION).forEach((p, i) => {
        const desc = p.description ? clip(p.description, 100) : undefined;
        lines.push(`${placeLine(i, p, [desc])}${p.price ? ` (${p.price})` : ''}`);
      });
    }
    if (restaurants) {
      lines.push('', `Restaurants (${restaurants.length} found):`);
      restaurants.slice(0, PLACES_PER_SECTION).forEach((p, i) => {
        lines.push(placeLine(i, p, [p.cuisine, p.description ? clip(p.description, 80) : undefined]));
      });
    }
    if (hotels) {
      lines.push('', `Hotels (${hotels.length} found):`);
      hotels.slice(0, PLACES_PER_SECTION).forEach((p, i) => {
        lines.push(placeLine(i, p, [p.description ? clip(p.description, 80) : undefined, p.price]));
      });
    }
    if (tips) {
      lines.push('', 'Travel tips:', tips);
    }
    lines.push('');
  }

  return lines.join('\n').trim();
}

export function formatHistory(turns: readonly Msg[]): string {
  return turns
    .slice(-HISTORY_TURNS)
    .map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.content}`)
    .join('\n');
}

/**
 * What to say when the model is unavailable: the gathered facts, listed
 * as they are.
 */
export function degradedAnswer(bundle: ContextBundle, location?: string): string {
  const lines = [
    `I couldn't reach the language model just now${location ? `, but here is what I found for ${location}` : ''}.`,
  ];
  const { weather, attractions, restaurants, hotels, tips } = bundle.categoryResults;

  if (weather) lines.push('', `Weather in ${weather.city}: ${weather.summary}`);
  const sections: Array<[string, readonly Place[] | undefined]> = [
    ['Attractions', attractions],
    ['Restaurants', restaurants],
    ['Hotels', hotels],
  ];
  for (const [label, places] of sections) {
    if (!places || places.length === 0) continue;
    lines.push('', `${label}:`);
    places.slice(0, 5).forEach((p, i) => lines.push(placeLine(i, p, [p.description || undefined])));
  }
  if (tips) lines.push('', 'Travel tips:', tips);
  if (bundle.documentExcerpts.length > 0) {
    lines.push('', 'From your documents:');
    for (const excerpt of bundle.documentExcerpts) lines.push(`- ${clip(excerpt.content, 200)}`);
  }

  if (lines.length === 1) {
    lines.push('', 'I have no information to share for this request yet. Please try again in a moment.');
  }
  return lines.join('\n');
}

function numberedList(places: readonly Place[], limit: number, descMax: number, empty: string): string {
  if (places.length === 0) return empty;
  return places
    .slice(0, limit)
    .map((p, i) => `  ${i + 1}. ${p.name}${p.description ? ` - ${clip(p.description, descMax)}` : ''}`)
    .join('\n');
}

function usableCost(cost: number | undefined): cost is number {
  return cost !== undefined && Number.isFinite(cost) && cost >= 0;
}

/**
 * Fits model days to the requested duration: extra days are dropped, missing
 * ones come from `fallbackDays`, and days are renumbered from 1. A day without
 * a usable cost takes the fallback day's share of the budget.
 */
export function normaliseDays(modelDays: readonly ModelDayPlan[], fallbackDays: readonly DayPlan[]): DayPlan[] {
  return fallbackDays.map((fallback, i) => {
    const md = modelDays[i];
    if (!md) return { ...fallback, day: i + 1 };
    return {
      day: i + 1,
      morning: md.morning,
      afternoon: md.afternoon,
      evening: md.evening,
      meals: {
        breakfast: md.meals?.breakfast ?? fallback.meals.breakfast,
        lunch: md.meals?.lunch ?? fallback.meals.lunch,
        dinner: md.meals?.dinner ?? fallback.meals.dinner,
      },
      estimatedCost: usableCost(md.estimated_cost) ? roundMoney(md.estimated_cost) : fallback.estimatedCost,
    };
  });
}

export interface ChatInputs {
  query: string;
  bundle: ContextBundle;
  history: readonly Msg[];
  location?: string;
}

export interface ChatAnswer {
  text: string;
  degraded: boolean;
}

export interface PlanOutcome {
  itinerary: Itinerary;
  usedFallback: boolean;
  reason?: string;
}

export class AnswerSynthesizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly log: Logger,
  ) {}

  async answerChat(input: ChatInputs): Promise<ChatAnswer> {
    try {
      const [system, template] = await Promise.all([getPrompt('chat_system'), getPrompt('chat_user')]);
      const history = formatHistory(input.history);
      const context = formatContext(input.bundle);
      const prompt = renderPrompt(template, {
        message: input.query,
        history_block: history ? `Previous conversation:\n${history}\n\n` : '',
        context_block: context
          ? `Available information:\n${context}\n\n`
          : 'No specific data is available. Answer from general travel knowledge and say that live information could not be retrieved.\n\n',
      });

      const out = await this.generator.generate(prompt, { system, maxTokens: CHAT_MAX_TOKENS, temperature: TEMPERATURE });
      if (out.ok) return { text: out.text, degraded: false };
      this.log.warn({ reason: out.reason }, 'chat generation failed, answering from context');
    } catch (err) {
      this.log.error({ err }, 'chat synthesis crashed, answering from context');
    }
    incFallback('chat');
    return { text: degradedAnswer(input.bundle, input.location), degraded: true };
  }

  async planItinerary(request: TripPlanRequest, bundle: ContextBundle): Promise<PlanOutcome> {
    const results = bundle.categoryResults;
    const attractions = results.attractions?.length ? results.attractions : curatedPlaces('attractions', request.destination);
    const restaurants = results.restaurants?.length ? results.restaurants : curatedPlaces('restaurants', request.destination);
    const hotels = results.hotels ?? [];
    const fallback = buildFallbackItinerary({ ...request, attractions, restaurants, hotels });
    const dailyCost = roundMoney(request.budget / request.durationDays);

    const useFallback = (reason: string): PlanOutcome => {
      incFallback('itinerary');
      this.log.warn({ reason }, 'using fallback itinerary');
      return { itinerary: fallback, usedFallback: true, reason };
    };

    try {
      const [system, template] = await Promise.all([getPrompt('planner_system'), getPrompt('planner_user')]);
      const prompt = renderPrompt(template, {
        days: request.durationDays,
        destination: request.destination,
        budget: request.budget.toFixed(2),
        daily_budget: dailyCost.toFixed(2),
        currency: request.currency,
        interests: request.interests.length > 0 ? request.interests.join(', ') : 'general sightseeing',
        dietary: request.dietaryPreferences.length > 0 ? request.dietaryPreferences.join(', ') : 'none',
        weather: results.weather?.summary ?? 'No weather information available.',
        attractions: numberedList(attractions, 15, 80, '  (none found; suggest well-known sights)'),
        restaurants: numberedList(restaurants, 15, 60, '  (none found; suggest local dining)'),
        hotels: numberedList(hotels, 10, 60, '  (none found; suggest suitable accommodation)'),
        tips: results.tips ?? 'None.',
      });

      const out = await this.generator.generate(prompt, { system, maxTokens: PLAN_MAX_TOKENS, temperature: TEMPERATURE });
      if (!out.ok) return useFallback(out.reason);

      const parsed = parseModelJson(out.text, ModelItinerarySchema);
      if (!parsed.ok) return useFallback(parsed.reason);

      const model = parsed.value;
      if (model.days.length !== request.durationDays) {
        this.log.info({ requested: request.durationDays, returned: model.days.length }, 'itinerary day count adjusted');
      }
      const days = normaliseDays(model.days, fallback.days);

      return {
        usedFallback: false,
        itinerary: {
          title: model.title?.trim() || `Best Trip to ${request.destination}`,
          budgetType: 'balanced',
          totalCost: sumCosts(days),
          currency: request.currency,
          days,
          accommodationSuggestions: model.accommodation_suggestions?.length ? model.accommodation_suggestions : fallback.accommodationSuggestions,
          packingList: model.packing_list?.length ? model.packing_list : [...PACKING_LIST],
          tips: model.tips?.length ? model.tips : genericTips(request.destination),
        },
      };
    } catch (err) {
      this.log.error({ err }, 'itinerary synthesis crashed');
      return useFallback('error');
    }
  }
}
