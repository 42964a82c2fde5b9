import type { Intent } from '../schemas/context.js';
import type { Itinerary, TripPlanRequest } from '../schemas/itinerary.js';
import type { ContextGatherer } from '../core/context_gatherer.js';
import { getThreadId } from '../core/memory.js';
import type { AnswerSynthesizer } from '../core/synthesizer.js';
import type { Logger } from '../util/logging.js';

export interface DayPlanWire {
  day: number;
  morning: string;
  afternoon: string;
  evening: string;
  meals: { breakfast: string; lunch: string; dinner: string };
  estimated_cost: number;
}

export interface ItineraryWire {
  title: string;
  budget_type: string;
  total_cost: number;
  currency: string;
  days: DayPlanWire[];
  accommodation_suggestions: string[];
  packing_list: string[];
  tips: string[];
}

export interface TripPlanResponse {
  destination: string;
  duration: number;
  itinerary: ItineraryWire;
  map_link: string;
}

export function mapLink(destination: string): string {
  return `https://www.google.com/maps/search/${destination.trim().replace(/\s+/g, '+')}`;
}

export function toWire(itinerary: Itinerary): ItineraryWire {
  return {
    title: itinerary.title,
    budget_type: itinerary.budgetType,
    total_cost: itinerary.totalCost,
    currency: itinerary.currency,
    days: itinerary.days.map((d) => ({
      day: d.day,
      morning: d.morning,
      afternoon: d.afternoon,
      evening: d.evening,
      meals: { ...d.meals },
      estimated_cost: d.estimatedCost,
    })),
    accommodation_suggestions: itinerary.accommodationSuggestions,
    packing_list: itinerary.packingList,
    tips: itinerary.tips,
  };
}

/** Planning looks up every category for the destination. */
export function planningIntent(destination: string): Intent {
  return Object.freeze({
    needsDocuments: false,
    needsWeather: true,
    needsHotels: true,
    needsAttractions: true,
    needsRestaurants: true,
    needsGeneralKnowledge: true,
    location: destination,
  });
}

export interface TripPlannerDeps {
  gatherer: ContextGatherer;
  synthesizer: AnswerSynthesizer;
  log: Logger;
}

export class TripPlanner {
  constructor(private readonly deps: TripPlannerDeps) {}

  async planTrip(request: TripPlanRequest): Promise<TripPlanResponse> {
    const { gatherer, synthesizer, log } = this.deps;
    const started = Date.now();
    const query = `Plan a ${request.durationDays}-day trip to ${request.destination}`;

    const { bundle } = await gatherer.gather({
      query,
      sessionId: getThreadId(request.sessionId),
      intent: planningIntent(request.destination),
    });
    const outcome = await synthesizer.planItinerary(request, bundle);

    log.info(
      {
        days: outcome.itinerary.days.length,
        toolCalls: bundle.toolCalls,
        fallback: outcome.usedFallback,
        reason: outcome.reason,
        ms: Date.now() - started,
      },
      'trip planned',
    );

    return {
      destination: request.destination,
      duration: request.durationDays,
      itinerary: toWire(outcome.itinerary),
      map_link: mapLink(request.destination),
    };
  }
}
