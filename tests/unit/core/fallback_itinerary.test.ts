import {
  PACKING_LIST,
  buildFallbackItinerary,
  curatedPlaces,
  splitBudget,
  sumCosts,
} from '../../../src/core/fallback_itinerary.js';
import type { Place } from '../../../src/schemas/place.js';

const attractions: Place[] = [
  { name: 'Old Fort', description: 'Harbour fortress' },
  { name: 'City Museum', description: '' },
];
const restaurants: Place[] = [
  { name: 'Cafe Uno', description: '' },
  { name: 'Bistro Due', description: '' },
  { name: 'Trattoria Tre', description: '' },
];

describe('buildFallbackItinerary', () => {
  const itinerary = buildFallbackItinerary({
    destination: 'Porto',
    durationDays: 4,
    budget: 1000,
    currency: 'EUR',
    attractions,
    restaurants,
    hotels: [],
  });

  it('has one day per requested day with the budget split evenly', () => {
    expect(itinerary.days.map((d) => d.day)).toEqual([1, 2, 3, 4]);
    expect(itinerary.days.map((d) => d.estimatedCost)).toEqual([250, 250, 250, 250]);
    expect(itinerary.totalCost).toBe(1000);
    expect(itinerary.totalCost).toBe(sumCosts(itinerary.days));
  });

  it('rotates attractions two per day', () => {
    expect(itinerary.days[0]?.morning).toBe('9 AM: Visit Old Fort - Harbour fortress');
    expect(itinerary.days[0]?.afternoon).toBe('2 PM: Explore City Museum - Continue exploring');
    expect(itinerary.days[2]?.morning).toBe('9 AM: Visit Old Fort - Harbour fortress');
  });

  it('rotates restaurants three per day', () => {
    expect(itinerary.days[1]?.meals).toEqual({
      breakfast: 'Cafe Uno - Local breakfast',
      lunch: 'Bistro Due - Lunch',
      dinner: 'Trattoria Tre - Dinner',
    });
    expect(itinerary.days[1]?.evening).toBe('7 PM: Dinner at Trattoria Tre followed by evening stroll');
  });

  it('fills the remaining sections with defaults', () => {
    expect(itinerary.title).toBe('Balanced Trip to Porto');
    expect(itinerary.currency).toBe('EUR');
    expect(itinerary.accommodationSuggestions).toEqual(['Balanced hotel in Porto']);
    expect(itinerary.packingList).toEqual([...PACKING_LIST]);
    expect(itinerary.tips[0]).toBe('Book Porto attractions in advance to save time');
  });

  it('uses placeholders when nothing was gathered', () => {
    const bare = buildFallbackItinerary({
      destination: 'Nowhere',
      durationDays: 1,
      budget: 100,
      currency: 'USD',
      attractions: [],
      restaurants: [],
      hotels: [{ name: 'Inn One', description: '' }],
    });
    expect(bare.days[0]?.morning).toBe('9 AM: Visit Popular attraction in Nowhere - Must-see location');
    expect(bare.days[0]?.meals.lunch).toBe('Local restaurant - Lunch');
    expect(bare.accommodationSuggestions).toEqual(['Inn One - Good location']);
  });

  it('puts the leftover cents on the last day when the budget does not split evenly', () => {
    const odd = buildFallbackItinerary({
      destination: 'Porto',
      durationDays: 3,
      budget: 100,
      currency: 'EUR',
      attractions,
      restaurants,
      hotels: [],
    });
    expect(odd.days.map((d) => d.estimatedCost)).toEqual([33.33, 33.33, 33.34]);
    expect(odd.totalCost).toBe(100);
  });
});

describe('splitBudget', () => {
  it('keeps the shares adding up to the budget', () => {
    expect(splitBudget(1000, 3)).toEqual([333.33, 333.33, 333.34]);
    expect(splitBudget(900, 3)).toEqual([300, 300, 300]);
    expect(splitBudget(50, 1)).toEqual([50]);
  });
});

describe('curatedPlaces', () => {
  it('matches destinations containing a curated key', () => {
    expect(curatedPlaces('attractions', 'Bali, Indonesia')[0]).toEqual({
      name: 'Tanah Lot Temple',
      description: 'Ancient Hindu shrine on a sea rock',
    });
  });

  it('returns nothing for other destinations', () => {
    expect(curatedPlaces('restaurants', 'Porto')).toEqual([]);
  });
});
