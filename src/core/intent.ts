import cities from '../data/cities.json';
import type { Intent } from '../schemas/context.js';

const KEYWORDS = {
  documents: ['document', 'visa', 'requirement', 'uploaded', 'my file'],
  weather: ['weather', 'temperature', 'climate', 'forecast', 'rain'],
  hotels: ['hotel', 'stay', 'accommodation', 'lodging', 'where to stay'],
  attractions: ['attraction', 'visit', 'see', 'things to do', 'sightseeing', 'places'],
  restaurants: ['restaurant', 'food', 'eat', 'dining', 'cuisine'],
  generalKnowledge: ['how to', 'what is', 'when is', 'best time', 'cost', 'price'],
} as const;

const PREPOSITIONS = new Set(['in', 'at', 'near', 'around']);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// A keyword matches where a word starts, so "hotel" finds "hotels" but "eat"
// does not fire inside "weather".
function keywordPattern(words: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${words.map(escapeRegExp).join('|')})`, 'i');
}

const PATTERNS = {
  documents: keywordPattern(KEYWORDS.documents),
  weather: keywordPattern(KEYWORDS.weather),
  hotels: keywordPattern(KEYWORDS.hotels),
  attractions: keywordPattern(KEYWORDS.attractions),
  restaurants: keywordPattern(KEYWORDS.restaurants),
  generalKnowledge: keywordPattern(KEYWORDS.generalKnowledge),
};

export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .split(/(\s+|-)/)
    .map((part) => (part ? part.charAt(0).toUpperCase() + part.slice(1) : part))
    .join('');
}

export function extractLocation(query: string): string | undefined {
  const lowered = query.toLowerCase();
  const hit = cities.find((city) => lowered.includes(city));
  if (hit) return titleCase(hit);

  if (!lowered.includes('places') && !lowered.includes('attractions')) return undefined;

  const tokens = lowered.split(/\s+/).filter(Boolean);
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (token === undefined || next === undefined || !PREPOSITIONS.has(token)) continue;
    const candidate = next.replace(/[?,.!]+$/, '');
    if (/\p{L}/u.test(candidate)) return titleCase(candidate);
  }
  return undefined;
}

/** Keyword classification of a query. Flags are independent of each other. */
export function classifyIntent(query: string): Intent {
  const location = extractLocation(query);
  return Object.freeze({
    needsDocuments: PATTERNS.documents.test(query),
    needsWeather: PATTERNS.weather.test(query),
    needsHotels: PATTERNS.hotels.test(query),
    needsAttractions: PATTERNS.attractions.test(query),
    needsRestaurants: PATTERNS.restaurants.test(query),
    needsGeneralKnowledge: PATTERNS.generalKnowledge.test(query),
    ...(location ? { location } : {}),
  });
}
