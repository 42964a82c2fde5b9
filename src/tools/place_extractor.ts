import * as cheerio from 'cheerio';
import type { Place } from '../schemas/place.js';

const DENYLIST = [
  'click here',
  'read more',
  'see more',
  'advertisement',
  'subscribe',
  'follow us',
  'share',
  'comment',
  'login',
  'best',
  'top',
  'things to do',
  'guide',
  'tips',
  'welcome',
  'home',
  'about',
  'contact',
  'privacy',
];

const MAX_DESCRIPTION = 150;
const MAX_PLACES = 15;

export function cleanPlaceName(text: string): string {
  let name = text.replace(/\s+/g, ' ').trim();
  name = name.replace(/^\d+[.)]\s*/, '');
  // "Dec 1, 2025 · "
  name = name.replace(/^[A-Z][a-z]{2}\s+\d{1,2},\s+\d{4}\s*[·•]\s*/, '');
  name = name.replace(/^(?:visit|explore|see|try|check out|the)\s+/i, '');
  name = name.replace(/\s*\([^)]+\)\s*$/, '');
  name = name.replace(/https?:\/\/\S+/g, '');
  name = name.replace(/\S+@\S+/g, '');
  return name.replace(/\s+/g, ' ').trim();
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

export function isValidPlaceName(name: string): boolean {
  if (name.length < 4 || name.length > 80) return false;
  if (!isUpper(name.charAt(0))) return false;
  const lowered = name.toLowerCase();
  if (DENYLIST.some((phrase) => lowered.includes(phrase))) return false;
  // Section banners are usually shouted
  if (name.length > 10 && name === name.toUpperCase() && name !== lowered) return false;
  return /\p{L}/u.test(name);
}

/** Case-insensitive on the name; the first occurrence wins. */
export function dedupePlaces(places: readonly Place[], limit = MAX_PLACES): Place[] {
  const seen = new Set<string>();
  const out: Place[] = [];
  for (const place of places) {
    const key = place.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(place);
    if (out.length >= limit) break;
  }
  return out;
}

const PRICE_PATTERNS = [
  /(?:IDR|Rp|₹|USD|\$|€|£)\s*\d[\d,]*(?:\.\d{2})?/i,
  /\d[\d,]*\s*(?:IDR|Rp|USD|dollars|euros|rupiah)\b/i,
  /(?:entry|admission|ticket)(?:\s+fee)?:\s*\d[\d,]*/i,
];

const HOURS_PATTERNS = [
  /\d{1,2}(?::\d{2})?\s*(?:AM|PM)?\s*[-–]\s*\d{1,2}(?::\d{2})?\s*(?:AM|PM)\b/i,
  /\d{1,2}:\d{2}\s*[-–]\s*\d{1,2}:\d{2}/,
  /(?:open|hours):\s*[\d:APMapm\s-]+\d/i,
];

const RATING_PATTERNS = [/\d(?:\.\d)?\s*(?:out of|\/)\s*[45](?:\s+stars?)?/i, /\d(?:\.\d)?\s*stars?\b/i, /rated\s+\d(?:\.\d)?/i];

function firstMatch(text: string, patterns: readonly RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const m = pattern.exec(text);
    if (m) return m[0].trim();
  }
  return undefined;
}

export function extractPrice(text: string): string | undefined {
  return firstMatch(text, PRICE_PATTERNS);
}

export function extractHours(text: string): string | undefined {
  return firstMatch(text, HOURS_PATTERNS);
}

export function extractRating(text: string): string | undefined {
  return firstMatch(text, RATING_PATTERNS);
}

function makePlace(name: string, description: string, sourceUrl?: string): Place {
  const place: Place = { name, description };
  const price = extractPrice(description);
  const hours = extractHours(description);
  const rating = extractRating(description);
  if (price) place.price = price;
  if (hours) place.hours = hours;
  if (rating) place.rating = rating;
  if (sourceUrl) place.sourceUrl = sourceUrl;
  return place;
}

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const LIST_ITEM = /^\d+[.)]\s*(.+?)(?:\s*[-–—:,]|$)/;

/**
 * Finds candidate places in an article: section headings, numbered list
 * items and bold runs, each paired with the paragraph that follows it.
 */
export function extractPlacesFromHtml(html: string, sourceUrl?: string): Place[] {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();

  type Pending = { name: string; description: string };
  const headings: Pending[] = [];
  const bolds: Pending[] = [];
  let waiting: Pending[] = [];
  let headingCount = 0;
  let boldCount = 0;

  // Selections come back in document order, so the next <p> after a heading
  // or bold run is the next <p> seen in this walk.
  $('h2, h3, h4, strong, b, p').each((_, el) => {
    const tag = el.tagName.toLowerCase();
    const text = squash($(el).text());

    if (tag === 'p') {
      if (waiting.length > 0 && text) {
        const description = text.slice(0, MAX_DESCRIPTION);
        for (const pending of waiting) pending.description = description;
        waiting = [];
      }
      return;
    }

    if (tag === 'strong' || tag === 'b') {
      if (boldCount >= 20) return;
      boldCount++;
      const name = cleanPlaceName(text);
      if (name.length > 5 && isValidPlaceName(name)) {
        const pending = { name, description: '' };
        bolds.push(pending);
        waiting.push(pending);
      }
      return;
    }

    if (headingCount >= 20) return;
    headingCount++;
    const name = cleanPlaceName(text);
    if (isValidPlaceName(name)) {
      const pending = { name, description: '' };
      headings.push(pending);
      waiting.push(pending);
    }
  });

  const listItems: Pending[] = [];
  $('li')
    .slice(0, 30)
    .each((_, el) => {
      const text = squash($(el).text());
      const m = LIST_ITEM.exec(text);
      if (!m?.[1]) return;
      const name = cleanPlaceName(m[1]);
      if (isValidPlaceName(name)) {
        listItems.push({ name, description: text.slice(0, MAX_DESCRIPTION) });
      }
    });

  return dedupePlaces([...headings, ...listItems, ...bolds].map((p) => makePlace(p.name, p.description, sourceUrl)));
}

const ORDINAL_ITEM = /\d+[.)]\s+([A-Z][^.!?\n]{5,70}?)(?=\s*[-–—:,]|\n|$)/g;
const PROPER_NOUN_RUN = /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,3})\b/g;

/** Place names from plain text such as a search snippet. */
export function extractFromText(text: string, sourceUrl?: string): Place[] {
  const places: Place[] = [];

  for (const m of text.matchAll(ORDINAL_ITEM)) {
    const name = cleanPlaceName(m[1] ?? '');
    if (isValidPlaceName(name)) places.push(makePlace(name, '', sourceUrl));
  }

  let nouns = 0;
  for (const m of text.matchAll(PROPER_NOUN_RUN)) {
    if (nouns++ >= 10) break;
    const name = m[1] ?? '';
    if (isValidPlaceName(name)) places.push(makePlace(name, '', sourceUrl));
  }

  return dedupePlaces(places);
}
