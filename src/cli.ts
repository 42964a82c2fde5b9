#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import MarkdownIt from 'markdown-it';
import type { ItineraryWire } from './agent/planner.js';
import { PLAN_USAGE, parseCommand } from './cli_commands.js';
import { loadAppConfig } from './config/app.js';
import { loadSessionConfig } from './config/session.js';
import { getThreadId } from './core/memory.js';
import { preloadPrompts } from './core/prompts.js';
import { createServices } from './services.js';
import { InputError } from './tools/errors.js';
import { createLogger } from './util/logging.js';

const log = createLogger({ level: process.env.LOG_LEVEL || 'warn' });

const md = new MarkdownIt({
  breaks: true,
  linkify: true,
});

const FRAME_BAR = '─'.repeat(44);

type Styler = (value: string) => string;

const NAMED_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);/gi, (_match: string, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_match: string, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&[a-z]+;/gi, (entity: string) => NAMED_ENTITIES[entity] ?? entity);
}

function printBlock(title: string, message: string, accent: Styler, body: Styler): void {
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  console.log(accent(topPlain));
  for (const line of message.split('\n')) {
    console.log(`${accent('│')} ${body(line.length === 0 ? ' ' : line)}`);
  }
  console.log(accent(`└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`));
}

function renderMarkdownToTerminal(markdown: string): string {
  const formatted = md
    .render(markdown)
    .replace(/<h[1-3]>(.*?)<\/h[1-3]>/gi, chalk.bold.cyan('\n$1'))
    .replace(/<h[4-6]>(.*?)<\/h[4-6]>/gi, chalk.bold.magenta('\n$1'))
    .replace(/<strong>(.*?)<\/strong>/gi, chalk.bold('$1'))
    .replace(/<em>(.*?)<\/em>/gi, chalk.italic('$1'))
    .replace(/<code>(.*?)<\/code>/gi, chalk.bgGray.white(' $1 '))
    .replace(/<a href="([^"]+)">(.*?)<\/a>/gi, (_m: string, href: string, text: string) => {
      return chalk.blue.underline(text) + ' ' + chalk.gray('(' + href + ')');
    })
    .replace(/<\/?(ul|ol)>/gi, '')
    .replace(/<li>(.*?)<\/li>/gi, '  • $1\n')
    .replace(/<p>(.*?)<\/p>/gi, '$1\n')
    .replace(/<br\s*\/?>(?!\n)/gi, '\n')
    .replace(/<\/?[^>]+(>|$)/g, '')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();

  return decodeHtmlEntities(formatted);
}

function formatItinerary(it: ItineraryWire, mapLink: string): string {
  const lines = [chalk.bold(it.title), chalk.gray(`Total: ${it.total_cost.toFixed(2)} ${it.currency}`), ''];
  for (const day of it.days) {
    lines.push(chalk.yellow.bold(`Day ${day.day}`) + chalk.gray(` (${day.estimated_cost.toFixed(2)} ${it.currency})`));
    lines.push(`  Morning:   ${day.morning}`);
    lines.push(`  Afternoon: ${day.afternoon}`);
    lines.push(`  Evening:   ${day.evening}`);
    lines.push(chalk.gray(`  Meals: ${day.meals.breakfast} | ${day.meals.lunch} | ${day.meals.dinner}`));
  }
  lines.push('', chalk.bold('Where to stay'), ...it.accommodation_suggestions.map((s) => `  • ${s}`));
  lines.push('', chalk.bold('Packing list'), ...it.packing_list.map((s) => `  • ${s}`));
  lines.push('', chalk.bold('Tips'), ...it.tips.map((s) => `  • ${s}`));
  lines.push('', chalk.blue.underline(mapLink));
  return lines.join('\n');
}

const HELP = [
  'Ask any travel question, or use a command:',
  `  ${PLAN_USAGE}`,
  '  /upload <path>   add a PDF, DOCX or TXT file to this session',
  '  /reset           forget this session',
  '  /exit            quit',
].join('\n');

async function main(): Promise<void> {
  await preloadPrompts();
  const services = createServices({ app: loadAppConfig(), session: loadSessionConfig(), log });
  const rl = readline.createInterface({ input, output });
  let threadId = getThreadId();

  console.log(chalk.yellow.bold('✈️  Travel Concierge CLI: ask about weather, sights, food and hotels'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.white(HELP));
  console.log(chalk.gray('─'.repeat(60)));

  try {
    while (true) {
      const line = await rl.question(chalk.blue.bold('You> '));
      if (!line.trim()) continue;
      const command = parseCommand(line, threadId);

      try {
        switch (command.kind) {
          case 'exit':
            return;
          case 'help':
            console.log(HELP);
            break;
          case 'invalid':
            console.log(chalk.red(command.message));
            break;
          case 'reset':
            await services.store.clear(threadId);
            threadId = getThreadId();
            console.log(chalk.gray('Session cleared.'));
            break;
          case 'upload': {
            const bytes = await readFile(command.path);
            const out = await services.ingest(path.basename(command.path), bytes, threadId);
            console.log(chalk.green(out.message));
            break;
          }
          case 'plan': {
            console.log(chalk.gray(`Planning ${command.request.durationDays} days in ${command.request.destination}...`));
            const out = await services.planner.planTrip(command.request);
            printBlock('Itinerary', formatItinerary(out.itinerary, out.map_link), chalk.greenBright, (s) => s);
            break;
          }
          case 'chat': {
            const out = await services.chat.processMessage({ message: command.message, session_id: threadId });
            threadId = out.session_id;
            printBlock('Assistant', renderMarkdownToTerminal(out.message), chalk.greenBright, (s) => s);
            if (out.tool_calls) console.log(chalk.gray(`tools: ${out.tool_calls.join(', ')}`));
            break;
          }
        }
      } catch (error) {
        const details = error instanceof Error ? error.message : String(error);
        console.log(chalk.red(error instanceof InputError ? details : `❌ Error processing request: ${details}`));
        if (!(error instanceof InputError)) log.debug({ err: error }, 'cli command failed');
      }
    }
  } finally {
    rl.close();
    services.close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'cli failed');
  process.exit(1);
});
