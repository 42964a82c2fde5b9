import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName =
  | 'chat_system'
  | 'chat_user'
  | 'planner_system'
  | 'planner_user'
  | 'knowledge_attractions'
  | 'knowledge_restaurants'
  | 'knowledge_hotels'
  | 'knowledge_weather'
  | 'knowledge_tips';

const PROMPT_NAMES: readonly PromptName[] = [
  'chat_system',
  'chat_user',
  'planner_system',
  'planner_user',
  'knowledge_attractions',
  'knowledge_restaurants',
  'knowledge_hotels',
  'knowledge_weather',
  'knowledge_tips',
];

let loaded: Promise<void> | undefined;
const PROMPTS: Partial<Record<PromptName, string>> = {};

function resolvePromptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  // dist/src/core -> src/prompts
  candidates.push(path.join(__dirname, '..', '..', '..', 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

async function loadAll(): Promise<void> {
  const base = resolvePromptsDir();
  await Promise.all(
    PROMPT_NAMES.map(async (name) => {
      PROMPTS[name] = await readFile(path.join(base, `${name}.md`), 'utf-8');
    }),
  );
}

export async function preloadPrompts(): Promise<void> {
  loaded ??= loadAll();
  return loaded;
}

export async function getPrompt(name: PromptName): Promise<string> {
  await preloadPrompts();
  return PROMPTS[name] ?? '';
}

/**
 * Fills `{key}` placeholders. Braces that do not name a provided key, such as
 * the JSON examples inside templates, are left alone.
 */
export function renderPrompt(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{([a-z_]+)\}/g, (whole: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? String(vars[key]) : whole,
  );
}
