import fs from 'fs';

import yaml from 'js-yaml';
import { z } from 'zod';

import { ErrorCodes, WeeklyListError } from './errors.js';
import { DAYS_OF_WEEK } from './schedule.js';

const checklistSchema = z.object({
  name: z.string().trim().min(1, 'checklist name must not be empty'),
  items: z.array(z.string()).default([]),
});

const cardSchema = z.object({
  title: z.string().trim().min(1, 'title must not be empty'),
  day_of_week: z
    .string()
    .transform((day) => day.toLowerCase())
    .pipe(z.enum(DAYS_OF_WEEK)),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59).default(0),
  labels: z
    .array(z.string().trim().min(1))
    .default([])
    .transform((labels) => [...new Set(labels)]),
  // `description:` with no value loads as null
  description: z
    .string()
    .nullish()
    .transform((text) => text ?? ''),
  checklists: z.array(checklistSchema).default([]),
});

const cardsFileSchema = z.object({
  cards: z.array(cardSchema).default([]),
});

export type ChecklistTemplate = z.infer<typeof checklistSchema>;
export type CardTemplate = z.infer<typeof cardSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-parsed document. An empty document yields no cards.
 */
export function parseCardTemplates(doc: unknown, source = 'cards configuration'): CardTemplate[] {
  const result = cardsFileSchema.safeParse(doc ?? {});
  if (!result.success) {
    throw new WeeklyListError(
      ErrorCodes.CONFIG_ERROR,
      `Invalid ${source}: ${formatIssues(result.error)}`,
    );
  }
  return result.data.cards;
}

export function loadCardTemplates(yamlPath: string): CardTemplate[] {
  if (!fs.existsSync(yamlPath)) {
    throw new WeeklyListError(
      ErrorCodes.CONFIG_ERROR,
      `Cards configuration not found: ${yamlPath}`,
    );
  }

  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(yamlPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new WeeklyListError(
      ErrorCodes.CONFIG_ERROR,
      `Cannot parse ${yamlPath}: ${reason}`,
      { cause: err },
    );
  }

  return parseCardTemplates(doc, yamlPath);
}
