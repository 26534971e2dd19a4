/**
 * Command-line entry for the weekly list creator. Meant to be started by a
 * weekly cron entry, e.g.
 *
 *   0 6 * * 1  cd /opt/weekly-trello-lists && node dist/index.js
 */
import { parseArgs } from 'node:util';

import { loadCardTemplates } from './cards.js';
import { CARDS_YAML_PATH, DEFAULT_POSITION } from './config.js';
import { ErrorCodes, isUsageError, WeeklyListError } from './errors.js';
import { loadCredentials } from './integrations/trello/lib/config.js';
import { type FetchLike, TrelloClient } from './integrations/trello/lib/trello-api.js';
import { logger } from './logger.js';
import { previewWeeklyList, type ProvisionResult, WeeklyListCreator } from './provisioner.js';
import { resolveRunContext, type RunOptions } from './schedule.js';

export const USAGE = `Usage: weekly-trello-lists [options]

Create this week's Trello list with the cards from the cards configuration.

Options:
  --dry-run                 Preview what would be created without calling the API
  --position <top|bottom>   Position of the new list on the board (default: ${DEFAULT_POSITION})
  --week <N>                ISO week number to create, 1-53 (default: current week)
  -h, --help                Show this help
`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliArgs extends RunOptions {
  dryRun: boolean;
  position: string;
  help: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  now?: Date;
  fetchImpl?: FetchLike;
  cardsPath?: string;
  /** Where --help output goes. */
  write?: (text: string) => void;
}

function parseWeek(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new WeeklyListError(
      ErrorCodes.RANGE_ERROR,
      `Invalid week number: "${raw}". Must be an integer between 1 and 53`,
    );
  }
  return parseInt(raw, 10);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
      position: { type: 'string', default: DEFAULT_POSITION },
      week: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new WeeklyListError(ErrorCodes.USAGE_ERROR, reason, { cause: err });
  }

  const { values } = parsed;
  return {
    dryRun: values['dry-run'] ?? false,
    position: values.position ?? DEFAULT_POSITION,
    week: values.week === undefined ? undefined : parseWeek(values.week),
    help: values.help ?? false,
  };
}

export async function main(
  argv: string[] = process.argv.slice(2),
  deps: CliDeps = {},
): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      write(USAGE);
      return EXIT_OK;
    }

    const context = resolveRunContext(args, deps.now ?? new Date());

    logger.info({ week: context.week, list: context.listTitle }, 'Starting Trello weekly list creator');
    if (context.dryRun) {
      logger.info('Running in DRY-RUN mode - no changes will be made');
    }

    const cardsPath = deps.cardsPath ?? CARDS_YAML_PATH;
    const cards = loadCardTemplates(cardsPath);
    logger.info({ count: cards.length, path: cardsPath }, 'Loaded card templates');

    let result: ProvisionResult;
    if (context.dryRun) {
      // Preview needs no credentials and never touches the network
      result = previewWeeklyList(context, cards);
    } else {
      const credentials = loadCredentials(deps.env ?? process.env);
      const client = new TrelloClient(credentials, deps.fetchImpl);
      result = await new WeeklyListCreator(client).run(context, cards);
    }

    logger.info({ status: result.status, list: result.listTitle }, 'Weekly list creation completed');
    return EXIT_OK;
  } catch (err) {
    if (isUsageError(err)) {
      logger.error({ code: err.code }, err.message);
      write(USAGE);
      return EXIT_USAGE;
    }
    logger.error({ err }, 'Fatal error');
    return EXIT_FAILURE;
  }
}
