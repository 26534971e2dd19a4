/**
 * Creates the weekly list and its cards on the board.
 *
 * Calls are issued one at a time in configuration order. A failure aborts
 * the run where it happened; whatever was created before it stays on the
 * board.
 */
import type { CardTemplate } from './cards.js';
import type { TrelloClient } from './integrations/trello/lib/trello-api.js';
import { logger } from './logger.js';
import { dueDate, type RunContext } from './schedule.js';

export type BoardClient = Pick<
  TrelloClient,
  | 'listExists'
  | 'createList'
  | 'getBoardLabels'
  | 'createLabel'
  | 'createCard'
  | 'addLabelToCard'
  | 'createChecklist'
  | 'addChecklistItem'
>;

export type ProvisionStatus = 'created' | 'skipped' | 'previewed';

export interface ProvisionResult {
  status: ProvisionStatus;
  listTitle: string;
  listId?: string;
  cardsCreated: number;
  /** Dry-run only: one line for the list, then one per card. */
  preview: string[];
}

const WEEKDAY_SHORT = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDue(date: Date): string {
  const weekday = WEEKDAY_SHORT[(date.getDay() + 6) % 7];
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${weekday} ${day} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function cardDue(context: RunContext, card: CardTemplate): Date {
  return dueDate(context.weekStart, card.day_of_week, card.hour, card.minute);
}

export function previewList(context: RunContext): string {
  return `Would create list "${context.listTitle}" at position ${context.position}`;
}

export function previewCard(context: RunContext, card: CardTemplate): string {
  const details = [`due ${formatDue(cardDue(context, card))}`];
  if (card.labels.length > 0) {
    details.push(`labels: ${card.labels.join(', ')}`);
  }
  if (card.checklists.length > 0) {
    const lists = card.checklists.map(
      (c) => `${c.name} (${c.items.length} ${c.items.length === 1 ? 'item' : 'items'})`,
    );
    details.push(`checklists: ${lists.join(', ')}`);
  }
  return `Would create card "${card.title}" (${details.join('; ')})`;
}

export function previewWeeklyList(context: RunContext, cards: CardTemplate[]): ProvisionResult {
  const lines = [previewList(context), ...cards.map((card) => previewCard(context, card))];
  for (const line of lines) {
    logger.info(`[DRY-RUN] ${line}`);
  }
  logger.info({ cards: cards.length }, '[DRY-RUN] No changes made');
  return { status: 'previewed', listTitle: context.listTitle, cardsCreated: 0, preview: lines };
}

export class WeeklyListCreator {
  constructor(private readonly client: BoardClient) {}

  async run(context: RunContext, cards: CardTemplate[]): Promise<ProvisionResult> {
    logger.info(
      { list: context.listTitle, week: context.week, cards: cards.length, dryRun: context.dryRun },
      'Starting weekly list creation',
    );

    if (context.dryRun) {
      return previewWeeklyList(context, cards);
    }

    if (await this.client.listExists(context.listTitle)) {
      logger.warn({ list: context.listTitle }, 'List already exists, skipping creation');
      return { status: 'skipped', listTitle: context.listTitle, cardsCreated: 0, preview: [] };
    }

    const list = await this.client.createList(context.listTitle, context.position);
    logger.info({ listId: list.id, list: context.listTitle, position: context.position }, 'List created');

    const boardLabels = await this.client.getBoardLabels();

    let cardsCreated = 0;
    for (const card of cards) {
      await this.createCard(list.id, context, card, boardLabels);
      cardsCreated++;
    }

    logger.info({ list: context.listTitle, cardsCreated }, 'Weekly list created');
    return {
      status: 'created',
      listTitle: context.listTitle,
      listId: list.id,
      cardsCreated,
      preview: [],
    };
  }

  private async createCard(
    listId: string,
    context: RunContext,
    card: CardTemplate,
    boardLabels: Map<string, string>,
  ): Promise<void> {
    const created = await this.client.createCard({
      listId,
      name: card.title,
      due: cardDue(context, card),
      desc: card.description || undefined,
    });
    logger.info({ cardId: created.id, title: card.title }, 'Card created');

    for (const name of new Set(card.labels)) {
      let labelId = boardLabels.get(name);
      if (!labelId) {
        const label = await this.client.createLabel(name);
        labelId = label.id;
        boardLabels.set(name, labelId);
        logger.info({ labelId, label: name }, 'Label created on board');
      }
      await this.client.addLabelToCard(created.id, labelId);
    }

    for (const checklist of card.checklists) {
      const createdChecklist = await this.client.createChecklist(created.id, checklist.name);
      for (const item of checklist.items) {
        await this.client.addChecklistItem(createdChecklist.id, item);
      }
      logger.debug(
        { cardId: created.id, checklist: checklist.name, items: checklist.items.length },
        'Checklist added',
      );
    }
  }
}
