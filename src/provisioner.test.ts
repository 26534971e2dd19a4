import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  },
}));

import type { CardTemplate } from './cards.js';
import { TrelloClient } from './integrations/trello/lib/trello-api.js';
import { logger } from './logger.js';
import { formatDue, previewCard, previewWeeklyList, WeeklyListCreator } from './provisioner.js';
import { resolveRunContext } from './schedule.js';
import { createTrelloStub, TEST_CREDENTIALS } from './test-helpers.js';

const NOW = new Date(2026, 9, 19, 6, 0);

function card(overrides: Partial<CardTemplate> = {}): CardTemplate {
  return {
    title: 'Card',
    day_of_week: 'monday',
    hour: 9,
    minute: 0,
    labels: [],
    description: '',
    checklists: [],
    ...overrides,
  };
}

const standup = card({
  title: 'Standup',
  hour: 9,
  minute: 30,
  labels: ['Work', 'Daily'],
  description: 'Sync with the team',
  checklists: [{ name: 'Agenda', items: ['Yesterday', 'Today', 'Blockers'] }],
});

const review = card({ title: 'Review', day_of_week: 'friday', hour: 16 });

beforeEach(() => {
  vi.clearAllMocks();
});

describe('formatDue', () => {
  it('formats local weekday, date and time', () => {
    expect(formatDue(new Date(2026, 2, 6, 16, 5))).toBe('Fri 2026-03-06 16:05');
    expect(formatDue(new Date(2026, 2, 8, 0, 0))).toBe('Sun 2026-03-08 00:00');
  });
});

describe('previewCard', () => {
  it('mentions singular and plural checklist items', () => {
    const context = resolveRunContext({ week: 10, dryRun: true }, NOW);
    const line = previewCard(
      context,
      card({ checklists: [{ name: 'One', items: ['a'] }, { name: 'None', items: [] }] }),
    );
    expect(line).toBe('Would create card "Card" (due Mon 2026-03-02 09:00; checklists: One (1 item), None (0 items))');
  });
});

describe('previewWeeklyList', () => {
  it('emits one line for the list and one per card, in order', () => {
    const context = resolveRunContext({ week: 10, dryRun: true }, NOW);

    const result = previewWeeklyList(context, [standup, review]);

    expect(result.status).toBe('previewed');
    expect(result.cardsCreated).toBe(0);
    expect(result.preview).toEqual([
      'Would create list "Todo w10" at position top',
      'Would create card "Standup" (due Mon 2026-03-02 09:30; labels: Work, Daily; checklists: Agenda (3 items))',
      'Would create card "Review" (due Fri 2026-03-06 16:00)',
    ]);
    expect(logger.info).toHaveBeenCalledWith('[DRY-RUN] Would create list "Todo w10" at position top');
  });
});

describe('WeeklyListCreator', () => {
  it('makes no API call in dry-run mode', async () => {
    const stub = createTrelloStub();
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));
    const context = resolveRunContext({ week: 10, position: 'bottom', dryRun: true }, NOW);

    const result = await creator.run(context, [standup, review]);

    expect(stub.calls).toEqual([]);
    expect(result.preview).toHaveLength(3);
    expect(result.preview[0]).toBe('Would create list "Todo w10" at position bottom');
  });

  it('creates the list, card, labels and checklist items in order', async () => {
    const stub = createTrelloStub({
      labels: [
        { id: 'lb-work', name: 'Work' },
        { id: 'lb-daily', name: 'Daily' },
      ],
    });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));
    const context = resolveRunContext({ week: 10 }, NOW);

    const result = await creator.run(context, [standup]);

    expect(result).toEqual({
      status: 'created',
      listTitle: 'Todo w10',
      listId: 'list-1',
      cardsCreated: 1,
      preview: [],
    });
    expect(stub.routes().filter((r) => r.startsWith('POST'))).toEqual([
      'POST /lists',
      'POST /cards',
      'POST /cards/card-1/idLabels',
      'POST /cards/card-1/idLabels',
      'POST /checklists',
      'POST /checklists/checklist-1/checkItems',
      'POST /checklists/checklist-1/checkItems',
      'POST /checklists/checklist-1/checkItems',
    ]);
    expect(stub.lists).toEqual([{ id: 'list-1', name: 'Todo w10' }]);
    expect(stub.cards[0]).toMatchObject({
      name: 'Standup',
      idList: 'list-1',
      idLabels: ['lb-work', 'lb-daily'],
      desc: 'Sync with the team',
      due: new Date(2026, 2, 2, 9, 30).toISOString(),
    });
    expect(stub.checklists).toEqual([
      { id: 'checklist-1', name: 'Agenda', idCard: 'card-1', items: ['Yesterday', 'Today', 'Blockers'] },
    ]);
  });

  it('checks for an existing list, then reads labels once', async () => {
    const stub = createTrelloStub();
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));

    await creator.run(resolveRunContext({ week: 10, position: 'bottom' }, NOW), [review, review]);

    expect(stub.routes()).toEqual([
      'GET /boards/board-1/lists',
      'POST /lists',
      'GET /boards/board-1/labels',
      'POST /cards',
      'POST /cards',
    ]);
    expect(stub.calls[1].body).toEqual({ name: 'Todo w10', idBoard: 'board-1', pos: 'bottom' });
  });

  it('creates a missing label on the board once and reuses it', async () => {
    const stub = createTrelloStub({ labels: [{ id: 'lb-work', name: 'Work' }] });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));
    const second = card({ title: 'Second', labels: ['Daily'] });

    await creator.run(resolveRunContext({ week: 10 }, NOW), [standup, second]);

    expect(stub.routes().filter((r) => r === 'POST /labels')).toHaveLength(1);
    expect(stub.calls.find((c) => c.path === '/labels')?.body).toEqual({
      name: 'Daily',
      color: null,
      idBoard: 'board-1',
    });
    expect(stub.cards.map((c) => c.idLabels)).toEqual([['lb-work', 'label-1'], ['label-1']]);
  });

  it('attaches a repeated label to the card only once', async () => {
    const stub = createTrelloStub({ labels: [{ id: 'lb-work', name: 'Work' }] });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));

    await creator.run(resolveRunContext({ week: 10 }, NOW), [card({ labels: ['Work', 'Work'] })]);

    expect(stub.routes().filter((r) => r === 'POST /cards/card-1/idLabels')).toHaveLength(1);
    expect(stub.cards[0].idLabels).toEqual(['lb-work']);
  });

  it('skips the run when the list already exists', async () => {
    const stub = createTrelloStub({ lists: [{ id: 'old', name: 'Todo w10' }] });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));

    const result = await creator.run(resolveRunContext({ week: 10 }, NOW), [standup]);

    expect(result.status).toBe('skipped');
    expect(result.cardsCreated).toBe(0);
    expect(stub.routes()).toEqual(['GET /boards/board-1/lists']);
    expect(logger.warn).toHaveBeenCalledWith({ list: 'Todo w10' }, 'List already exists, skipping creation');
  });

  it('stops at an authentication failure on list creation without creating cards', async () => {
    const stub = createTrelloStub({ failures: [{ method: 'POST', path: '/lists', status: 401, body: 'unauthorized' }] });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));

    await expect(creator.run(resolveRunContext({ week: 10 }, NOW), [standup, review])).rejects.toMatchObject({
      code: 'AUTH_ERROR',
      status: 401,
    });
    expect(stub.cards).toEqual([]);
    expect(stub.routes()).toEqual(['GET /boards/board-1/lists', 'POST /lists']);
  });

  it('leaves already created cards in place when a later call fails', async () => {
    const stub = createTrelloStub({ failures: [{ method: 'POST', path: '/checklists', status: 500 }] });
    const creator = new WeeklyListCreator(new TrelloClient(TEST_CREDENTIALS, stub.fetch));

    await expect(creator.run(resolveRunContext({ week: 10 }, NOW), [review, standup, review])).rejects.toMatchObject({
      code: 'API_ERROR',
    });
    expect(stub.cards.map((c) => c.name)).toEqual(['Review', 'Standup']);
  });
});
