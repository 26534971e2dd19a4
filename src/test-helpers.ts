/**
 * In-process stand-in for the Trello REST API, used by the tests in place of
 * the network. Keeps a tiny board in memory and records every request.
 */
import { type RequestInit, Response } from 'node-fetch';

import type { TrelloCredentials } from './integrations/trello/lib/config.js';
import type { FetchLike } from './integrations/trello/lib/trello-api.js';

export const TEST_CREDENTIALS: TrelloCredentials = {
  apiKey: 'test-key',
  apiToken: 'test-token',
  boardId: 'board-1',
  baseUrl: 'https://api.trello.test/1',
};

export interface RecordedCall {
  method: string;
  /** Path below the API base, e.g. `/lists`. */
  path: string;
  body: Record<string, unknown>;
}

export interface StubFailure {
  method: string;
  path: string;
  status: number;
  body?: string;
}

interface Named {
  id: string;
  name: string;
}

export interface TrelloStub {
  fetch: FetchLike;
  calls: RecordedCall[];
  lists: Named[];
  labels: Named[];
  cards: (Named & { idList: string; idLabels: string[]; desc?: string; due?: string })[];
  checklists: (Named & { idCard: string; items: string[] })[];
  /** `METHOD /path` for every recorded call. */
  routes(): string[];
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function readBody(init?: RequestInit): Record<string, unknown> {
  if (typeof init?.body !== 'string' || init.body === '') return {};
  const parsed: unknown = JSON.parse(init.body);
  return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

export function createTrelloStub(
  options: {
    lists?: Named[];
    labels?: Named[];
    failures?: StubFailure[];
    credentials?: TrelloCredentials;
  } = {},
): TrelloStub {
  const credentials = options.credentials ?? TEST_CREDENTIALS;
  const basePath = new URL(credentials.baseUrl).pathname;
  const counters = new Map<string, number>();
  const nextId = (kind: string): string => {
    const n = (counters.get(kind) ?? 0) + 1;
    counters.set(kind, n);
    return `${kind}-${n}`;
  };

  const stub: TrelloStub = {
    calls: [],
    lists: [...(options.lists ?? [])],
    labels: [...(options.labels ?? [])],
    cards: [],
    checklists: [],
    routes: () => stub.calls.map((c) => `${c.method} ${c.path}`),
    fetch: async (url, init) => {
      const parsedUrl = new URL(url);
      const method = init?.method ?? 'GET';
      const path = parsedUrl.pathname.slice(basePath.length);
      const body = readBody(init);
      stub.calls.push({ method, path, body });

      if (
        parsedUrl.searchParams.get('key') !== credentials.apiKey ||
        parsedUrl.searchParams.get('token') !== credentials.apiToken
      ) {
        return new Response('invalid key', { status: 401 });
      }

      const failure = options.failures?.find((f) => f.method === method && f.path === path);
      if (failure) {
        return new Response(failure.body ?? '', { status: failure.status });
      }

      const boardPath = `/boards/${credentials.boardId}`;
      let match: RegExpExecArray | null;

      if (method === 'GET' && path === `${boardPath}/lists`) return json(stub.lists);
      if (method === 'GET' && path === `${boardPath}/labels`) return json(stub.labels);

      if (method === 'POST' && path === '/lists') {
        const list = { id: nextId('list'), name: str(body.name) };
        stub.lists.push(list);
        return json(list);
      }
      if (method === 'POST' && path === '/labels') {
        const label = { id: nextId('label'), name: str(body.name) };
        stub.labels.push(label);
        return json({ ...label, color: body.color ?? null });
      }
      if (method === 'POST' && path === '/cards') {
        const card = {
          id: nextId('card'),
          name: str(body.name),
          idList: str(body.idList),
          idLabels: [],
          desc: typeof body.desc === 'string' ? body.desc : undefined,
          due: typeof body.due === 'string' ? body.due : undefined,
        };
        stub.cards.push(card);
        return json({ id: card.id, name: card.name, idList: card.idList });
      }
      if (method === 'POST' && (match = /^\/cards\/([^/]+)\/idLabels$/.exec(path))) {
        const card = stub.cards.find((c) => c.id === match?.[1]);
        if (!card) return new Response('card not found', { status: 404 });
        card.idLabels.push(str(body.value));
        return json(card.idLabels);
      }
      if (method === 'POST' && path === '/checklists') {
        const checklist = { id: nextId('checklist'), name: str(body.name), idCard: str(body.idCard), items: [] };
        stub.checklists.push(checklist);
        return json({ id: checklist.id, name: checklist.name });
      }
      if (method === 'POST' && (match = /^\/checklists\/([^/]+)\/checkItems$/.exec(path))) {
        const checklist = stub.checklists.find((c) => c.id === match?.[1]);
        if (!checklist) return new Response('checklist not found', { status: 404 });
        checklist.items.push(str(body.name));
        return json({ id: nextId('item'), name: str(body.name) });
      }

      return new Response('not found', { status: 404 });
    },
  };

  return stub;
}
