import fetch, { type RequestInit, Response } from 'node-fetch';
import { z } from 'zod';

import { REQUEST_TIMEOUT } from '../../../config.js';
import { ErrorCodes, TrelloApiError } from '../../../errors.js';
import type { PositionValue } from '../../../schedule.js';
import type { TrelloCredentials } from './config.js';

const entitySchema = z.object({ id: z.string(), name: z.string() });
const listSchema = entitySchema;
const labelSchema = z.object({
  id: z.string(),
  name: z.string(),
  color: z.string().nullable().optional(),
});
const cardSchema = entitySchema.extend({
  idList: z.string().optional(),
  url: z.string().optional(),
});

export type TrelloList = z.infer<typeof listSchema>;
export type TrelloLabel = z.infer<typeof labelSchema>;
export type TrelloCard = z.infer<typeof cardSchema>;
export type TrelloChecklist = z.infer<typeof entitySchema>;
export type TrelloCheckItem = z.infer<typeof entitySchema>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface NewCard {
  listId: string;
  name: string;
  due?: Date;
  desc?: string;
}

type HttpMethod = 'GET' | 'POST';

function statusCode(status: number) {
  if (status === 401 || status === 403) return ErrorCodes.AUTH_ERROR;
  if (status === 404) return ErrorCodes.NOT_FOUND;
  return ErrorCodes.API_ERROR;
}

export class TrelloClient {
  private readonly credentials: TrelloCredentials;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    credentials: TrelloCredentials,
    fetchImpl: FetchLike = fetch,
    timeoutMs: number = REQUEST_TIMEOUT,
  ) {
    this.credentials = credentials;
    this.fetchImpl = fetchImpl;
    this.timeoutMs = timeoutMs;
  }

  get boardId(): string {
    return this.credentials.boardId;
  }

  private buildUrl(endpoint: string): string {
    const url = new URL(`${this.credentials.baseUrl}${endpoint}`);
    url.searchParams.set('key', this.credentials.apiKey);
    url.searchParams.set('token', this.credentials.apiToken);
    return url.toString();
  }

  private async request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    endpoint: string,
    method: HttpMethod = 'GET',
    body?: Record<string, unknown>,
  ): Promise<T> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    const options: RequestInit = {
      method,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      signal,
    };

    if (body && method !== 'GET') {
      options.body = JSON.stringify(body);
    }

    // The timeout covers reading the body as well as the request itself
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(this.buildUrl(endpoint), options);
      text = await response.text();
    } catch (err) {
      const reason = signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new TrelloApiError(
        ErrorCodes.NETWORK_ERROR,
        `Trello API request failed: ${method} ${endpoint}: ${reason}`,
        undefined,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new TrelloApiError(
        statusCode(response.status),
        `Trello API error: ${method} ${endpoint} returned ${response.status} ${text}`.trim(),
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new TrelloApiError(
        ErrorCodes.MALFORMED_RESPONSE,
        `Trello API returned invalid JSON for ${method} ${endpoint}`,
        response.status,
        { cause: err },
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TrelloApiError(
        ErrorCodes.MALFORMED_RESPONSE,
        `Unexpected Trello API response for ${method} ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        response.status,
      );
    }
    return parsed.data;
  }

  // ============================================================================
  // Board operations
  // ============================================================================

  async getBoardLists(): Promise<TrelloList[]> {
    return this.request(z.array(listSchema), `/boards/${this.boardId}/lists`);
  }

  async listExists(name: string): Promise<boolean> {
    const lists = await this.getBoardLists();
    return lists.some((list) => list.name === name);
  }

  async createList(name: string, pos: PositionValue = 'top'): Promise<TrelloList> {
    return this.request(listSchema, '/lists', 'POST', {
      name,
      idBoard: this.boardId,
      pos,
    });
  }

  /** Board labels keyed by name. Unnamed labels are left out. */
  async getBoardLabels(): Promise<Map<string, string>> {
    const labels = await this.request(z.array(labelSchema), `/boards/${this.boardId}/labels`);
    const byName = new Map<string, string>();
    for (const label of labels) {
      if (label.name && !byName.has(label.name)) byName.set(label.name, label.id);
    }
    return byName;
  }

  async createLabel(name: string, color: string | null = null): Promise<TrelloLabel> {
    return this.request(labelSchema, '/labels', 'POST', {
      name,
      color,
      idBoard: this.boardId,
    });
  }

  // ============================================================================
  // Card operations
  // ============================================================================

  async createCard(card: NewCard): Promise<TrelloCard> {
    const body: Record<string, unknown> = {
      idList: card.listId,
      name: card.name,
      pos: 'bottom',
    };
    if (card.due) body.due = card.due.toISOString();
    if (card.desc) body.desc = card.desc;

    return this.request(cardSchema, '/cards', 'POST', body);
  }

  async addLabelToCard(cardId: string, labelId: string): Promise<void> {
    await this.request(z.unknown(), `/cards/${cardId}/idLabels`, 'POST', { value: labelId });
  }

  async createChecklist(cardId: string, name: string): Promise<TrelloChecklist> {
    return this.request(entitySchema, '/checklists', 'POST', { idCard: cardId, name });
  }

  async addChecklistItem(checklistId: string, name: string): Promise<TrelloCheckItem> {
    return this.request(entitySchema, `/checklists/${checklistId}/checkItems`, 'POST', {
      name,
      pos: 'bottom',
    });
  }
}
