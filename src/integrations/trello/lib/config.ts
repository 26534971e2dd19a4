import { z } from 'zod';

import { TRELLO_BASE_URL } from '../../../config.js';
import { ErrorCodes, WeeklyListError } from '../../../errors.js';

export interface TrelloCredentials {
  apiKey: string;
  apiToken: string;
  boardId: string;
  baseUrl: string;
}

const ENV_NAMES = {
  apiKey: 'TRELLO_API_KEY',
  apiToken: 'TRELLO_API_TOKEN',
  boardId: 'TRELLO_BOARD_ID',
} as const;

const credentialsSchema = z.object({
  apiKey: z.string().trim().min(1),
  apiToken: z.string().trim().min(1),
  boardId: z.string().trim().min(1),
});

export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env,
  baseUrl: string = TRELLO_BASE_URL,
): TrelloCredentials {
  const result = credentialsSchema.safeParse({
    apiKey: env[ENV_NAMES.apiKey],
    apiToken: env[ENV_NAMES.apiToken],
    boardId: env[ENV_NAMES.boardId],
  });

  if (!result.success) {
    const missing = result.error.issues
      .map((issue) => issue.path[0])
      .filter((key): key is keyof typeof ENV_NAMES => typeof key === 'string' && key in ENV_NAMES)
      .map((key) => ENV_NAMES[key]);
    throw new WeeklyListError(
      ErrorCodes.CREDENTIAL_ERROR,
      `Missing required environment variables: ${missing.join(', ')}. Set them in .env`,
    );
  }

  return { ...result.data, baseUrl: baseUrl.replace(/\/+$/, '') };
}
