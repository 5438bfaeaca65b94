import { timingSafeEqual } from 'crypto';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { validatePreference, type PreferenceStore } from '../db/preferences.js';
import type { Logger } from '../logger.js';
import type { MessageHandler } from '../messages/handler.js';
import type { ChatPost, PostSource } from '../platform/types.js';
import type { Translator, UserPreference } from '../types.js';
import { PreferenceValidationError } from '../types.js';

export const USER_ID_HEADER = 'X-User-Id';

const POST_ID_LENGTH = 26;

export interface ApiErrorResponse {
  id: string;
  message: string;
  status_code: number;
}

export interface TranslatedMessage {
  id: string;
  postId: string;
  sourceLanguage: string;
  sourceText: string;
  targetLanguage: string;
  translatedText: string;
  updateAt: number;
}

const EventNotificationSchema = z.object({
  postId: z.string().min(1),
});

export interface ServerDeps {
  /** Bearer token every `/api` caller must present. */
  apiToken: string;
  preferences: PreferenceStore;
  posts: PostSource;
  handler: MessageHandler;
  resolveTranslator: () => Translator;
  logger: Logger;
}

function writeApiError(res: Response, statusCode: number, id: string, message: string): void {
  const body: ApiErrorResponse = { id, message, status_code: statusCode };
  res.status(statusCode).json(body);
}

function hasBearerToken(req: Request, expected: string): boolean {
  const header = req.header('Authorization');
  if (!header?.startsWith('Bearer ')) {
    return false;
  }
  const presented = Buffer.from(header.slice('Bearer '.length));
  const wanted = Buffer.from(expected);
  return presented.length === wanted.length && timingSafeEqual(presented, wanted);
}

function isBodyParseError(error: unknown): boolean {
  if (error instanceof SyntaxError) {
    return true;
  }
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

function isLanguageParam(value: unknown): value is string {
  return typeof value === 'string' && value.length >= 2 && value.length <= 5;
}

export function createServer(deps: ServerDeps): Express {
  const app = express();
  const log = deps.logger.child({ component: 'http' });

  // X-User-Id is trusted only behind this check.
  app.use('/api', (req: Request, res: Response, next: NextFunction) => {
    if (!hasBearerToken(req, deps.apiToken)) {
      return writeApiError(res, 401, 'invalid_token', 'Invalid or missing API token');
    }
    next();
  });

  app.use(express.json());

  app.get('/healthz', (_req: Request, res: Response) => {
    try {
      res.json({ status: 'ok', provider: deps.resolveTranslator().kind });
    } catch (error) {
      res.status(503).json({
        status: 'unavailable',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  // The chat server only names the new post; its content, author and props
  // are read back from the server.
  app.post('/api/events/message', async (req: Request, res: Response) => {
    const parsed = EventNotificationSchema.safeParse(req.body);
    if (!parsed.success) {
      return writeApiError(res, 400, 'invalid_event', 'Invalid parameter: postId');
    }

    let post: ChatPost;
    try {
      post = await deps.posts.getPost(parsed.data.postId);
    } catch (error) {
      log.warn({ err: error, postId: parsed.data.postId }, 'Failed to load post for event');
      return writeApiError(res, 400, 'post_not_found', 'No post to handle');
    }

    res.json(await deps.handler.handleMessage(post));
  });

  app.get('/api/preferences', async (req: Request, res: Response) => {
    const userId = req.header(USER_ID_HEADER);
    if (!userId) {
      // anonymous callers just get nothing back
      return res.status(204).end();
    }

    try {
      const preference = await deps.preferences.get(userId);
      if (!preference) {
        return res.status(204).end();
      }
      res.json(preference);
    } catch (error) {
      log.error({ err: error, userId }, 'Failed to read preference');
      writeApiError(res, 500, 'preference_read_failed', 'Failed to get info');
    }
  });

  app.put('/api/preferences', async (req: Request, res: Response) => {
    const userId = req.header(USER_ID_HEADER);
    if (!userId) {
      return writeApiError(res, 401, 'unauthorized', 'Not authorized to set info');
    }

    let preference: UserPreference;
    try {
      preference = validatePreference(req.body);
    } catch (error) {
      const message = error instanceof PreferenceValidationError ? error.message : 'invalid body';
      return writeApiError(res, 400, 'invalid_info', `Invalid info: ${message}`);
    }

    if (preference.userId !== userId) {
      return writeApiError(res, 400, 'user_mismatch', 'Invalid parameter: user mismatch');
    }

    try {
      res.json(await deps.preferences.set(preference));
    } catch (error) {
      log.error({ err: error, userId }, 'Failed to store preference');
      writeApiError(res, 400, 'preference_write_failed', 'Failed to set info');
    }
  });

  // On-demand translation of a single post, independent of preferences.
  app.get('/api/translate', async (req: Request, res: Response) => {
    const userId = req.header(USER_ID_HEADER);
    if (!userId) {
      return writeApiError(res, 401, 'unauthorized', 'Not authorized to translate post');
    }

    const { post_id: postId, source, target } = req.query;
    if (typeof postId !== 'string' || postId.length !== POST_ID_LENGTH) {
      return writeApiError(res, 400, 'invalid_post_id', 'Invalid parameter: post_id');
    }
    if (!isLanguageParam(source)) {
      return writeApiError(res, 400, 'invalid_source', 'Invalid parameter: source');
    }
    if (!isLanguageParam(target)) {
      return writeApiError(res, 400, 'invalid_target', 'Invalid parameter: target');
    }

    let post: ChatPost;
    try {
      post = await deps.posts.getPost(postId);
    } catch (error) {
      log.warn({ err: error, postId }, 'Failed to load post for translation');
      return writeApiError(res, 400, 'post_not_found', 'No post to translate');
    }

    let translator: Translator;
    try {
      translator = deps.resolveTranslator();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error }, 'Failed to get translation provider');
      return writeApiError(
        res,
        500,
        'provider_unavailable',
        `Failed to initialize translation provider: ${message}`
      );
    }

    try {
      const result = await translator.translate({
        text: post.message,
        sourceLanguage: source,
        targetLanguage: target,
      });
      const translated: TranslatedMessage = {
        id: `${postId}${source}${target}${post.updateAt}`,
        postId,
        sourceLanguage: source,
        sourceText: post.message,
        targetLanguage: target,
        translatedText: result.translatedText,
        updateAt: post.updateAt,
      };
      res.json(translated);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error, postId, provider: translator.kind }, 'Failed to translate post');
      writeApiError(res, 400, 'translation_failed', `Translation failed: ${message}`);
    }
  });

  app.use((_req: Request, res: Response) => {
    writeApiError(res, 404, 'not_found', 'Not found');
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (isBodyParseError(error)) {
      return writeApiError(res, 400, 'invalid_body', 'Invalid request body');
    }
    log.error({ err: error, method: req.method, path: req.path }, 'Unhandled request error');
    writeApiError(res, 500, 'internal_error', 'Internal server error');
  });

  return app;
}
