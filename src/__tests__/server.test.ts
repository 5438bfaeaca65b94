import type { Server } from 'node:http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { PreferenceStore } from '../db/preferences.js';
import { createLogger } from '../logger.js';
import { MessageHandler } from '../messages/handler.js';
import type { ChatPost, OutboundMessage, PostSource } from '../platform/types.js';
import type { TranslationRequest, TranslationResult, Translator, UserPreference } from '../types.js';
import { BackendError, ConfigurationError } from '../types.js';
import { createServer, USER_ID_HEADER } from '../web/server.js';

class StubTranslator implements Translator {
  readonly kind = 'completion-llm';
  failWith: Error | undefined;

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    if (this.failWith) {
      throw this.failWith;
    }
    return { translatedText: `[${request.targetLanguage}] ${request.text}`, provider: this.kind };
  }
}

class MapPreferences implements PreferenceStore {
  readonly records = new Map<string, UserPreference>();

  async get(userId: string): Promise<UserPreference | undefined> {
    return this.records.get(userId);
  }

  async set(preference: UserPreference): Promise<UserPreference> {
    this.records.set(preference.userId, preference);
    return preference;
  }
}

const API_TOKEN = 'test-api-token';
const AUTH_HEADERS = { Authorization: `Bearer ${API_TOKEN}` };
const POST_ID = 'p'.repeat(26);
const MARKED_POST_ID = 'm'.repeat(26);

const storedPost: ChatPost = {
  id: POST_ID,
  channelId: 'channel-1',
  userId: 'user-1',
  message: '안녕하세요',
  updateAt: 1700000000000,
};

const markedPost: ChatPost = {
  id: MARKED_POST_ID,
  channelId: 'channel-1',
  userId: 'user-1',
  rootId: POST_ID,
  message: '**[ko → en]**\nHello',
  props: { from_autotranslate: true },
  updateAt: 1700000000001,
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let preferences: MapPreferences;
  let translator: StubTranslator;
  let providerError: Error | undefined;
  let posted: OutboundMessage[];

  beforeEach(async () => {
    preferences = new MapPreferences();
    translator = new StubTranslator();
    providerError = undefined;
    posted = [];

    const resolveTranslator = (): Translator => {
      if (providerError) {
        throw providerError;
      }
      return translator;
    };
    const posts: PostSource = {
      getPost: async (postId: string) => {
        const post = [storedPost, markedPost].find((candidate) => candidate.id === postId);
        if (!post) {
          throw new Error(`post ${postId} not found`);
        }
        return post;
      },
    };
    const logger = createLogger({ level: 'silent' });
    const handler = new MessageHandler({
      users: { getUser: async (userId: string) => ({ id: userId, username: 'alice', isBot: false }) },
      preferences,
      poster: {
        createPost: async (message: OutboundMessage) => {
          posted.push(message);
          return { id: 'reply-1' };
        },
      },
      resolveTranslator,
      bot: { username: 'autotranslate-bot' },
      logger,
    });

    const app = createServer({
      apiToken: API_TOKEN,
      preferences,
      posts,
      handler,
      resolveTranslator,
      logger,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function putPreference(userId: string | undefined, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/preferences`, {
      method: 'PUT',
      headers: {
        ...AUTH_HEADERS,
        'Content-Type': 'application/json',
        ...(userId !== undefined && { [USER_ID_HEADER]: userId }),
      },
      body: JSON.stringify(body),
    });
  }

  function translate(query: string, userId = 'user-1'): Promise<Response> {
    return fetch(`${baseUrl}/api/translate?${query}`, {
      headers: { ...AUTH_HEADERS, [USER_ID_HEADER]: userId },
    });
  }

  describe('GET /healthz', () => {
    it('should report the active provider', async () => {
      const response = await fetch(`${baseUrl}/healthz`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', provider: 'completion-llm' });
    });

    it('should report an unusable provider configuration', async () => {
      providerError = new ConfigurationError('LLM_API_URL is required', 'LLM_API_URL');

      const response = await fetch(`${baseUrl}/healthz`);

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({
        status: 'unavailable',
        error: 'LLM_API_URL is required',
      });
    });
  });

  describe('preferences', () => {
    const preference = { userId: 'user-1', activated: true, sourceLanguage: 'auto', targetLanguage: 'en' };

    it('should return no content for an anonymous caller', async () => {
      const response = await fetch(`${baseUrl}/api/preferences`, { headers: AUTH_HEADERS });

      expect(response.status).toBe(204);
    });

    it('should return no content when nothing is stored', async () => {
      const response = await fetch(`${baseUrl}/api/preferences`, {
        headers: { ...AUTH_HEADERS, [USER_ID_HEADER]: 'user-1' },
      });

      expect(response.status).toBe(204);
    });

    it('should store and return the caller preference', async () => {
      const put = await putPreference('user-1', preference);
      expect(put.status).toBe(200);
      expect(await put.json()).toEqual(preference);

      const get = await fetch(`${baseUrl}/api/preferences`, {
        headers: { ...AUTH_HEADERS, [USER_ID_HEADER]: 'user-1' },
      });
      expect(await get.json()).toEqual(preference);
    });

    it('should refuse an anonymous write', async () => {
      const response = await putPreference(undefined, preference);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        id: 'unauthorized',
        message: 'Not authorized to set info',
        status_code: 401,
      });
    });

    it('should refuse to write another user preference', async () => {
      const response = await putPreference('user-2', preference);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        id: 'user_mismatch',
        message: 'Invalid parameter: user mismatch',
        status_code: 400,
      });
      expect(preferences.records.size).toBe(0);
    });

    it('should answer a malformed JSON body with a JSON error', async () => {
      const response = await fetch(`${baseUrl}/api/preferences`, {
        method: 'PUT',
        headers: { ...AUTH_HEADERS, 'Content-Type': 'application/json', [USER_ID_HEADER]: 'user-1' },
        body: '{"userId":',
      });

      expect(response.status).toBe(400);
      expect(response.headers.get('content-type')).toMatch(/^application\/json/);
      expect(await response.json()).toEqual({
        id: 'invalid_body',
        message: 'Invalid request body',
        status_code: 400,
      });
    });

    it('should reject auto as the target language', async () => {
      const response = await putPreference('user-1', { ...preference, targetLanguage: 'auto' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        id: 'invalid_info',
        message: 'Invalid info: targetLanguage: target language cannot be auto',
        status_code: 400,
      });
    });
  });

  describe('GET /api/translate', () => {
    it('should translate a stored post', async () => {
      const response = await translate(`post_id=${POST_ID}&source=ko&target=en`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        id: `${POST_ID}koen1700000000000`,
        postId: POST_ID,
        sourceLanguage: 'ko',
        sourceText: '안녕하세요',
        targetLanguage: 'en',
        translatedText: '[en] 안녕하세요',
        updateAt: 1700000000000,
      });
    });

    it('should require a caller', async () => {
      const response = await fetch(`${baseUrl}/api/translate?post_id=${POST_ID}&source=ko&target=en`, {
        headers: AUTH_HEADERS,
      });

      expect(response.status).toBe(401);
    });

    it.each([
      ['post_id=short&source=ko&target=en', 'invalid_post_id'],
      [`post_id=${POST_ID}&source=k&target=en`, 'invalid_source'],
      [`post_id=${POST_ID}&source=ko&target=english`, 'invalid_target'],
      [`post_id=${POST_ID}&source=ko`, 'invalid_target'],
    ])('should validate %s', async (query, id) => {
      const response = await translate(query);

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ id, status_code: 400 });
    });

    it('should report a post it cannot load', async () => {
      const response = await translate(`post_id=${'q'.repeat(26)}&source=ko&target=en`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        id: 'post_not_found',
        message: 'No post to translate',
        status_code: 400,
      });
    });

    it('should report a translation failure', async () => {
      translator.failWith = new BackendError('completion-llm API error (status 503): busy', 'completion-llm', 503);

      const response = await translate(`post_id=${POST_ID}&source=ko&target=en`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        id: 'translation_failed',
        message: 'Translation failed: completion-llm API error (status 503): busy',
        status_code: 400,
      });
    });

    it('should report an unusable provider', async () => {
      providerError = new ConfigurationError('LLM_MODEL is required', 'LLM_MODEL');

      const response = await translate(`post_id=${POST_ID}&source=ko&target=en`);

      expect(response.status).toBe(500);
      expect(await response.json()).toMatchObject({ id: 'provider_unavailable' });
    });
  });

  describe('POST /api/events/message', () => {
    function postEvent(body: unknown, headers: Record<string, string> = AUTH_HEADERS): Promise<Response> {
      return fetch(`${baseUrl}/api/events/message`, {
        method: 'POST',
        headers: { ...headers, 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    }

    beforeEach(() => {
      preferences.records.set('user-1', {
        userId: 'user-1',
        activated: true,
        sourceLanguage: 'ko',
        targetLanguage: 'en',
      });
    });

    it('should translate the post the chat server names', async () => {
      const response = await postEvent({ postId: POST_ID });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'posted', postId: 'reply-1' });
      expect(posted).toEqual([
        {
          channelId: 'channel-1',
          userId: 'user-1',
          rootId: POST_ID,
          message: '**[ko → en]**\n[en] 안녕하세요',
          props: {
            from_autotranslate: true,
            override_username: 'autotranslate-bot',
            disable_group_highlight: true,
          },
        },
      ]);
    });

    it('should reject an event without the API token', async () => {
      const response = await postEvent(
        { id: 'forged', channelId: 'any-channel', userId: 'user-1', message: 'injected text' },
        {}
      );

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        id: 'invalid_token',
        message: 'Invalid or missing API token',
        status_code: 401,
      });
      expect(posted).toEqual([]);
    });

    it('should reject a wrong API token', async () => {
      const response = await postEvent({ postId: POST_ID }, { Authorization: 'Bearer wrong-token' });

      expect(response.status).toBe(401);
      expect(posted).toEqual([]);
    });

    it('should ignore message content supplied in the request', async () => {
      const response = await postEvent({
        id: 'forged',
        channelId: 'any-channel',
        userId: 'user-1',
        message: 'injected text',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ id: 'invalid_event' });
      expect(posted).toEqual([]);
    });

    it('should take the loop marker from the stored post', async () => {
      const response = await postEvent({ postId: MARKED_POST_ID });

      expect(await response.json()).toEqual({ status: 'skipped', reason: 'own-translation' });
      expect(posted).toEqual([]);
    });

    it('should report a post the chat server does not have', async () => {
      const response = await postEvent({ postId: 'missing-post' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        id: 'post_not_found',
        message: 'No post to handle',
        status_code: 400,
      });
    });
  });

  it('should require the API token on every /api route', async () => {
    const response = await fetch(`${baseUrl}/api/preferences`, {
      headers: { [USER_ID_HEADER]: 'user-1' },
    });

    expect(response.status).toBe(401);
  });

  it('should leave the health check open', async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
  });

  it('should answer unknown routes with a JSON 404', async () => {
    const response = await fetch(`${baseUrl}/api/unknown`, { headers: AUTH_HEADERS });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ id: 'not_found', message: 'Not found', status_code: 404 });
  });
});
