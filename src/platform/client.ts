import { z } from 'zod';
import type {
  ChatPost,
  ChatUser,
  MessagePoster,
  OutboundMessage,
  PostSource,
  UserDirectory,
} from './types.js';
import { ChatPlatformError } from './types.js';

export interface ChatPlatformConfig {
  /** Server root, e.g. "https://chat.example.com". */
  url: string;
  token: string;
}

export interface ChatPlatformClientOptions {
  fetch?: typeof fetch;
}

const UserResponseSchema = z.object({
  id: z.string(),
  username: z.string(),
  is_bot: z.boolean().optional(),
});

const PostResponseSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  user_id: z.string(),
  root_id: z.string().optional(),
  message: z.string(),
  type: z.string().optional(),
  props: z.record(z.unknown()).nullish(),
  update_at: z.number(),
});

const CreatedPostSchema = z.object({ id: z.string() });

/**
 * Minimal REST v4 client for the chat server: user lookup, post lookup and
 * post creation, authenticated with a bot token.
 */
export class ChatPlatformClient implements UserDirectory, PostSource, MessagePoster {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ChatPlatformConfig, options: ChatPlatformClientOptions = {}) {
    this.baseUrl = `${config.url.replace(/\/+$/, '')}/api/v4`;
    this.token = config.token;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getUser(userId: string): Promise<ChatUser> {
    const body = await this.request('GET', `/users/${encodeURIComponent(userId)}`);
    const user = this.decode(UserResponseSchema, body, 'user');
    return {
      id: user.id,
      username: user.username,
      isBot: user.is_bot ?? false,
    };
  }

  async getPost(postId: string): Promise<ChatPost> {
    const body = await this.request('GET', `/posts/${encodeURIComponent(postId)}`);
    const post = this.decode(PostResponseSchema, body, 'post');
    return {
      id: post.id,
      channelId: post.channel_id,
      userId: post.user_id,
      message: post.message,
      updateAt: post.update_at,
      ...(post.root_id ? { rootId: post.root_id } : {}),
      ...(post.type !== undefined && { type: post.type }),
      ...(post.props ? { props: post.props } : {}),
    };
  }

  async createPost(message: OutboundMessage): Promise<{ id: string }> {
    const body = await this.request('POST', '/posts', {
      channel_id: message.channelId,
      user_id: message.userId,
      root_id: message.rootId,
      message: message.message,
      props: message.props,
    });
    return this.decode(CreatedPostSchema, body, 'created post');
  }

  private async request(method: 'GET' | 'POST', path: string, payload?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          ...(payload !== undefined && { 'Content-Type': 'application/json' }),
        },
        ...(payload !== undefined && { body: JSON.stringify(payload) }),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ChatPlatformError(`${method} ${path} failed: ${message}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new ChatPlatformError(
        `${method} ${path} failed (status ${response.status}): ${text}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ChatPlatformError(`${method} ${path} returned invalid JSON`, response.status, {
        cause: error,
      });
    }
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ChatPlatformError(`unexpected ${what} response: ${result.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return result.data;
  }
}
