/**
 * Set on every post this service creates. Inbound events carrying it are
 * our own replies and must never be translated again.
 */
export const TRANSLATION_MARKER_PROP = 'from_autotranslate';

const SYSTEM_MESSAGE_PREFIX = 'system_';

export interface MessageEvent {
  id: string;
  channelId: string;
  userId: string;
  rootId?: string;
  message: string;
  type?: string;
  props?: Record<string, unknown>;
}

export interface ChatPost extends MessageEvent {
  updateAt: number;
}

export interface ChatUser {
  id: string;
  username: string;
  isBot: boolean;
}

export interface OutboundProps {
  [TRANSLATION_MARKER_PROP]: true;
  override_username: string;
  override_icon_url?: string;
  disable_group_highlight: true;
}

export interface OutboundMessage {
  channelId: string;
  userId: string;
  rootId: string;
  message: string;
  props: OutboundProps;
}

export interface UserDirectory {
  getUser(userId: string): Promise<ChatUser>;
}

export interface PostSource {
  getPost(postId: string): Promise<ChatPost>;
}

export interface MessagePoster {
  createPost(message: OutboundMessage): Promise<{ id: string }>;
}

export function isSystemMessage(event: MessageEvent): boolean {
  return event.type?.startsWith(SYSTEM_MESSAGE_PREFIX) ?? false;
}

export function hasTranslationMarker(event: MessageEvent): boolean {
  const marker = event.props?.[TRANSLATION_MARKER_PROP];
  // Some servers round-trip boolean props as strings.
  return marker === true || marker === 'true';
}

export class ChatPlatformError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChatPlatformError';
  }
}
