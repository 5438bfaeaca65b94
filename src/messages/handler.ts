import type { BotIdentity } from '../config.js';
import type { PreferenceStore } from '../db/preferences.js';
import type { Logger } from '../logger.js';
import type {
  MessageEvent,
  MessagePoster,
  OutboundMessage,
  UserDirectory,
} from '../platform/types.js';
import {
  TRANSLATION_MARKER_PROP,
  hasTranslationMarker,
  isSystemMessage,
} from '../platform/types.js';
import type { Translator, UserPreference } from '../types.js';
import { AUTO_DETECT, TranslationError } from '../types.js';

export type SkipReason =
  | 'system-message'
  | 'own-translation'
  | 'bot-author'
  | 'not-opted-in'
  | 'same-text';

export type FailureStage =
  | 'resolve-user'
  | 'lookup-preference'
  | 'resolve-provider'
  | 'translate'
  | 'post';

export type MessageHandleResult =
  | { status: 'posted'; postId: string; reply: OutboundMessage }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; stage: FailureStage; error: string };

export interface MessageHandlerDeps {
  users: UserDirectory;
  preferences: PreferenceStore;
  poster: MessagePoster;
  /** Returns the process-wide translator, or throws ConfigurationError. */
  resolveTranslator: () => Translator;
  bot: BotIdentity;
  logger: Logger;
}

export const DETECTED_SOURCE_LABEL = 'detected';

export function formatTranslatedMessage(
  sourceLanguage: string,
  targetLanguage: string,
  translatedText: string
): string {
  const source = sourceLanguage === AUTO_DETECT ? DETECTED_SOURCE_LABEL : sourceLanguage;
  return `**[${source} → ${targetLanguage}]**\n${translatedText}`;
}

/**
 * Decides whether an incoming chat message gets translated and posts the
 * translation as a threaded reply.
 *
 * Never throws: every failure is logged once and the message is dropped.
 */
export class MessageHandler {
  private readonly deps: MessageHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: MessageHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'message-handler' });
  }

  async handleMessage(event: MessageEvent): Promise<MessageHandleResult> {
    const log = this.logger.child({ postId: event.id, userId: event.userId });

    if (isSystemMessage(event)) {
      return this.skip(log, 'system-message');
    }

    // Must run before anything that looks at the author: our replies are
    // posted under the original author's id.
    if (hasTranslationMarker(event)) {
      return this.skip(log, 'own-translation');
    }

    let isBot: boolean;
    try {
      isBot = (await this.deps.users.getUser(event.userId)).isBot;
    } catch (error) {
      return this.fail(log, 'resolve-user', error, 'Failed to get user');
    }
    if (isBot) {
      return this.skip(log, 'bot-author');
    }

    let preference: UserPreference | undefined;
    try {
      preference = await this.deps.preferences.get(event.userId);
    } catch (error) {
      return this.fail(log, 'lookup-preference', error, 'Failed to read user preference');
    }
    if (!preference || !preference.activated) {
      return this.skip(log, 'not-opted-in');
    }

    let translator: Translator;
    try {
      translator = this.deps.resolveTranslator();
    } catch (error) {
      return this.fail(log, 'resolve-provider', error, 'Failed to get translation provider');
    }

    let translatedText: string;
    try {
      const result = await translator.translate({
        text: event.message,
        sourceLanguage: preference.sourceLanguage,
        targetLanguage: preference.targetLanguage,
      });
      translatedText = result.translatedText;
    } catch (error) {
      return this.fail(log, 'translate', error, 'Failed to translate message', translator.kind);
    }

    if (translatedText.trim() === event.message.trim()) {
      return this.skip(log, 'same-text');
    }

    const reply = this.composeReply(event, preference, translatedText);
    try {
      const created = await this.deps.poster.createPost(reply);
      log.debug({ replyId: created.id, provider: translator.kind }, 'Posted translation');
      return { status: 'posted', postId: created.id, reply };
    } catch (error) {
      return this.fail(log, 'post', error, 'Failed to post translated message', translator.kind);
    }
  }

  private composeReply(
    event: MessageEvent,
    preference: UserPreference,
    translatedText: string
  ): OutboundMessage {
    const { bot } = this.deps;
    return {
      channelId: event.channelId,
      userId: event.userId,
      rootId: event.rootId || event.id,
      message: formatTranslatedMessage(
        preference.sourceLanguage,
        preference.targetLanguage,
        translatedText
      ),
      props: {
        [TRANSLATION_MARKER_PROP]: true,
        override_username: bot.username,
        ...(bot.iconUrl !== undefined && { override_icon_url: bot.iconUrl }),
        disable_group_highlight: true,
      },
    };
  }

  private skip(log: Logger, reason: SkipReason): MessageHandleResult {
    log.debug({ reason }, 'Skipping message');
    return { status: 'skipped', reason };
  }

  private fail(
    log: Logger,
    stage: FailureStage,
    error: unknown,
    message: string,
    provider?: string
  ): MessageHandleResult {
    const resolvedProvider =
      provider ?? (error instanceof TranslationError ? error.provider : undefined);
    log.error({ err: error, stage, provider: resolvedProvider }, message);
    return {
      status: 'failed',
      stage,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
