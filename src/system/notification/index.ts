/**
 * Notification Module
 *
 * Publishes the daily ranking to a Discord channel through the REST API:
 * a loading placeholder edited into the summary embed, then a thread on it
 * carrying the per-sign details.
 */

import axios, { AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { RankedItem } from '../types';
import { RelayError, RelayErrorType, errorMessage } from '../error-handling';
import { RelayLogger, createModuleLogger } from '../logger';
import { formatDayKey } from '../clock';
import { buildDetailText, buildLoadingText, buildSummaryEmbed, chunkMessage, splitRanking } from './formatter';

export interface Publisher {
  /** Resolves the id of the posted placeholder message */
  postPlaceholder(channelId: string, announcement: string | null): Promise<string>;
  publish(
    channelId: string,
    items: RankedItem[],
    announcement: string | null,
    day: string,
    placeholderId?: string | null
  ): Promise<void>;
  reportFailure(channelId: string, message: string, placeholderId?: string | null): Promise<void>;
}

export interface AllowedMentions {
  parse: Array<'everyone' | 'roles' | 'users'>;
  roles?: string[];
}

export type HttpClient = Pick<AxiosInstance, 'post' | 'patch'>;

export interface DiscordPublisherOptions {
  botToken: string;
  apiBaseUrl: string;
  sourceUrl: string;
  http?: HttpClient;
  logger?: RelayLogger;
}

interface CreatedMessage {
  id: string;
}

/**
 * Only mention what the announcement itself names
 */
export function allowedMentionsFor(announcement: string | null): AllowedMentions {
  if (!announcement) {
    return { parse: [] };
  }
  const roles = Array.from(announcement.matchAll(/<@&(\d+)>/g), match => match[1]);
  return {
    parse: announcement.includes('@everyone') ? ['everyone'] : [],
    ...(roles.length > 0 ? { roles } : {})
  };
}

function readMessageId(data: unknown): CreatedMessage {
  if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
    return { id: data.id };
  }
  throw new Error('Discord response has no message id');
}

export class DiscordPublisher implements Publisher {
  private readonly http: HttpClient;
  private readonly sourceUrl: string;
  private readonly logger: RelayLogger;

  constructor(options: DiscordPublisherOptions) {
    this.sourceUrl = options.sourceUrl;
    this.logger = options.logger ?? createModuleLogger('publisher');
    this.http =
      options.http ??
      axios.create({
        baseURL: options.apiBaseUrl,
        timeout: 15000,
        headers: {
          Authorization: `Bot ${options.botToken}`,
          'Content-Type': 'application/json'
        }
      });
  }

  async postPlaceholder(channelId: string, announcement: string | null): Promise<string> {
    const placeholder = await this.send(channelId, {
      content: buildLoadingText(announcement),
      allowed_mentions: allowedMentionsFor(announcement)
    });
    return placeholder.id;
  }

  /**
   * With a placeholder the summary replaces it; the announcement already went out with the placeholder
   */
  async publish(
    channelId: string,
    items: RankedItem[],
    announcement: string | null,
    day: string,
    placeholderId: string | null = null
  ): Promise<void> {
    const embed = buildSummaryEmbed(items, day, this.sourceUrl);
    const summary = placeholderId
      ? await this.edit(channelId, placeholderId, { content: '', embeds: [embed], allowed_mentions: { parse: [] } })
      : await this.send(channelId, {
          content: announcement ?? undefined,
          embeds: [embed],
          allowed_mentions: allowedMentionsFor(announcement)
        });

    const detailTarget = await this.openThread(channelId, summary.id, `${formatDayKey(day)} ranking details`);
    const { top, bottom } = splitRanking(items);
    const sections = [
      buildDetailText('🥇 Top ranks in detail', top),
      ...(bottom.length > 0 ? [buildDetailText('⬇️ Lower ranks in detail', bottom)] : [])
    ];

    for (const section of sections) {
      for (const chunk of chunkMessage(section)) {
        await this.send(detailTarget, { content: chunk, allowed_mentions: { parse: [] } });
      }
    }

    this.logger.info('Ranking published', { channelId, items: items.length });
  }

  async reportFailure(channelId: string, message: string, placeholderId: string | null = null): Promise<void> {
    const body = { content: message, allowed_mentions: { parse: [] } };
    if (placeholderId) {
      await this.edit(channelId, placeholderId, body);
      return;
    }
    await this.send(channelId, body);
  }

  /**
   * Thread on the summary message; falls back to the channel itself
   */
  private async openThread(channelId: string, messageId: string, name: string): Promise<string> {
    try {
      const response = await this.http.post<unknown>(`/channels/${channelId}/messages/${messageId}/threads`, {
        name,
        auto_archive_duration: 60
      });
      return readMessageId(response.data).id;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      this.logger.warn(`Could not open a details thread, posting in the channel: ${errorMessage(error)}`, {
        channelId,
        status
      });
      return channelId;
    }
  }

  private send(channelId: string, body: Record<string, unknown>): Promise<CreatedMessage> {
    return this.deliver(channelId, () => this.http.post<unknown>(`/channels/${channelId}/messages`, body));
  }

  private edit(channelId: string, messageId: string, body: Record<string, unknown>): Promise<CreatedMessage> {
    return this.deliver(channelId, () => this.http.patch<unknown>(`/channels/${channelId}/messages/${messageId}`, body));
  }

  private async deliver(channelId: string, request: () => Promise<AxiosResponse<unknown>>): Promise<CreatedMessage> {
    try {
      const response = await request();
      return readMessageId(response.data);
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      if (status === 404) {
        throw new RelayError(`Channel ${channelId} was not found`, RelayErrorType.DESTINATION_UNRESOLVABLE, {
          details: { channelId },
          cause: error
        });
      }
      throw new RelayError(`Discord rejected the message: ${errorMessage(error)}`, RelayErrorType.PUBLISH_FAILED, {
        details: { channelId, status },
        cause: error
      });
    }
  }
}
