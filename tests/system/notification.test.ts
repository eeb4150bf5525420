import { DiscordPublisher, allowedMentionsFor } from '../../src/system/notification';
import {
  DISCORD_MESSAGE_LIMIT,
  LOADING_TEXT,
  buildDetailText,
  buildLoadingText,
  buildSummaryEmbed,
  chunkMessage,
  splitRanking
} from '../../src/system/notification/formatter';
import { RelayError, RelayErrorType } from '../../src/system/error-handling';
import { makeRankedItems, silentLogger } from '../helpers/fakes';
import { ScriptedReply, scriptedAxios } from '../helpers/http';

describe('formatter', () => {
  it('should split the ranking into the top six and the rest', () => {
    const { top, bottom } = splitRanking(makeRankedItems());

    expect(top.map(item => item.rank)).toEqual(['1', '2', '3', '4', '5', '6']);
    expect(bottom.map(item => item.rank)).toEqual(['7', '8', '9', '10', '11', '12']);
  });

  it('should build a summary embed with two ranking columns', () => {
    const embed = buildSummaryEmbed(makeRankedItems(), '20261019', 'https://source.test/ranking');

    expect(embed.title).toBe('📅 Zodiac ranking for 2026-10-19');
    expect(embed.description).toBe('[Source](<https://source.test/ranking>)');
    expect(embed.fields).toHaveLength(2);
    expect(embed.fields[0]).toEqual({
      name: '🥇 Top ranks',
      value: [
        '**1** — Aries',
        '**2** — Taurus',
        '**3** — Gemini',
        '**4** — Cancer',
        '**5** — Leo',
        '**6** — Virgo'
      ].join('\n'),
      inline: true
    });
    expect(embed.fields[1].name).toBe('⬇️ Lower ranks');
  });

  it('should put the announcement in front of the loading text', () => {
    expect(buildLoadingText(null)).toBe(LOADING_TEXT);
    expect(buildLoadingText('@everyone')).toBe(`@everyone ${LOADING_TEXT}`);
  });

  it('should mark an empty column', () => {
    const embed = buildSummaryEmbed(makeRankedItems(3), '20261019', 'https://source.test/ranking');

    expect(embed.fields[1].value).toBe('No data');
  });

  it('should quote each description under its heading', () => {
    expect(buildDetailText('Details', makeRankedItems(1))).toBe('**Details**\n\n**1 Aries**\n> Fortune 1\n');
  });

  describe('chunkMessage', () => {
    it('should break on line boundaries', () => {
      expect(chunkMessage('a\nb\nc', 3)).toEqual(['a\nb', 'c']);
    });

    it('should hard-split a line longer than the limit', () => {
      expect(chunkMessage('xxxxx', 2)).toEqual(['xx', 'xx', 'x']);
    });

    it('should keep long detail text within the message limit', () => {
      const items = makeRankedItems().map(item => ({ ...item, description: 'x'.repeat(500) }));

      const chunks = chunkMessage(buildDetailText('Details', items));

      expect(chunks.length).toBeGreaterThan(1);
      chunks.forEach(chunk => expect(chunk.length).toBeLessThanOrEqual(DISCORD_MESSAGE_LIMIT));
    });
  });
});

describe('allowedMentionsFor', () => {
  it('should allow nothing without an announcement', () => {
    expect(allowedMentionsFor(null)).toEqual({ parse: [] });
  });

  it('should allow exactly what the announcement mentions', () => {
    expect(allowedMentionsFor('@everyone')).toEqual({ parse: ['everyone'] });
    expect(allowedMentionsFor('<@&777>')).toEqual({ parse: [], roles: ['777'] });
  });
});

describe('DiscordPublisher', () => {
  function publisherFor(replies: ScriptedReply[]) {
    const scripted = scriptedAxios(replies, { status: 200, data: { id: 'detail' } });
    const publisher = new DiscordPublisher({
      botToken: 'test-token',
      apiBaseUrl: 'https://discord.test/api',
      sourceUrl: 'https://source.test/ranking',
      http: scripted.http,
      logger: silentLogger()
    });
    return { publisher, requests: scripted.requests };
  }

  it('should post the summary, open a thread and post the details there', async () => {
    const { publisher, requests } = publisherFor([
      { status: 200, data: { id: 'm1' } },
      { status: 201, data: { id: 't1' } }
    ]);

    await publisher.publish('555', makeRankedItems(), '@everyone', '20261019');

    expect(requests.map(request => request.url)).toEqual([
      '/channels/555/messages',
      '/channels/555/messages/m1/threads',
      '/channels/t1/messages',
      '/channels/t1/messages'
    ]);
    expect(requests[0].data).toMatchObject({
      content: '@everyone',
      allowed_mentions: { parse: ['everyone'] },
      embeds: [{ title: '📅 Zodiac ranking for 2026-10-19' }]
    });
    expect(requests[1].data).toEqual({ name: '2026-10-19 ranking details', auto_archive_duration: 60 });
    expect(requests[2].data).toMatchObject({ allowed_mentions: { parse: [] } });
  });

  it('should send no content when there is no announcement', async () => {
    const { publisher, requests } = publisherFor([
      { status: 200, data: { id: 'm1' } },
      { status: 201, data: { id: 't1' } }
    ]);

    await publisher.publish('555', makeRankedItems(), null, '20261019');

    expect(requests[0].data).not.toHaveProperty('content');
    expect(requests[0].data).toMatchObject({ allowed_mentions: { parse: [] } });
  });

  it('should post the details in the channel when the thread cannot be opened', async () => {
    const { publisher, requests } = publisherFor([
      { status: 200, data: { id: 'm1' } },
      { status: 403, data: { message: 'Missing Access' } }
    ]);

    await publisher.publish('555', makeRankedItems(), null, '20261019');

    expect(requests.slice(2).map(request => request.url)).toEqual(['/channels/555/messages', '/channels/555/messages']);
  });

  it('should report an unknown channel as unresolvable', async () => {
    const { publisher } = publisherFor([{ status: 404, data: { message: 'Unknown Channel' } }]);

    const error = await publisher.publish('555', makeRankedItems(), null, '20261019').catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(RelayError);
    if (error instanceof RelayError) {
      expect(error.type).toBe(RelayErrorType.DESTINATION_UNRESOLVABLE);
      expect(error.message).toBe('Channel 555 was not found');
    }
  });

  it('should report other rejections as publish failures', async () => {
    const { publisher } = publisherFor([{ status: 500, data: { message: 'oops' } }]);

    const error = await publisher.publish('555', makeRankedItems(), null, '20261019').catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(RelayError);
    if (error instanceof RelayError) {
      expect(error.type).toBe(RelayErrorType.PUBLISH_FAILED);
      expect(error.message).toBe('Discord rejected the message: Request failed with status code 500');
    }
  });

  it('should post a loading placeholder that carries the announcement', async () => {
    const { publisher, requests } = publisherFor([{ status: 200, data: { id: 'p1' } }]);

    await expect(publisher.postPlaceholder('555', '<@&777>')).resolves.toBe('p1');

    expect(requests).toEqual([
      {
        method: 'POST',
        url: '/channels/555/messages',
        params: undefined,
        data: {
          content: "<@&777> ✨ **[Daily Zodiac Ranking]** Fetching today's ranking...",
          allowed_mentions: { parse: [], roles: ['777'] }
        }
      }
    ]);
  });

  it('should edit the placeholder into the summary', async () => {
    const { publisher, requests } = publisherFor([
      { status: 200, data: { id: 'p1' } },
      { status: 201, data: { id: 't1' } }
    ]);

    await publisher.publish('555', makeRankedItems(), '@everyone', '20261019', 'p1');

    expect(requests.map(request => `${request.method} ${request.url}`)).toEqual([
      'PATCH /channels/555/messages/p1',
      'POST /channels/555/messages/p1/threads',
      'POST /channels/t1/messages',
      'POST /channels/t1/messages'
    ]);
    expect(requests[0].data).toMatchObject({
      content: '',
      allowed_mentions: { parse: [] },
      embeds: [{ title: '📅 Zodiac ranking for 2026-10-19' }]
    });
  });

  it('should edit the placeholder into a failure notice', async () => {
    const { publisher, requests } = publisherFor([]);

    await publisher.reportFailure('555', '❌ Settings could not be saved.', 'p1');

    expect(requests).toEqual([
      {
        method: 'PATCH',
        url: '/channels/555/messages/p1',
        params: undefined,
        data: { content: '❌ Settings could not be saved.', allowed_mentions: { parse: [] } }
      }
    ]);
  });

  it('should post failure notices without mentions', async () => {
    const { publisher, requests } = publisherFor([]);

    await publisher.reportFailure('555', '❌ Settings could not be saved.');

    expect(requests).toEqual([
      {
        method: 'POST',
        url: '/channels/555/messages',
        params: undefined,
        data: { content: '❌ Settings could not be saved.', allowed_mentions: { parse: [] } }
      }
    ]);
  });
});
