import { HoroscopeSourceFetcher, parseHoroscopeFeed } from '../../src/pipeline/source-fetcher';
import { RelayError, RelayErrorType } from '../../src/system/error-handling';
import { silentLogger } from '../helpers/fakes';
import { scriptedAxios } from '../helpers/http';

function feedDetail(rank: number, code: string, text: string): Record<string, unknown> {
  return { ranking_no: String(rank), horoscope_st: code, horoscope_text: text };
}

function feedDocument(details: unknown[]): unknown {
  return [{ onair_date: '20261019', detail: details }];
}

const sourceConfig = {
  url: 'https://feed.test/horoscope.json',
  refererUrl: 'https://feed.test/horoscope/',
  timeoutMs: 1000
};

describe('parseHoroscopeFeed', () => {
  it('should map feed details to ranking entries', () => {
    const items = parseHoroscopeFeed(
      feedDocument([feedDetail(1, '05', '\tいい日\tです '), feedDetail(2, '12', '普通の日')])
    );

    expect(items).toEqual([
      { rank: '1位', signCode: '05', sign: '獅子座', description: 'いい日 です' },
      { rank: '2位', signCode: '12', sign: '魚座', description: '普通の日' }
    ]);
  });

  it('should label an unknown sign code', () => {
    const items = parseHoroscopeFeed(feedDocument([feedDetail(1, '13', 'テキスト')]));

    expect(items[0].sign).toBe('不明な星座(13)');
  });

  it('should skip details with missing fields', () => {
    const items = parseHoroscopeFeed(
      feedDocument([{ ranking_no: '1', horoscope_st: '01' }, 'garbage', feedDetail(3, '03', 'テキスト')]),
      silentLogger()
    );

    expect(items).toHaveLength(1);
    expect(items[0].rank).toBe('3位');
  });

  it('should reject a document that is not a non-empty array', () => {
    expect(() => parseHoroscopeFeed({})).toThrow('Feed is not a non-empty array');
    expect(() => parseHoroscopeFeed([])).toThrow('Feed is not a non-empty array');
  });

  it('should reject a document without a detail list', () => {
    expect(() => parseHoroscopeFeed([{ onair_date: '20261019' }])).toThrow('Feed has no detail list');
  });
});

describe('HoroscopeSourceFetcher', () => {
  it('should fetch and parse the feed', async () => {
    const { http, requests } = scriptedAxios([
      { status: 200, data: feedDocument([feedDetail(1, '01', 'テキスト')]) }
    ]);
    const fetcher = new HoroscopeSourceFetcher(sourceConfig, http, silentLogger());

    const items = await fetcher.fetchToday();

    expect(items).toEqual([{ rank: '1位', signCode: '01', sign: '牡羊座', description: 'テキスト' }]);
    expect(requests[0].url).toBe('https://feed.test/horoscope.json');
  });

  it('should report an HTTP failure as an unavailable source', async () => {
    const { http } = scriptedAxios([{ status: 503, data: { message: 'maintenance' } }]);
    const fetcher = new HoroscopeSourceFetcher(sourceConfig, http, silentLogger());

    const error = await fetcher.fetchToday().catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(RelayError);
    if (error instanceof RelayError) {
      expect(error.type).toBe(RelayErrorType.SOURCE_UNAVAILABLE);
      expect(error.message).toBe('Ranking feed request failed: Request failed with status code 503');
    }
  });
});
