/**
 * Daily ranking source
 */

import axios, { AxiosInstance } from 'axios';
import { EXPECTED_ITEM_COUNT, RawItem } from '../system/types';
import { RelayError, errorMessage } from '../system/error-handling';
import { SourceConfig } from '../system/config';
import { RelayLogger, createModuleLogger } from '../system/logger';

export interface SourceFetcher {
  fetchToday(): Promise<RawItem[]>;
}

export type HttpGetter = Pick<AxiosInstance, 'get'>;

const SIGN_NAMES: Record<string, string> = {
  '01': '牡羊座',
  '02': '牡牛座',
  '03': '双子座',
  '04': '蟹座',
  '05': '獅子座',
  '06': '乙女座',
  '07': '天秤座',
  '08': '蠍座',
  '09': '射手座',
  '10': '山羊座',
  '11': '水瓶座',
  '12': '魚座'
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | null {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * Turn the feed document into ranking entries. Entries missing a field are skipped.
 */
export function parseHoroscopeFeed(document: unknown, logger?: RelayLogger): RawItem[] {
  if (!Array.isArray(document) || document.length === 0) {
    throw RelayError.sourceUnavailable('Feed is not a non-empty array');
  }

  const root: unknown = document[0];
  const details: unknown = isRecord(root) ? root.detail : undefined;
  if (!Array.isArray(details)) {
    throw RelayError.sourceUnavailable('Feed has no detail list');
  }

  const items: RawItem[] = [];
  details.forEach((detail: unknown, index: number) => {
    if (!isRecord(detail)) {
      logger?.warn(`Skipping detail #${index}: not an object`);
      return;
    }

    const rankNo = asText(detail.ranking_no);
    const signCode = asText(detail.horoscope_st);
    const text = asText(detail.horoscope_text);
    if (!rankNo || !signCode || !text) {
      logger?.warn(`Skipping detail #${index}: missing ranking_no, horoscope_st or horoscope_text`);
      return;
    }

    items.push({
      rank: `${rankNo}位`,
      signCode,
      sign: SIGN_NAMES[signCode] ?? `不明な星座(${signCode})`,
      description: text.replace(/\t/g, ' ').trim()
    });
  });

  if (items.length !== EXPECTED_ITEM_COUNT) {
    logger?.warn(`Expected ${EXPECTED_ITEM_COUNT} ranking entries, got ${items.length}`);
  }

  return items;
}

export class HoroscopeSourceFetcher implements SourceFetcher {
  private readonly config: SourceConfig;
  private readonly http: HttpGetter;
  private readonly logger: RelayLogger;

  constructor(config: SourceConfig, http?: HttpGetter, logger: RelayLogger = createModuleLogger('source')) {
    this.config = config;
    this.http = http ?? axios.create({ timeout: config.timeoutMs });
    this.logger = logger;
  }

  async fetchToday(): Promise<RawItem[]> {
    this.logger.info('Fetching daily ranking feed', { url: this.config.url });

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.config.url, {
        headers: {
          'User-Agent': 'Mozilla/5.0',
          Accept: 'application/json,text/javascript,*/*;q=0.01',
          Referer: this.config.refererUrl
        },
        responseType: 'json'
      });
      data = response.data;
    } catch (error) {
      throw RelayError.sourceUnavailable(`Ranking feed request failed: ${errorMessage(error)}`, error);
    }

    const items = parseHoroscopeFeed(data, this.logger);
    this.logger.info(`Parsed ${items.length} ranking entries`);
    return items;
  }
}
