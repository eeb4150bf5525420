/**
 * Fetch + translate for one guild
 */

import { EXPECTED_ITEM_COUNT, RankedItem, RawItem } from '../system/types';
import { RelayError, RelayErrorType, Result, fail, ok, toRelayError } from '../system/error-handling';
import { RelayLogger, createModuleLogger } from '../system/logger';
import { SourceFetcher } from './source-fetcher';
import { TranslationClient } from './translation-client';

export interface CredentialLookup {
  get(guildId: string): { apiKey: string } | undefined;
}

export interface ContentProducer {
  produce(guildId: string): Promise<Result<RankedItem[]>>;
}

export class ContentPipeline implements ContentProducer {
  constructor(
    private readonly credentials: CredentialLookup,
    private readonly source: SourceFetcher,
    private readonly translator: Pick<TranslationClient, 'translate'>,
    private readonly logger: RelayLogger = createModuleLogger('pipeline')
  ) {}

  /**
   * Two sequential network calls plus retries: only call this from background work
   */
  async produce(guildId: string): Promise<Result<RankedItem[]>> {
    const apiKey = this.credentials.get(guildId)?.apiKey ?? '';
    if (!apiKey.trim()) {
      return fail(RelayError.credentialMissing(guildId));
    }

    let rawItems: RawItem[];
    try {
      rawItems = await this.source.fetchToday();
    } catch (error) {
      const relayError = toRelayError(error, RelayErrorType.SOURCE_UNAVAILABLE);
      this.logger.error('Ranking source unavailable', relayError, { guildId });
      return fail(relayError);
    }

    if (rawItems.length === 0) {
      this.logger.error('Ranking source returned no usable entries', undefined, { guildId });
      return fail(RelayError.sourceUnavailable('Ranking source returned no usable entries'));
    }

    const translated = await this.translator.translate(rawItems, apiKey);
    if (!translated.ok) {
      return translated;
    }

    if (translated.value.length === 0) {
      return fail(RelayError.translationUnavailable('Translation returned no entries'));
    }

    if (translated.value.length < EXPECTED_ITEM_COUNT) {
      this.logger.warn(`Translation returned ${translated.value.length} of ${EXPECTED_ITEM_COUNT} entries`, {
        guildId
      });
    }

    return ok(translated.value);
  }
}
