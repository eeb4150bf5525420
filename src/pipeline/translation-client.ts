/**
 * Gemini translation client
 *
 * One schema-constrained generateContent call per attempt. Server faults and
 * transport failures are retried with a linear backoff; any other status fails at once.
 */

import axios, { AxiosInstance } from 'axios';
import { RankedItem, RawItem } from '../system/types';
import { RelayError, RelayErrorType, Result, errorMessage, fail, ok } from '../system/error-handling';
import { TranslationConfig } from '../system/config';
import { RelayLogger, createModuleLogger } from '../system/logger';

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface TranslationClientOptions {
  config: Pick<TranslationConfig, 'endpoint' | 'model' | 'targetLanguage' | 'maxAttempts' | 'retryDelayMs' | 'timeoutMs'>;
  http?: HttpPoster;
  logger?: RelayLogger;
  sleep?: (ms: number) => Promise<void>;
}

interface TranslatedEntry {
  rank: string;
  sign: string;
  description: string;
}

type AttemptOutcome =
  | { kind: 'success'; entries: TranslatedEntry[] }
  | { kind: 'retry'; reason: string }
  | { kind: 'fatal'; reason: string; status?: number };

const RESPONSE_SCHEMA = {
  type: 'ARRAY',
  items: {
    type: 'OBJECT',
    properties: {
      rank: {
        type: 'STRING',
        description: 'Rank label in the target language, e.g. "1st"'
      },
      sign: {
        type: 'STRING',
        description: 'Name of the zodiac sign in the target language'
      },
      description: {
        type: 'STRING',
        description: 'Full horoscope text in the target language'
      }
    },
    required: ['rank', 'sign', 'description']
  }
} as const;

function buildSystemPrompt(targetLanguage: string): string {
  return (
    `You are an expert translator of Japanese horoscopes into ${targetLanguage}. ` +
    'The input is a JSON array of horoscope rankings with Japanese sign names and descriptions. ' +
    `Translate all Japanese text into natural, easy-to-read ${targetLanguage}. ` +
    'Keep the order and the ranking, and return one object per input entry with the fields rank, sign and description. ' +
    'Return only the JSON array.'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTranslatedEntry(value: unknown): value is TranslatedEntry {
  return (
    isRecord(value) &&
    typeof value.rank === 'string' &&
    typeof value.sign === 'string' &&
    typeof value.description === 'string'
  );
}

/**
 * Pull the JSON array out of a generateContent response body
 */
export function parseGenerateContentResponse(body: unknown): TranslatedEntry[] {
  if (!isRecord(body) || !Array.isArray(body.candidates) || body.candidates.length === 0) {
    throw new Error('Response has no candidates');
  }

  const candidate: unknown = body.candidates[0];
  const content = isRecord(candidate) ? candidate.content : undefined;
  const parts = isRecord(content) ? content.parts : undefined;
  const firstPart: unknown = Array.isArray(parts) ? parts[0] : undefined;
  const text = isRecord(firstPart) ? firstPart.text : undefined;

  if (typeof text !== 'string') {
    throw new Error('Response candidate has no text part');
  }

  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed) || !parsed.every(isTranslatedEntry)) {
    throw new Error('Translated payload is not an array of {rank, sign, description}');
  }

  return parsed;
}

function rankNumber(label: string): string | null {
  const match = label.match(/\d+/);
  return match ? String(Number(match[0])) : null;
}

/**
 * Attach each translated entry to its source entry, by rank number and then by position
 */
export function attachSourceSigns(entries: TranslatedEntry[], rawItems: RawItem[]): RankedItem[] {
  const byRank = new Map<string, RawItem>();
  for (const raw of rawItems) {
    const rank = rankNumber(raw.rank);
    if (rank !== null && !byRank.has(rank)) {
      byRank.set(rank, raw);
    }
  }

  return entries.map((entry, index) => {
    const rank = rankNumber(entry.rank);
    const source = (rank !== null ? byRank.get(rank) : undefined) ?? rawItems[index];
    return {
      rank: entry.rank.trim(),
      sourceSign: source?.sign ?? '',
      sign: entry.sign.trim(),
      description: entry.description.trim()
    };
  });
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class TranslationClient {
  private readonly config: TranslationClientOptions['config'];
  private readonly http: HttpPoster;
  private readonly logger: RelayLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TranslationClientOptions) {
    this.config = options.config;
    this.http = options.http ?? axios.create({ timeout: options.config.timeoutMs });
    this.logger = options.logger ?? createModuleLogger('translation');
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Translate the raw ranking. Resolves to a failure value on every error path.
   */
  async translate(rawItems: RawItem[], apiKey: string): Promise<Result<RankedItem[]>> {
    if (!apiKey || !apiKey.trim()) {
      return fail(new RelayError('Translation API key is missing', RelayErrorType.CREDENTIAL_MISSING));
    }

    const payload = this.buildPayload(rawItems);
    const maxAttempts = Math.max(1, this.config.maxAttempts);
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.attempt(payload, apiKey.trim());

      if (outcome.kind === 'success') {
        if (attempt > 1) {
          this.logger.info(`Translation succeeded on attempt ${attempt}/${maxAttempts}`);
        }
        return ok(attachSourceSigns(outcome.entries, rawItems));
      }

      if (outcome.kind === 'fatal') {
        this.logger.error(`Translation request rejected: ${outcome.reason}`, undefined, {
          status: outcome.status,
          attempt
        });
        return fail(
          RelayError.translationUnavailable(`Translation request rejected: ${outcome.reason}`, {
            status: outcome.status,
            attempts: attempt
          })
        );
      }

      lastReason = outcome.reason;
      this.logger.warn(`Translation attempt ${attempt}/${maxAttempts} failed: ${outcome.reason}`);

      if (attempt < maxAttempts) {
        await this.sleep(this.config.retryDelayMs * attempt);
      }
    }

    return fail(
      RelayError.translationUnavailable(`Translation failed after ${maxAttempts} attempts: ${lastReason}`, {
        attempts: maxAttempts
      })
    );
  }

  private buildPayload(rawItems: RawItem[]): Record<string, unknown> {
    const sourceText = JSON.stringify(
      rawItems.map(item => ({
        rank: item.rank,
        sign: item.sign,
        description: item.description
      })),
      null,
      2
    );

    return {
      contents: [{ parts: [{ text: sourceText }] }],
      systemInstruction: { parts: [{ text: buildSystemPrompt(this.config.targetLanguage) }] },
      generationConfig: {
        responseMimeType: 'application/json',
        responseSchema: RESPONSE_SCHEMA
      }
    };
  }

  private async attempt(payload: Record<string, unknown>, apiKey: string): Promise<AttemptOutcome> {
    const url = `${this.config.endpoint}/models/${this.config.model}:generateContent`;

    try {
      const response = await this.http.post<unknown>(url, payload, {
        params: { key: apiKey },
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true
      });

      if (response.status === 200) {
        return { kind: 'success', entries: parseGenerateContentResponse(response.data) };
      }

      const reason = `HTTP ${response.status}: ${summarizeBody(response.data)}`;
      if (response.status >= 500 && response.status < 600) {
        return { kind: 'retry', reason };
      }
      return { kind: 'fatal', reason, status: response.status };
    } catch (error) {
      return { kind: 'retry', reason: errorMessage(error) };
    }
  }
}

function summarizeBody(body: unknown): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
  return text.length > 300 ? `${text.slice(0, 300)}...` : text;
}
