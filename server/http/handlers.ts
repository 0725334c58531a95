import type { LanguageCode, Verdict, VerdictLocalization } from '../../shared/types';
import { languageName, localize } from '../classification/language';
import { isRegion, type Region } from '../retrieval/catalog';
import type { SourceCredentials } from '../retrieval/aggregator';
import { isClassificationError, type ClassificationErrorCode } from '../pipeline/errors';

export interface HttpError {
  status: number;
  body: { error: string; code: ClassificationErrorCode | 'Internal' };
}

const STATUS_BY_CODE: Record<ClassificationErrorCode, number> = {
  TooShort: 400,
  TooLong: 400,
  ScorerUnavailable: 503,
  NoResults: 404,
};

export const toHttpError = (error: unknown): HttpError => {
  if (isClassificationError(error)) {
    return { status: STATUS_BY_CODE[error.code], body: { error: error.message, code: error.code } };
  }
  return { status: 500, body: { error: 'Internal error', code: 'Internal' } };
};

export const localizeVerdict = <V extends Verdict>(verdict: V): V & VerdictLocalization => ({
  ...verdict,
  labelLocalized: localize(verdict.label, verdict.detectedLanguage),
  reliabilityLocalized: localize(verdict.reliability, verdict.detectedLanguage),
  languageName: languageName(verdict.detectedLanguage),
});

const firstString = (value: unknown): string | undefined => {
  if (Array.isArray(value)) return firstString(value[0]);
  return typeof value === 'string' ? value.trim() : undefined;
};

const REQUEST_LANGUAGES: readonly LanguageCode[] = ['en', 'hi', 'gu'];

export interface FetchParams {
  query: string | undefined;
  region?: Region;
  language?: LanguageCode;
}

/** Unknown regions and languages fall back to the defaults rather than failing the request. */
export const parseFetchParams = (query: Record<string, unknown>): FetchParams => {
  const region = firstString(query.region)?.toLowerCase();
  const language = firstString(query.language)?.toLowerCase();
  return {
    query: firstString(query.query ?? query.q),
    region: isRegion(region) ? region : undefined,
    language: REQUEST_LANGUAGES.find((code) => code === language),
  };
};

export const credentialsFromHeaders = (header: (name: string) => string | undefined): SourceCredentials => ({
  newsApiKey: header('x-newsapi-key')?.trim() || undefined,
  newsDataKey: header('x-newsdata-key')?.trim() || undefined,
});
