export type StageName = 'aggregation' | 'classification';

export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

/** Languages the detector recognizes; `unknown` is scored as the working language. */
export type LanguageCode = 'en' | 'hi' | 'gu' | 'unknown';

export type SourceKind = 'api' | 'scrape';

export interface Article {
  readonly id: string;
  readonly text: string;
  readonly sourceName: string;
  readonly sourceKind: SourceKind;
  readonly fetchedAt: string;
  readonly detectedLanguage: LanguageCode;
  /** Link to the item, when the source provides one. */
  readonly url?: string;
  /** Outlet that published the item, when known. */
  readonly publisher?: string;
}

export type SourceErrorKind = 'unauthorized' | 'rate-limited' | 'network' | 'timeout' | 'empty-result';

export interface SourceError {
  kind: SourceErrorKind;
  message: string;
  status?: number;
}

export type VerdictLabel = 'Real' | 'Fake';

export type Reliability = 'High' | 'Medium' | 'Low';

export type DecisionRegime = 'model' | 'rules-only';

export interface Verdict {
  label: VerdictLabel;
  confidencePercent: number;
  reliability: Reliability;
  detectedLanguage: LanguageCode;
  regime: DecisionRegime;
}

export type RuleCheck = 'uppercase' | 'punctuation' | 'sensational' | 'credible-source' | 'attribution' | 'quantitative';

export interface RuleSignal {
  check: RuleCheck;
  /** Positive pushes toward Real, negative toward Fake. */
  weight: number;
  detail: string;
}

export interface ExplainedVerdict extends Verdict {
  /** Rule signals that fired, in evaluation order. */
  signals: RuleSignal[];
  reason: string;
}

export type AttributionMethod = 'text' | 'lookup' | 'none';

export interface SourceAttribution {
  label: string;
  url: string | null;
  method: AttributionMethod;
}

export interface AnalysisResult extends ExplainedVerdict {
  source: SourceAttribution;
}

export interface SourceReport {
  sourceName: string;
  sourceKind: SourceKind;
  returned: number;
  error?: SourceError | null;
}

export interface FetchAndClassifyResult {
  query: string;
  articles: string[];
  verdicts: ExplainedVerdict[];
  sources: SourceReport[];
}

export interface VerdictLocalization {
  labelLocalized: string;
  reliabilityLocalized: string;
  languageName: string;
}

export interface ApiHealthResponse {
  ok: boolean;
  modelLoaded: boolean;
  ts: string;
}
