export type ClientKey = string;
export type Subject = string;

/** Milliseconds on whichever clock the owning component was given. */
export type Timestamp = number;

export type CheckinRecord = {
  readonly adherence: number;
  readonly mood_trend: number;
  readonly cravings: number;
  readonly sleep_hours: number;
  readonly isolation: number;
  readonly recorded_at: Timestamp;
};

export type ConsentRecord = {
  readonly accepted: boolean;
  readonly terms_version: string;
  readonly recorded_at: Timestamp;
};

export type RiskBand = 'low' | 'elevated' | 'moderate' | 'high' | 'insufficient_data';

export type RiskComponents = {
  adherence: number;
  mood: number;
  cravings: number;
  sleep: number;
  isolation: number;
};

export type RiskAssessment =
  | { band: 'insufficient_data'; score: null; components: null }
  | { band: Exclude<RiskBand, 'insufficient_data'>; score: number; components: RiskComponents };

export type RateLimitSnapshot = {
  allowed: boolean;
  remaining: number;
  limit: number;
  window_seconds: number;
  retry_after_seconds: number;
};

export type CheckInRequest = {
  user_id: string;
  adherence: number;
  mood_trend: number;
  cravings: number;
  sleep_hours: number;
  isolation: number;
  recorded_at?: string;
};

export type ConsentRequest = {
  user_id: string;
  accepted: boolean;
  terms_version: string;
  recorded_at?: string;
};

export type CheckInResponse = {
  correlation_id: string;
  state: 'ok' | 'insufficient_data';
  score: number | null;
  band: RiskBand;
  reflection: string;
  crisis_footer: string;
  checkins_count: number;
  risk_score_version: string;
  prompt_version: string;
};

export type ConsentResponse = {
  user_id: string;
  accepted: boolean;
  terms_version: string;
  recorded_at: string;
};

export type ErrorCode =
  | 'E_INVALID_JSON'
  | 'E_VALIDATION'
  | 'E_RATE_LIMITED'
  | 'E_CONSENT_NOT_FOUND'
  | 'E_NOT_FOUND'
  | 'E_METHOD_NOT_ALLOWED'
  | 'E_BAD_REQUEST'
  | 'E_PAYLOAD_TOO_LARGE'
  | 'E_INTERNAL';

export type ErrorKind =
  | 'validation'
  | 'rate-limit'
  | 'not-found'
  | 'method-not-allowed'
  | 'payload-too-large'
  | 'internal';

export type ErrorResponse = {
  status: 'error';
  error: {
    code: ErrorCode;
    type: string;
    title: string;
    detail: string;
    help_url: string;
  };
  meta: {
    request_id: string;
    timestamp: string;
  };
  state?: string;
  details?: unknown;
};

export type HelpEndpoint = {
  name: string;
  description: string;
  url: string;
  status_codes: string[];
};

export type HelpDocument = {
  api_version: string;
  documentation_url: string;
  support_contact: string;
  endpoints: HelpEndpoint[];
  error_types: Record<ErrorKind, string>;
  troubleshooting: Record<string, string>;
};
