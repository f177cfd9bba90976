import type { RuntimeConfig } from './config.ts';
import { errorTypeUrl } from './errors.ts';
import type { HelpDocument, HelpEndpoint } from './types.ts';

type HelpConfig = Pick<RuntimeConfig, 'appVersion' | 'docsBaseUrl' | 'supportContact'>;

const ENDPOINTS: readonly (Omit<HelpEndpoint, 'url'> & { slug: string })[] = [
  {
    name: 'POST /check-in',
    slug: 'check-in',
    description: 'Record a daily check-in and receive a risk band with a supportive reflection.',
    status_codes: ['200', '400', '405', '413', '429', '500'],
  },
  {
    name: 'POST /consents',
    slug: 'consents',
    description: 'Record or replace the consent decision for a user.',
    status_codes: ['200', '400', '405', '413'],
  },
  {
    name: 'GET /consents/{user_id}',
    slug: 'get-consent',
    description: 'Read the most recent consent decision for a user.',
    status_codes: ['200', '400', '404', '405'],
  },
  { name: 'GET /healthz', slug: 'healthz', description: 'Liveness check.', status_codes: ['200'] },
  { name: 'GET /readyz', slug: 'readyz', description: 'Readiness check.', status_codes: ['200'] },
  {
    name: 'GET /metrics',
    slug: 'metrics',
    description: 'Aggregate counters and store sizes. Contains no user identifiers.',
    status_codes: ['200'],
  },
  { name: 'GET /help', slug: 'help', description: 'This document.', status_codes: ['200'] },
];

const TROUBLESHOOTING: Record<string, string> = {
  rate_limited: 'Wait for the number of seconds given in the retry-after header, then send the check-in again.',
  insufficient_data: 'Continue checking in; a risk band is returned once three check-ins are on record.',
  validation_failed: 'Check the details array for the fields that failed and ensure each value is within range.',
  invalid_json: 'Ensure the request body is a single JSON object sent with content-type application/json.',
  consent_not_found: 'Check the user_id, or record a consent with POST /consents before reading it back.',
  payload_too_large: 'Check the request size; bodies above the configured limit are refused before parsing.',
  high_risk_response:
    'Continue to show the reflection and crisis notice in full. Contact local emergency services or 988 when there is immediate danger.',
};

export function buildHelp(config: HelpConfig): HelpDocument {
  const base = config.docsBaseUrl;
  return {
    api_version: config.appVersion,
    documentation_url: base,
    support_contact: config.supportContact,
    endpoints: ENDPOINTS.map(({ slug, ...endpoint }) => ({ ...endpoint, url: `${base}/endpoints/${slug}` })),
    error_types: {
      validation: errorTypeUrl(base, 'validation'),
      'rate-limit': errorTypeUrl(base, 'rate-limit'),
      'not-found': errorTypeUrl(base, 'not-found'),
      'method-not-allowed': errorTypeUrl(base, 'method-not-allowed'),
      'payload-too-large': errorTypeUrl(base, 'payload-too-large'),
      internal: errorTypeUrl(base, 'internal'),
    },
    troubleshooting: { ...TROUBLESHOOTING },
  };
}
