import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { CheckinStore } from './checkin-store.ts';
import { deriveClientKey, pseudonymize } from './client-key.ts';
import type { RuntimeConfig } from './config.ts';
import type { ConsentStore } from './consent-store.ts';
import { HttpError, errorBody, jsonResponse as toJsonResponse } from './errors.ts';
import { buildHelp } from './help.ts';
import type { Logger } from './logger.ts';
import type { Metrics } from './metrics.ts';
import type { RateLimiter } from './rate-limit.ts';
import {
  CRISIS_FOOTER,
  PROMPT_VERSION,
  RISK_SCORE_VERSION,
  evaluate,
  fallbackReflection,
  reflectionFor,
} from './risk-scorer.ts';
import { SafetyAuditor, type ReflectionAuditor } from './safety-auditor.ts';
import { transition, type CheckInState } from './state-machine.ts';
import type {
  CheckInRequest,
  CheckInResponse,
  CheckinRecord,
  ConsentRecord,
  ConsentRequest,
  ConsentResponse,
  RiskBand,
} from './types.ts';

export type HandlerDeps = {
  config: Pick<RuntimeConfig, 'clientKeySalt' | 'appVersion' | 'docsBaseUrl' | 'supportContact'>;
  rateLimiter: Pick<RateLimiter, 'evaluate'>;
  checkins: Pick<CheckinStore, 'appendAndRead'>;
  consents: Pick<ConsentStore, 'put' | 'get'>;
  metrics: Metrics;
  logger: Logger;
  /** Screens reflection text before it is returned; defaults to `SafetyAuditor`. */
  auditor?: ReflectionAuditor;
  /** Wall clock for `recorded_at` when the client sends none. */
  now?: () => number;
};

export type ConnectionInfo = {
  remoteAddress?: string;
};

export type Handler = (req: Request, info?: ConnectionInfo) => Promise<Response>;

type RequestContext = {
  requestId: string;
  info: ConnectionInfo;
  docsBaseUrl: string;
};

const CheckInSchema = z.object({
  user_id: z.string().min(1, 'user_id is required').max(128),
  adherence: z.number().int().min(0).max(100),
  mood_trend: z.number().int().min(-10).max(10),
  cravings: z.number().int().min(0).max(100),
  sleep_hours: z.number().min(0).max(24),
  isolation: z.number().int().min(0).max(100),
  recorded_at: z.string().datetime({ offset: true }).optional(),
});

const ConsentSchema = z.object({
  user_id: z.string().min(1, 'user_id is required').max(128),
  accepted: z.boolean(),
  terms_version: z.string().min(1, 'terms_version is required').max(64),
  recorded_at: z.string().datetime({ offset: true }).optional(),
});

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;
const CONSENT_PATH = /^\/consents\/([^/]+)$/;
const FIXED_ROUTES = new Set(['/check-in', '/consents', '/healthz', '/readyz', '/metrics', '/help']);

export function createHandler(deps: HandlerDeps): Handler {
  const { rateLimiter, checkins, consents, metrics, logger } = deps;
  const salt = deps.config.clientKeySalt;
  const now = deps.now ?? Date.now;
  const auditor = deps.auditor ?? new SafetyAuditor();
  const help = buildHelp(deps.config);

  async function route(req: Request, ctx: RequestContext): Promise<Response> {
    const path = new URL(req.url).pathname.replace(/\/+$/, '') || '/';

    if (path === '/check-in') {
      requireMethod(req, 'POST');
      return handleCheckIn(req, ctx);
    }
    if (path === '/consents') {
      requireMethod(req, 'POST');
      return handlePutConsent(req, ctx);
    }
    const consentMatch = CONSENT_PATH.exec(path);
    if (consentMatch) {
      requireMethod(req, 'GET');
      return handleGetConsent(decodeSegment(consentMatch[1] ?? ''), ctx);
    }
    if (path === '/healthz') {
      requireMethod(req, 'GET');
      return jsonResponse({ ok: true }, 200, ctx);
    }
    if (path === '/readyz') {
      requireMethod(req, 'GET');
      return jsonResponse({ ready: true }, 200, ctx);
    }
    if (path === '/metrics') {
      requireMethod(req, 'GET');
      return jsonResponse(metrics.snapshot(), 200, ctx);
    }
    if (path === '/help') {
      requireMethod(req, 'GET');
      return jsonResponse(help, 200, ctx);
    }
    throw new HttpError(404, 'E_NOT_FOUND', 'Not Found', `No route for ${path}`);
  }

  async function handleCheckIn(req: Request, ctx: RequestContext): Promise<Response> {
    let state: CheckInState = 'RECEIVED';

    try {
      const body = await parseRequest(req);
      state = transition(state, { type: 'BODY_PARSED' });
      const parsed: CheckInRequest = CheckInSchema.parse(body);

      const clientKey = deriveClientKey(ctx.info.remoteAddress, req.headers.get('user-agent'), salt);
      const rate = await rateLimiter.evaluate(clientKey);
      if (!rate.allowed) {
        state = transition(state, { type: 'RATE_LIMITED' });
        metrics.recordRateLimited();
        return errorResponse(
          ctx,
          new HttpError(
            429,
            'E_RATE_LIMITED',
            'Rate Limit Exceeded',
            `Too many check-ins. Retry after ${rate.retry_after_seconds} seconds.`,
          ),
          { state },
          { 'retry-after': String(rate.retry_after_seconds) },
        );
      }
      state = transition(state, { type: 'ADMITTED' });

      const record: CheckinRecord = {
        adherence: parsed.adherence,
        mood_trend: parsed.mood_trend,
        cravings: parsed.cravings,
        sleep_hours: parsed.sleep_hours,
        isolation: parsed.isolation,
        recorded_at: parsed.recorded_at ? Date.parse(parsed.recorded_at) : now(),
      };
      const history = await checkins.appendAndRead(parsed.user_id, record);
      state = transition(state, { type: 'RECORDED' });

      const assessment = evaluate(history);
      state = transition(state, { type: 'SCORED', insufficient: assessment.score === null });
      metrics.recordCheckin(assessment.band);

      logger.info('check_in_scored', {
        request_id: ctx.requestId,
        subject_hash: pseudonymize(parsed.user_id, salt),
        score: assessment.score,
        band: assessment.band,
        checkins_count: history.length,
        risk_score_version: RISK_SCORE_VERSION,
      });

      const response: CheckInResponse = {
        correlation_id: ctx.requestId,
        state: assessment.score === null ? 'insufficient_data' : 'ok',
        score: assessment.score,
        band: assessment.band,
        reflection: screenReflection(assessment.band, ctx),
        crisis_footer: CRISIS_FOOTER,
        checkins_count: history.length,
        risk_score_version: RISK_SCORE_VERSION,
        prompt_version: PROMPT_VERSION,
      };
      return jsonResponse(response, 200, ctx);
    } catch (error) {
      if (error instanceof z.ZodError) {
        state = transition(state, { type: 'VALIDATION_FAILED' });
        return validationResponse(ctx, error, state);
      }
      if (error instanceof HttpError) {
        state = transition(state, { type: 'VALIDATION_FAILED' });
        return errorResponse(ctx, error, { state });
      }
      state = transition(state, { type: 'INTERNAL_ERROR' });
      logger.error('Unhandled check-in error', { request_id: ctx.requestId, state, error });
      return errorResponse(ctx, internalError(), { state });
    }
  }

  function screenReflection(band: RiskBand, ctx: RequestContext): string {
    const result = auditor.audit(reflectionFor(band));
    if (result.decision === 'APPROVED') return result.sanitized;
    logger.warn('reflection_withheld', {
      request_id: ctx.requestId,
      band,
      rules: result.rules,
      escalation_required: result.escalation_required,
    });
    return fallbackReflection(band);
  }

  async function handlePutConsent(req: Request, ctx: RequestContext): Promise<Response> {
    let parsed: ConsentRequest;
    try {
      parsed = ConsentSchema.parse(await parseRequest(req));
    } catch (error) {
      if (error instanceof z.ZodError) {
        return validationResponse(ctx, error);
      }
      throw error;
    }

    const record: ConsentRecord = {
      accepted: parsed.accepted,
      terms_version: parsed.terms_version,
      recorded_at: parsed.recorded_at ? Date.parse(parsed.recorded_at) : now(),
    };
    await consents.put(parsed.user_id, record);
    metrics.recordConsent();

    logger.info('consent_recorded', {
      request_id: ctx.requestId,
      subject_hash: pseudonymize(parsed.user_id, salt),
      accepted: record.accepted,
      terms_version: record.terms_version,
    });
    return jsonResponse(toConsentResponse(parsed.user_id, record), 200, ctx);
  }

  function handleGetConsent(subject: string, ctx: RequestContext): Response {
    const record = consents.get(subject);
    if (!record) {
      throw new HttpError(
        404,
        'E_CONSENT_NOT_FOUND',
        'Consent Record Not Found',
        'No consent record exists for this user ID.',
      );
    }
    return jsonResponse(toConsentResponse(subject, record), 200, ctx);
  }

  return async (req, info = {}) => {
    const started = performance.now();
    const headerId = req.headers.get('x-request-id');
    const ctx: RequestContext = {
      requestId: headerId && REQUEST_ID_PATTERN.test(headerId) ? headerId : randomUUID(),
      info,
      docsBaseUrl: deps.config.docsBaseUrl,
    };

    let response: Response;
    try {
      response = await route(req, ctx);
    } catch (error) {
      if (error instanceof HttpError) {
        response = errorResponse(ctx, error);
      } else {
        logger.error('Unhandled request error', { request_id: ctx.requestId, error });
        response = errorResponse(ctx, internalError());
      }
    }

    logger.info('access', {
      request_id: ctx.requestId,
      method: req.method,
      path: routeLabel(new URL(req.url).pathname),
      status: response.status,
      duration_ms: Math.round(performance.now() - started),
    });
    return response;
  };
}

// Only route templates reach the access log; raw paths can carry identifiers.
function routeLabel(pathname: string): string {
  const path = pathname.replace(/\/+$/, '') || '/';
  if (FIXED_ROUTES.has(path)) return path;
  return CONSENT_PATH.test(path) ? '/consents/:user_id' : 'unmatched';
}

function requireMethod(req: Request, method: 'GET' | 'POST'): void {
  if (req.method !== method) {
    throw new HttpError(405, 'E_METHOD_NOT_ALLOWED', 'Method Not Allowed', `Only ${method} supported`);
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, 'E_VALIDATION', 'Validation Failed', 'user_id path segment is not valid');
  }
}

async function parseRequest(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new HttpError(400, 'E_INVALID_JSON', 'Invalid Request Body', 'Invalid JSON body');
  }
}

function internalError(): HttpError {
  return new HttpError(500, 'E_INTERNAL', 'Internal Error', 'The request could not be completed.');
}

function toConsentResponse(subject: string, record: ConsentRecord): ConsentResponse {
  return {
    user_id: subject,
    accepted: record.accepted,
    terms_version: record.terms_version,
    recorded_at: new Date(record.recorded_at).toISOString(),
  };
}

function validationResponse(ctx: RequestContext, error: z.ZodError, state?: CheckInState): Response {
  return errorResponse(
    ctx,
    new HttpError(400, 'E_VALIDATION', 'Validation Failed', 'Request body failed validation'),
    { state, details: error.issues },
  );
}

function errorResponse(
  ctx: RequestContext,
  error: HttpError,
  extra: { state?: string; details?: unknown } = {},
  headers: Record<string, string> = {},
): Response {
  return jsonResponse(errorBody(error, ctx.docsBaseUrl, ctx.requestId, extra), error.status, ctx, headers);
}

function jsonResponse(
  body: object,
  status: number,
  ctx: RequestContext,
  headers: Record<string, string> = {},
): Response {
  return toJsonResponse(body, status, ctx.requestId, headers);
}
