import type { CheckinStore } from './checkin-store.ts';
import type { ConsentStore } from './consent-store.ts';
import type { RateLimiter } from './rate-limit.ts';
import type { RiskBand } from './types.ts';

/**
 * Privacy-safe counters: numbers only, never identifiers or check-in values.
 */
export type MetricsSnapshot = {
  checkin_completion_count: number;
  consent_toggled_count: number;
  rate_limited_count: number;
  risk_band_distribution: Record<RiskBand, number>;
  checkins_stored: number;
  subjects_tracked: number;
  consents_stored: number;
  rate_limit_keys: number;
  app_version: string;
};

type Sources = {
  checkins: Pick<CheckinStore, 'count' | 'subjects'>;
  consents: Pick<ConsentStore, 'count'>;
  rateLimiter: Pick<RateLimiter, 'size'>;
};

export class Metrics {
  private checkinCompletions = 0;
  private consentToggles = 0;
  private rateLimited = 0;
  private readonly bands: Record<RiskBand, number> = {
    low: 0,
    elevated: 0,
    moderate: 0,
    high: 0,
    insufficient_data: 0,
  };

  constructor(
    private readonly sources: Sources,
    private readonly appVersion: string,
  ) {}

  recordCheckin(band: RiskBand): void {
    this.checkinCompletions += 1;
    this.bands[band] += 1;
  }

  recordConsent(): void {
    this.consentToggles += 1;
  }

  recordRateLimited(): void {
    this.rateLimited += 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      checkin_completion_count: this.checkinCompletions,
      consent_toggled_count: this.consentToggles,
      rate_limited_count: this.rateLimited,
      risk_band_distribution: { ...this.bands },
      checkins_stored: this.sources.checkins.count(),
      subjects_tracked: this.sources.checkins.subjects(),
      consents_stored: this.sources.consents.count(),
      rate_limit_keys: this.sources.rateLimiter.size,
      app_version: this.appVersion,
    };
  }
}
