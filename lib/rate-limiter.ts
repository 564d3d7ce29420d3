/**
 * Rate Limiting Module
 * Minimum spacing between consecutive calls to the same external service.
 * One limiter is created per run and shared by every component that talks
 * to that service.
 */

import type { DelayConfig } from './config';

export type ExternalService = keyof DelayConfig;

interface ServiceState {
  lastRequest: number;
  minInterval: number;
}

export class RateLimiter {
  private readonly services = new Map<ExternalService, ServiceState>();

  constructor(delays: DelayConfig) {
    for (const [service, minInterval] of Object.entries(delays)) {
      if (isExternalService(service)) {
        this.services.set(service, { lastRequest: 0, minInterval });
      }
    }
  }

  /**
   * Wait until the service's minimum interval has passed since the previous
   * call, then record this call.
   */
  async wait(service: ExternalService): Promise<void> {
    const state = this.services.get(service);
    if (!state) return;

    const elapsed = Date.now() - state.lastRequest;
    if (state.minInterval > 0 && elapsed < state.minInterval) {
      await new Promise((resolve) => setTimeout(resolve, state.minInterval - elapsed));
    }

    state.lastRequest = Date.now();
  }

  intervalFor(service: ExternalService): number {
    return this.services.get(service)?.minInterval ?? 0;
  }
}

const SERVICES: readonly ExternalService[] = ['search', 'scrape', 'orcid', 'catalog'];

function isExternalService(value: string): value is ExternalService {
  return SERVICES.some((service) => service === value);
}
