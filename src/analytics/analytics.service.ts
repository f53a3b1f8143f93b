import { Logger } from '@nestjs/common';

export const PLAUSIBLE_EVENTS_URL = 'https://plausible.io/api/event';

export interface PageviewContext {
  /** Path and query of the request being counted. */
  url: string;
  userAgent?: string;
  clientIp?: string;
}

export interface AnalyticsOptions {
  /** Site domain registered with Plausible; unset disables the beacon. */
  domain?: string;
  endpoint?: string;
  timeoutMs?: number;
}

/** Server-side Plausible pageview events for redirects, which never render a page. */
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: AnalyticsOptions) {
    this.endpoint = options.endpoint ?? PLAUSIBLE_EVENTS_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  get domain(): string | undefined {
    return this.options.domain;
  }

  get enabled(): boolean {
    return Boolean(this.options.domain);
  }

  /** Resolves once the event was sent or dropped; never rejects. */
  async pageview(context: PageviewContext): Promise<void> {
    if (!this.options.domain) {
      return;
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (context.userAgent) headers['User-Agent'] = context.userAgent;
    if (context.clientIp) headers['X-Forwarded-For'] = context.clientIp;

    try {
      const res = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ name: 'pageview', domain: this.options.domain, url: context.url }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!res.ok) {
        this.logger.warn(`Plausible rejected event with HTTP ${res.status}`);
      }
    } catch (err) {
      this.logger.error(`Failed to send Plausible event: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
