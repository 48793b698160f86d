// =============================================================================
// Bond Dashboard API
// Web-standard fetch handler; src/server.ts binds it to a Node HTTP server
// =============================================================================

import { AppConfig } from './config';
import { ServiceError, ValidationError } from './errors';
import { BondService, DEFAULT_USER_ID } from './service';
import { SyntheticMarketDataGenerator } from './synthetic-gen';
import { DEFAULT_HOLDING_DAYS, marketOverview } from './analytics';
import { createPriceFeed } from './feed';
import { alertsRequestSchema, parseWith, preferencesSchema } from './schemas';
import { BondsResponse, HistoricalPoint, HistoricalResponse } from './types';
import type { Logger } from './logger';

// CORS headers for cross-origin requests
const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, X-User-Id',
  'Access-Control-Max-Age': '86400',
};

// Curves served when no currency is requested
const DEFAULT_CURVE_CURRENCIES = ['USD', 'EUR'];

const DEFAULT_HISTORY_DAYS = 30;

// Parameterised routes; an ISIN is a two-letter prefix, nine alphanumerics and a check digit
const BOND_ROUTE = /^\/api\/bonds\/([A-Za-z]{2}[A-Za-z0-9]{9}[0-9])$/;
const HISTORY_ROUTE = /^\/api\/historical\/([A-Za-z]{2}[A-Za-z0-9]{9}[0-9])$/;
const ANALYTICS_ROUTE = /^\/api\/analytics\/([A-Za-z]{2}[A-Za-z0-9]{9}[0-9])$/;
const WATCHLIST_ROUTE = /^\/api\/watchlist\/([A-Za-z]{2}[A-Za-z0-9]{9}[0-9])$/;

// Methods accepted on fixed paths, for 405 answers
const ALLOWED_METHODS: Record<string, string[]> = {
  '/api/bonds': ['GET'],
  '/api/bonds/refresh': ['POST'],
  '/api/yield-curve': ['GET'],
  '/api/market-overview': ['GET'],
  '/api/preferences': ['GET', 'POST'],
  '/api/alerts': ['GET', 'POST'],
  '/api/stream': ['GET'],
};

const ENDPOINTS = [
  'GET /api/bonds',
  'POST /api/bonds/refresh',
  'GET /api/bonds/:isin',
  'GET /api/yield-curve',
  'GET /api/historical/:isin',
  'GET /api/analytics/:isin',
  'GET /api/market-overview',
  'GET /api/preferences',
  'POST /api/preferences',
  'GET /api/alerts',
  'POST /api/alerts',
  'DELETE /api/watchlist/:isin',
  'GET /api/stream',
];

export interface AppDependencies {
  config: Pick<AppConfig, 'streamIntervalMs'>;
  service: BondService;
  generator: SyntheticMarketDataGenerator;
  logger: Logger;
}

export interface App {
  fetch(request: Request): Promise<Response>;
  /** End every open live feed; later stream requests close at once */
  close(): void;
}

/**
 * Build the request handler
 */
export function createApp(deps: AppDependencies): App {
  const { service, generator, config } = deps;
  const log = deps.logger.child({ component: 'http' });
  const shutdown = new AbortController();

  async function route(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const path = url.pathname;
    const method = request.method;

    // Health check
    if (path === '/' || path === '/health') {
      return jsonResponse({
        status: 'ok',
        service: 'bond-dashboard',
        version: '1.0.0',
        timestamp: new Date().toISOString(),
        source: service.source,
        endpoints: ENDPOINTS,
      });
    }

    // Bonds
    if (path === '/api/bonds' && method === 'GET') {
      const snapshot = service.list();
      return jsonResponse(bondsResponse(snapshot.bonds, snapshot.lastUpdated, service.source));
    }

    if (path === '/api/bonds/refresh' && method === 'POST') {
      const snapshot = service.refresh();
      return jsonResponse(bondsResponse(snapshot.bonds, snapshot.lastUpdated, service.source));
    }

    const bondMatch = path.match(BOND_ROUTE);
    if (bondMatch && method === 'GET') {
      return jsonResponse(service.getBond(bondMatch[1].toUpperCase()));
    }

    // Yield curves
    if (path === '/api/yield-curve' && method === 'GET') {
      const currency = url.searchParams.get('currency');
      const currencies = currency ? [currency.toUpperCase()] : DEFAULT_CURVE_CURRENCIES;
      return jsonResponse(service.yieldCurves(currencies));
    }

    // Historical series: /api/historical/:isin?days=N or ?start=&end=
    const historyMatch = path.match(HISTORY_ROUTE);
    if (historyMatch && method === 'GET') {
      const isin = historyMatch[1].toUpperCase();
      const start = url.searchParams.get('start');
      const end = url.searchParams.get('end');

      let points: HistoricalPoint[];
      if (start !== null || end !== null) {
        if (start === null || end === null) {
          throw new ValidationError('start and end must be given together');
        }
        points = service.historyBetween(isin, start, end);
      } else {
        const days = integerParam(url, 'days', DEFAULT_HISTORY_DAYS);
        points = service.history(isin, days);
      }
      return jsonResponse(historicalResponse(isin, points));
    }

    // Analytics: /api/analytics/:isin?holding_days=N
    const analyticsMatch = path.match(ANALYTICS_ROUTE);
    if (analyticsMatch && method === 'GET') {
      const holdingDays = integerParam(url, 'holding_days', DEFAULT_HOLDING_DAYS);
      return jsonResponse(service.analytics(analyticsMatch[1].toUpperCase(), holdingDays));
    }

    if (path === '/api/market-overview' && method === 'GET') {
      return jsonResponse(marketOverview());
    }

    // Preferences
    if (path === '/api/preferences') {
      const userId = userIdOf(request);
      if (method === 'GET') {
        const preferences = service.getPreferences(userId);
        if (!preferences) {
          return jsonResponse({ error: 'No preferences saved', kind: 'not_found', user_id: userId }, 404);
        }
        return jsonResponse({ user_id: userId, preferences });
      }
      if (method === 'POST') {
        const preferences = parseWith(preferencesSchema, await readJson(request), 'preferences');
        service.savePreferences(userId, preferences);
        return jsonResponse({ status: 'success', user_id: userId });
      }
    }

    if (path === '/api/alerts' && method === 'GET') {
      const userId = userIdOf(request);
      return jsonResponse({ user_id: userId, alerts: service.listAlerts(userId) });
    }

    if (path === '/api/alerts' && method === 'POST') {
      const body = parseWith(alertsRequestSchema, await readJson(request), 'alerts');
      const alerts = service.addAlerts(userIdOf(request), body.alerts);
      return jsonResponse({ status: 'success', alerts });
    }

    const watchlistMatch = path.match(WATCHLIST_ROUTE);
    if (watchlistMatch && method === 'DELETE') {
      const watchlist = service.removeFromWatchlist(userIdOf(request), watchlistMatch[1].toUpperCase());
      return jsonResponse({ status: 'success', watchlist });
    }

    // Live updates
    if (path === '/api/stream' && method === 'GET') {
      const feed = createPriceFeed(generator, {
        intervalMs: config.streamIntervalMs,
        signals: [request.signal, shutdown.signal],
        logger: log,
      });
      return new Response(feed, {
        headers: {
          ...corsHeaders,
          'Content-Type': 'text/event-stream',
          'Cache-Control': 'no-cache',
          Connection: 'keep-alive',
        },
      });
    }

    const allowed = ALLOWED_METHODS[path];
    if (allowed) {
      return jsonResponse(
        { error: 'Method not allowed', kind: 'method_not_allowed', allow: allowed },
        405,
        { Allow: allowed.join(', ') }
      );
    }

    // 404 for unknown routes
    return jsonResponse({ error: 'Not found', kind: 'not_found', path }, 404);
  }

  return {
    async fetch(request: Request): Promise<Response> {
      // Handle CORS preflight
      if (request.method === 'OPTIONS') {
        return new Response(null, { status: 204, headers: corsHeaders });
      }

      try {
        log.debug({ method: request.method, url: request.url }, 'Request');
        return await route(request);
      } catch (error) {
        if (error instanceof ServiceError) {
          if (error.status >= 500) {
            log.error({ err: error }, 'Request failed');
          }
          const issues = error instanceof ValidationError && error.issues.length > 0
            ? { issues: error.issues }
            : {};
          return jsonResponse({ error: error.message, kind: error.kind, ...issues }, error.status);
        }
        log.error({ err: error }, 'Unhandled request error');
        return jsonResponse(
          { error: 'Internal server error', message: String(error) },
          500
        );
      }
    },

    close(): void {
      if (!shutdown.signal.aborted) {
        log.info('Closing live feeds');
        shutdown.abort();
      }
    },
  };
}

// =============================================================================
// Utilities
// =============================================================================

function bondsResponse(bonds: BondsResponse['bonds'], lastUpdated: string, source: string): BondsResponse {
  return {
    bonds,
    count: bonds.length,
    last_updated: lastUpdated,
    source,
  };
}

/**
 * Historical series as parallel arrays for charting
 */
function historicalResponse(isin: string, points: HistoricalPoint[]): HistoricalResponse {
  return {
    isin,
    dates: points.map((p) => p.date),
    yields: points.map((p) => p.yield_value),
    spreads: points.map((p) => p.spread),
    prices: points.map((p) => p.price),
  };
}

function integerParam(url: URL, name: string, fallback: number): number {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ValidationError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function userIdOf(request: Request): string {
  return request.headers.get('X-User-Id')?.trim() || DEFAULT_USER_ID;
}

async function readJson(request: Request): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

/**
 * Create a JSON response with CORS headers
 */
function jsonResponse(
  data: unknown,
  status: number = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: {
      ...corsHeaders,
      ...headers,
      'Content-Type': 'application/json',
    },
  });
}
