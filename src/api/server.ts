import express from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import type { MemoAgent } from '../agents/memo-agent.js';
import { parseHolding, type OverlayScanner } from '../engine/overlay-scanner.js';
import {
  assignmentProbability,
  calculateStrikesForProfiles,
  priceStrike,
} from '../engine/pricing.js';
import {
  performanceToRecord,
  positionStatusToRecord,
  probabilityResultToRecord,
  recommendationToRecord,
  scanResultToRecord,
  strikeResultToRecord,
  tradeToRecord,
  wheelToRecord,
} from '../engine/serialize.js';
import { PositionNotFoundError, TradeNotFoundError } from '../errors.js';
import type { SnapshotSource } from '../lib/market-snapshot.js';
import { runOverlayScan } from '../pipeline/overlay-scan.js';
import type { Scheduler } from '../scheduler.js';
import { STRIKE_PROFILES } from '../types/pricing.js';
import type { Opportunity, TradeRecord } from '../types/wheel.js';
import type { WheelManager } from '../wheel/manager.js';
import type { PositionMonitor } from '../wheel/monitor.js';
import { netPremium, type PerformanceTracker } from '../wheel/performance.js';
import type { WatchlistStore } from '../wheel/store.js';
import { asyncRoute, errorHandler, param, parseWith } from './http.js';

export interface ApiDeps {
  manager: WheelManager;
  monitor: PositionMonitor;
  performance: PerformanceTracker;
  watchlist: WatchlistStore;
  riskFreeRate: number;
  snapshots: SnapshotSource | null;
  scanner: OverlayScanner;
  memo: MemoAgent | null;
  scheduler: Scheduler | null;
}

// ── Request schemas ───────────────────────────────────────────────────────────

const optionTypeSchema = z.enum(['put', 'call']);
const positive = z.coerce.number().positive();

const createWheelSchema = z.object({
  symbol: z.string(),
  capital: z.number(),
  profile: z.string().default('conservative'),
});

const importSharesSchema = z.object({
  symbol: z.string(),
  shares: z.number(),
  costBasis: z.number(),
  profile: z.string().default('conservative'),
  capital: z.number().default(0),
});

const tradeSchema = z.object({
  direction: z.string(),
  strike: z.number(),
  expirationDate: z.string(),
  premium: z.number(),
  contracts: z.number().default(1),
});

const pricingBase = z.object({
  price: positive,
  volatility: positive,
  days: positive,
  type: optionTypeSchema,
  availableStrikes: z.array(z.number().positive()).optional(),
});

const strikeSchema = pricingBase.extend({ sigma: z.coerce.number() });
const probabilitySchema = pricingBase.extend({ strike: positive });

const overlaySchema = z.object({
  holdings: z.array(z.unknown()).min(1, 'At least one holding is required'),
  overrideEarningsCheck: z.boolean().default(false),
});

const listQuerySchema = z.object({
  symbol: z.string().optional(),
  unread: z.enum(['true', 'false']).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

const exportQuerySchema = z.object({
  symbol: z.string().optional(),
  format: z.enum(['csv', 'json']).default('csv'),
});

// ── Records ───────────────────────────────────────────────────────────────────

const tradeRecord = (t: TradeRecord) => tradeToRecord(t, netPremium(t));

const opportunityRecord = (o: Opportunity) => ({
  id: o.id,
  ...recommendationToRecord(o),
  is_read: o.isRead,
  scanned_at: o.scannedAt.toISOString(),
});

export function createApp(deps: ApiDeps): express.Express {
  const { manager, monitor, performance, watchlist } = deps;
  const app = express();
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  // ── Wheels ────────────────────────────────────────────────────────────────

  app.get('/api/wheels', asyncRoute(async (req, res) => {
    const wheels = await manager.listWheels(req.query['all'] !== 'true');
    res.json({ wheels: wheels.map(wheelToRecord) });
  }));

  app.post('/api/wheels', asyncRoute(async (req, res) => {
    const body = parseWith(createWheelSchema, req.body);
    const wheel = await manager.createWheel(body.symbol, body.capital, body.profile);
    res.status(201).json(wheelToRecord(wheel));
  }));

  app.post('/api/wheels/import', asyncRoute(async (req, res) => {
    const body = parseWith(importSharesSchema, req.body);
    const wheel = await manager.importShares(body.symbol, body.shares, body.costBasis, body.profile, body.capital);
    res.status(201).json(wheelToRecord(wheel));
  }));

  app.get('/api/wheels/:symbol', asyncRoute(async (req, res) => {
    const symbol = param(req, 'symbol');
    const wheel = await manager.getWheel(symbol);
    if (!wheel) throw new PositionNotFoundError(`No wheel found for ${symbol.toUpperCase()}`);
    const open = await manager.getOpenTrade(symbol);
    res.json({ ...wheelToRecord(wheel), open_trade: open ? tradeRecord(open) : null });
  }));

  app.patch('/api/wheels/:symbol/profile', asyncRoute(async (req, res) => {
    const { profile } = parseWith(z.object({ profile: z.string() }), req.body);
    res.json(wheelToRecord(await manager.updateProfile(param(req, 'symbol'), profile)));
  }));

  app.delete('/api/wheels/:symbol', asyncRoute(async (req, res) => {
    res.json(wheelToRecord(await manager.archiveWheel(param(req, 'symbol'))));
  }));

  // ── Trades ────────────────────────────────────────────────────────────────

  app.get('/api/wheels/:symbol/trades', asyncRoute(async (req, res) => {
    const trades = await manager.getTradeHistory(param(req, 'symbol'));
    res.json({ trades: trades.map(tradeRecord) });
  }));

  app.post('/api/wheels/:symbol/trades', asyncRoute(async (req, res) => {
    const trade = await manager.recordTrade(param(req, 'symbol'), parseWith(tradeSchema, req.body));
    res.status(201).json(tradeRecord(trade));
  }));

  app.post('/api/wheels/:symbol/expire', asyncRoute(async (req, res) => {
    const { priceAtExpiry } = parseWith(z.object({ priceAtExpiry: z.number() }), req.body);
    const symbol = param(req, 'symbol');
    const outcome = await manager.recordExpiration(symbol, priceAtExpiry);
    const wheel = await manager.getWheel(symbol);
    res.json({ outcome, wheel: wheel ? wheelToRecord(wheel) : null });
  }));

  app.post('/api/wheels/:symbol/close', asyncRoute(async (req, res) => {
    const { closePrice } = parseWith(z.object({ closePrice: z.number() }), req.body);
    res.json(tradeRecord(await manager.closeTradeEarly(param(req, 'symbol'), closePrice)));
  }));

  // ── Recommendations & monitoring ──────────────────────────────────────────

  app.get('/api/wheels/:symbol/recommendations', asyncRoute(async (req, res) => {
    const { limit } = parseWith(listQuerySchema, req.query);
    const outcome = await manager.getRecommendations(param(req, 'symbol'), limit);
    if (outcome.status === 'ok') {
      res.json({ status: 'ok', recommendations: outcome.recommendations.map(recommendationToRecord) });
    } else {
      res.json({ status: 'no_candidates', ...outcome.noCandidates });
    }
  }));

  app.get('/api/recommendations', asyncRoute(async (_req, res) => {
    const recs = await manager.getAllRecommendations();
    res.json({ recommendations: recs.map(recommendationToRecord) });
  }));

  app.get('/api/wheels/:symbol/status', asyncRoute(async (req, res) => {
    const symbol = param(req, 'symbol');
    const wheel = await manager.getWheel(symbol);
    if (!wheel) throw new PositionNotFoundError(`No wheel found for ${symbol.toUpperCase()}`);
    const trade = await manager.getOpenTrade(symbol);
    if (!trade) throw new TradeNotFoundError(`No open trade found for ${wheel.symbol}`);
    const status = await monitor.getPositionStatus(wheel, trade, req.query['refresh'] === 'true');
    res.json(positionStatusToRecord(status));
  }));

  app.get('/api/monitor', asyncRoute(async (req, res) => {
    const wheels = await manager.listWheels(true);
    const trades: TradeRecord[] = [];
    for (const wheel of wheels) {
      const open = await manager.getOpenTrade(wheel.symbol);
      if (open) trades.push(open);
    }
    const positions = await monitor.getAllPositionsStatus(wheels, trades, req.query['refresh'] === 'true');
    res.json({ positions: positions.map(p => positionStatusToRecord(p.status)) });
  }));

  // ── Performance & export ──────────────────────────────────────────────────

  app.get('/api/performance', asyncRoute(async (_req, res) => {
    res.json(performanceToRecord(await performance.getPortfolioPerformance()));
  }));

  app.get('/api/performance/:symbol', asyncRoute(async (req, res) => {
    res.json(performanceToRecord(await performance.getPerformance(param(req, 'symbol'))));
  }));

  app.get('/api/export', asyncRoute(async (req, res) => {
    const { symbol, format } = parseWith(exportQuerySchema, req.query);
    const body = await performance.exportTrades(symbol, format);
    res.type(format === 'json' ? 'application/json' : 'text/csv').send(body);
  }));

  // ── Pricing calculators ───────────────────────────────────────────────────

  app.post('/api/pricing/strike', (req, res, next) => {
    try {
      const b = parseWith(strikeSchema, req.body);
      const result = priceStrike(b.price, b.volatility, b.days, b.sigma, b.type, b.availableStrikes, deps.riskFreeRate);
      res.json({
        strike: strikeResultToRecord(result.strike),
        probability: probabilityResultToRecord(result.probability),
      });
    } catch (err) {
      next(err);
    }
  });

  app.post('/api/pricing/probability', (req, res, next) => {
    try {
      const b = parseWith(probabilitySchema, req.body);
      const result = assignmentProbability(b.strike, b.price, b.volatility, b.days, b.type, deps.riskFreeRate);
      res.json(probabilityResultToRecord(result));
    } catch (err) {
      next(err);
    }
  });

  app.post('/api/pricing/profiles', (req, res, next) => {
    try {
      const b = parseWith(pricingBase, req.body);
      const result = calculateStrikesForProfiles(
        b.price, b.volatility, b.days, b.type, b.availableStrikes, deps.riskFreeRate,
      );
      res.json({
        strikes: Object.fromEntries(STRIKE_PROFILES.map(p => [p, strikeResultToRecord(result.strikes[p])])),
        warnings: result.warnings,
        collapsed_profiles: result.collapsedProfiles,
        is_short_dte: result.isShortDte,
      });
    } catch (err) {
      next(err);
    }
  });

  // ── Covered-call overlay ──────────────────────────────────────────────────

  app.post('/api/overlay/scan', asyncRoute(async (req, res) => {
    const body = parseWith(overlaySchema, req.body);
    const holdings = body.holdings.map(parseHolding);
    if (!deps.snapshots) {
      res.status(503).json({ error: 'No market data client configured' });
      return;
    }
    const report = await runOverlayScan(
      holdings,
      { snapshots: deps.snapshots, scanner: deps.scanner, memo: deps.memo },
      { overrideEarningsCheck: body.overrideEarningsCheck },
    );
    res.json({
      results: report.results.map(scanResultToRecord),
      blotter: report.blotter,
      memos: report.memos,
    });
  }));

  // ── Watchlist & opportunities ─────────────────────────────────────────────

  app.get('/api/watchlist', asyncRoute(async (_req, res) => {
    const entries = await watchlist.listSymbols();
    res.json({ watchlist: entries.map(e => ({ ...e, createdAt: e.createdAt.toISOString() })) });
  }));

  app.post('/api/watchlist', asyncRoute(async (req, res) => {
    const body = parseWith(
      z.object({ symbol: z.string().trim().min(1).max(10).transform(s => s.toUpperCase()), notes: z.string().nullish() }),
      req.body,
    );
    const entry = await watchlist.addSymbol(body.symbol, body.notes ?? null);
    res.status(201).json({ ...entry, createdAt: entry.createdAt.toISOString() });
  }));

  app.delete('/api/watchlist/:symbol', asyncRoute(async (req, res) => {
    const symbol = param(req, 'symbol').toUpperCase();
    if (!(await watchlist.removeSymbol(symbol))) {
      throw new PositionNotFoundError(`${symbol} is not on the watchlist`);
    }
    res.json({ removed: symbol });
  }));

  app.get('/api/opportunities', asyncRoute(async (req, res) => {
    const q = parseWith(listQuerySchema, req.query);
    const list = await watchlist.listOpportunities({
      symbol: q.symbol?.toUpperCase(),
      unreadOnly: q.unread === 'true',
      limit: q.limit,
    });
    res.json({ opportunities: list.map(opportunityRecord) });
  }));

  app.post('/api/opportunities/:id/read', asyncRoute(async (req, res) => {
    const id = param(req, 'id');
    if (!(await watchlist.markOpportunityRead(id))) {
      res.status(404).json({ error: `Opportunity ${id} not found` });
      return;
    }
    res.json({ id, is_read: true });
  }));

  // ── Scheduler ─────────────────────────────────────────────────────────────

  app.post('/api/jobs/:job/run', asyncRoute(async (req, res) => {
    const job = parseWith(z.enum(['scan', 'refresh']), param(req, 'job'));
    if (!deps.scheduler) {
      res.status(503).json({ error: 'Scheduler not running' });
      return;
    }
    res.json(await deps.scheduler.trigger(job, 'MANUAL'));
  }));

  app.use(errorHandler);
  return app;
}

export function startServer(app: express.Express, port: number): Server {
  return app.listen(port, () => {
    console.log(`[API] Listening on http://localhost:${port}`);
  });
}

