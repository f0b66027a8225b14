import 'dotenv/config';
import { config } from './config.js';
import { runMigrations } from './db/migrate.js';
import { closePool } from './db/client.js';
import { pgWatchlistStore, pgWheelStore } from './db/pg-store.js';
import { MemoAgent, createChatClient } from './agents/memo-agent.js';
import { OverlayScanner } from './engine/overlay-scanner.js';
import { RecommendationEngine } from './engine/recommend.js';
import { AlpacaMarketData } from './lib/alpaca-api.js';
import { EarningsCalendar } from './lib/earnings-calendar.js';
import { FinnhubClient } from './lib/finnhub-api.js';
import { MarketSnapshotLoader } from './lib/market-snapshot.js';
import { OpportunityScanJob } from './pipeline/opportunity-scan.js';
import { PositionRefreshJob } from './pipeline/position-refresh.js';
import { Scheduler, pgRunRecorder } from './scheduler.js';
import { createApp, startServer } from './api/server.js';
import { BotCommands, createTelegramBot } from './telegram/bot.js';
import { TelegramNotifier } from './telegram/notifier.js';
import { WheelManager } from './wheel/manager.js';
import { PositionMonitor } from './wheel/monitor.js';
import { PerformanceTracker } from './wheel/performance.js';
import { PriceCache } from './wheel/price-cache.js';

async function main(): Promise<void> {
  console.log(`[Boot] wheel-desk starting (${config.NODE_ENV})`);

  // ── Database ────────────────────────────────────────────────────────────
  console.log('[Boot] Running database migrations...');
  await runMigrations();
  console.log('[Boot] Database ready');

  // ── Market data ─────────────────────────────────────────────────────────
  const finnhub = config.FINNHUB_API_KEY
    ? new FinnhubClient(config.FINNHUB_API_KEY, config.FINNHUB_BASE_URL)
    : null;
  const alpaca = config.ALPACA_API_KEY && config.ALPACA_SECRET_KEY
    ? new AlpacaMarketData({
        apiKey: config.ALPACA_API_KEY,
        secretKey: config.ALPACA_SECRET_KEY,
        baseUrl: config.ALPACA_BASE_URL,
        dataUrl: config.ALPACA_DATA_URL,
        earnings: finnhub,
      })
    : null;
  if (!alpaca) console.warn('[Boot] Alpaca keys missing: recommendations and scans are disabled');
  if (!finnhub) console.warn('[Boot] Finnhub key missing: no earnings calendar or fallback quotes');

  const prices = new PriceCache(alpaca, finnhub);
  const earnings = new EarningsCalendar(finnhub);
  const snapshots = alpaca
    ? new MarketSnapshotLoader(alpaca, prices, earnings, config.DEFAULT_VOLATILITY)
    : null;

  // ── Services ────────────────────────────────────────────────────────────
  const engine = new RecommendationEngine({ riskFreeRate: config.RISK_FREE_RATE, maxDte: config.MAX_DTE });
  const manager = new WheelManager(pgWheelStore, engine, snapshots);
  const monitor = new PositionMonitor(prices);
  const performance = new PerformanceTracker(pgWheelStore);
  const scanner = new OverlayScanner({ riskFreeRate: config.RISK_FREE_RATE });
  const memo = new MemoAgent(createChatClient(config.OPENAI_API_KEY), config.OPENAI_MODEL);
  const notifier = new TelegramNotifier(config.TELEGRAM_BOT_TOKEN, config.TELEGRAM_CHAT_ID);

  // ── Scheduler ───────────────────────────────────────────────────────────
  let scheduler: Scheduler | null = null;
  if (snapshots) {
    scheduler = new Scheduler(
      {
        scan: new OpportunityScanJob(pgWatchlistStore, snapshots, engine, notifier, config.SCAN_PROFILES),
        refresh: new PositionRefreshJob(pgWheelStore, monitor, notifier),
      },
      pgRunRecorder,
      notifier,
    );
    scheduler.start({ scanCron: config.SCAN_CRON, refreshCron: config.REFRESH_CRON });
  }

  // ── HTTP API ────────────────────────────────────────────────────────────
  const server = startServer(createApp({
    manager,
    monitor,
    performance,
    watchlist: pgWatchlistStore,
    riskFreeRate: config.RISK_FREE_RATE,
    snapshots,
    scanner,
    memo,
    scheduler,
  }), config.PORT);

  // ── Telegram Bot ────────────────────────────────────────────────────────
  // bot.launch() with long polling never resolves, so it is not awaited
  const bot = config.TELEGRAM_BOT_TOKEN
    ? createTelegramBot(config.TELEGRAM_BOT_TOKEN, new BotCommands(manager, monitor, performance))
    : null;
  if (bot) {
    bot.launch().catch(err => console.error('[Bot] Launch error:', err));
    console.log('[Boot] Telegram bot launched');
  }

  await notifier.send(`🛞 <b>Wheel Desk started</b>\n${new Date().toUTCString()}`);
  console.log(`[Boot] All systems up. API: http://localhost:${config.PORT}`);

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Boot] ${signal} received, shutting down`);
    scheduler?.stop();
    bot?.stop(signal);
    server.close();
    await closePool();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
