import { Telegraf } from 'telegraf';
import { errorMessage } from '../errors.js';
import type { TradeRecord } from '../types/wheel.js';
import type { WheelManager } from '../wheel/manager.js';
import type { PositionMonitor } from '../wheel/monitor.js';
import type { PerformanceTracker } from '../wheel/performance.js';
import { escapeHtml, formatPositionLine, formatRecommendation } from './notifier.js';

export const HELP_TEXT =
  `🛞 <b>Wheel Desk</b>\n\n` +
  `Commands:\n` +
  `  /status: open positions with moneyness and risk\n` +
  `  /wheels: every active wheel and its state\n` +
  `  /recommend <code>SYMBOL</code>: next contract to sell\n` +
  `  /perf [<code>SYMBOL</code>]: premium, win rate and yield\n` +
  `  /help: this message`;

const SYMBOL_RE = /^[A-Z]{1,10}$/;

/** Parse "/recommend aapl" → "AAPL"; null when the argument is missing or malformed. */
export function parseSymbolArg(text: string): string | null {
  const arg = text.trim().split(/\s+/)[1]?.toUpperCase();
  return arg && SYMBOL_RE.test(arg) ? arg : null;
}

/** Reply bodies for each command, kept apart from Telegraf so they can be exercised directly. */
export class BotCommands {
  constructor(
    private readonly manager: WheelManager,
    private readonly monitor: PositionMonitor,
    private readonly performance: PerformanceTracker,
  ) {}

  async status(): Promise<string> {
    const wheels = await this.manager.listWheels(true);
    const trades: TradeRecord[] = [];
    for (const wheel of wheels) {
      const open = await this.manager.getOpenTrade(wheel.symbol);
      if (open) trades.push(open);
    }
    const positions = await this.monitor.getAllPositionsStatus(wheels, trades);
    if (positions.length === 0) return `✅ No open positions (${wheels.length} active wheel(s))`;
    return `<b>Open positions (${positions.length})</b>\n\n${positions.map(formatPositionLine).join('\n')}`;
  }

  async wheels(): Promise<string> {
    const wheels = await this.manager.listWheels(true);
    if (wheels.length === 0) return 'No active wheels.';
    const lines = wheels.map(w => {
      const holding = w.sharesHeld > 0
        ? ` | ${w.sharesHeld} sh @ $${(w.costBasis ?? 0).toFixed(2)}`
        : '';
      return `<b>${w.symbol}</b> ${w.state} | ${w.profile} | $${w.capitalAllocated.toFixed(2)}${holding}`;
    });
    return `<b>Active wheels (${wheels.length})</b>\n\n${lines.join('\n')}`;
  }

  async recommend(symbol: string): Promise<string> {
    const outcome = await this.manager.getRecommendations(symbol, 3);
    if (outcome.status === 'no_candidates') return `🤷 ${escapeHtml(outcome.noCandidates.message)}`;
    return outcome.recommendations.map(formatRecommendation).join('\n\n');
  }

  async perf(symbol: string | null): Promise<string> {
    const p = symbol
      ? await this.performance.getPerformance(symbol)
      : await this.performance.getPortfolioPerformance();
    return (
      `📈 <b>${p.symbol} performance</b>\n` +
      `Premium: $${p.totalPremium.toFixed(2)} | Realized: $${p.realizedPnl.toFixed(2)}\n` +
      `Trades: ${p.totalTrades} (${p.openTrades} open) | Win rate: ${p.winRatePct.toFixed(1)}%\n` +
      `Assigned: ${p.assignmentEvents} | Called away: ${p.calledAwayEvents} | Closed early: ${p.closedEarlyCount}\n` +
      `Annualized yield: ${p.annualizedYieldPct.toFixed(1)}%`
    );
  }
}

export function createTelegramBot(token: string, commands: BotCommands): Telegraf {
  const bot = new Telegraf(token);

  bot.start(ctx => ctx.reply(HELP_TEXT, { parse_mode: 'HTML' }));
  bot.help(ctx => ctx.reply(HELP_TEXT, { parse_mode: 'HTML' }));

  bot.command('status', async ctx => {
    await ctx.reply(await commands.status(), { parse_mode: 'HTML' });
  });

  bot.command('wheels', async ctx => {
    await ctx.reply(await commands.wheels(), { parse_mode: 'HTML' });
  });

  bot.command('recommend', async ctx => {
    const symbol = parseSymbolArg(ctx.message.text);
    if (!symbol) {
      await ctx.reply('Usage: /recommend <code>SYMBOL</code>', { parse_mode: 'HTML' });
      return;
    }
    await ctx.reply(`🔍 Pricing ${symbol}...`);
    try {
      await ctx.reply(await commands.recommend(symbol), { parse_mode: 'HTML' });
    } catch (err) {
      await ctx.reply(`❌ ${errorMessage(err)}`);
    }
  });

  bot.command('perf', async ctx => {
    await ctx.reply(await commands.perf(parseSymbolArg(ctx.message.text)), { parse_mode: 'HTML' });
  });

  bot.catch((err, ctx) => {
    console.error(`[Bot] Error handling update ${ctx.update.update_id}:`, errorMessage(err));
  });

  return bot;
}
