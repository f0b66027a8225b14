import { errorMessage } from '../errors.js';
import type { WheelRecommendation } from '../types/wheel.js';
import type { MonitoredPosition } from '../wheel/monitor.js';

const TELEGRAM_BASE = 'https://api.telegram.org';

export interface Notifier {
  send(text: string): Promise<void>;
}

/**
 * Sends HTML messages to one chat. Without a token or chat id every send is a
 * logged no-op, and delivery failures are logged rather than thrown.
 */
export class TelegramNotifier implements Notifier {
  constructor(
    private readonly token: string | undefined,
    private readonly chatId: string | undefined,
  ) {}

  get enabled(): boolean {
    return Boolean(this.token && this.chatId);
  }

  async send(text: string): Promise<void> {
    if (!this.token || !this.chatId) {
      console.log('[Telegram] Not configured, dropping message');
      return;
    }

    try {
      const res = await fetch(`${TELEGRAM_BASE}/bot${this.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
      });

      if (!res.ok) {
        console.error('[Telegram] Send error:', await res.text());
      }
    } catch (err) {
      console.error('[Telegram] Network error:', errorMessage(err));
    }
  }
}

// ── Message formatting ─────────────────────────────────────────────────────────

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

const money = (n: number): string => `$${n.toFixed(2)}`;

const RISK_EMOJI = { LOW: '🟢', MEDIUM: '🟡', HIGH: '🔴' } as const;

export function formatRiskAlert({ position, trade, status }: MonitoredPosition): string {
  const side = trade.direction === 'put' ? 'PUT' : 'CALL';
  return (
    `${RISK_EMOJI[status.riskLevel]} <b>${position.symbol} ${side} ${money(trade.strike)} is ${status.riskLevel} risk</b>\n` +
    `Price: ${money(status.currentPrice)} | ${escapeHtml(status.moneynessLabel)}\n` +
    `Expires ${trade.expirationDate} (${status.dteCalendar}d, ${status.dteTrading} trading)\n` +
    `Premium collected: ${money(trade.totalPremium)}`
  );
}

export function formatPositionLine({ position, trade, status }: MonitoredPosition): string {
  return (
    `${RISK_EMOJI[status.riskLevel]} <b>${position.symbol}</b> ${trade.direction.toUpperCase()} ` +
    `${money(trade.strike)} exp ${trade.expirationDate} | ${money(status.currentPrice)} | ` +
    `${escapeHtml(status.moneynessLabel)} | ${status.dteCalendar}d`
  );
}

export function formatRecommendation(r: WheelRecommendation): string {
  const lines = [
    `<b>${r.symbol}</b> sell ${r.contracts}x ${r.direction.toUpperCase()} ${money(r.strike)} exp ${r.expirationDate} (${r.dte}d)`,
    `Premium ${money(r.premiumPerShare)}/sh = ${money(r.totalPremium)} | ` +
      `${r.sigmaDistance.toFixed(2)}σ | P(ITM) ${(r.pItm * 100).toFixed(1)}% | ` +
      `${r.annualizedYieldPct.toFixed(1)}% ann. | bias ${r.biasScore.toFixed(3)}`,
  ];
  for (const w of r.warnings) lines.push(`⚠️ ${escapeHtml(w)}`);
  return lines.join('\n');
}

export function formatOpportunityDigest(recs: readonly WheelRecommendation[], limit = 5): string {
  if (recs.length === 0) return '🔎 <b>Opportunity scan</b>\nNo qualifying contracts.';
  const top = recs.slice(0, limit).map(formatRecommendation);
  return `🔎 <b>Opportunity scan</b> (${recs.length} found, top ${top.length})\n\n${top.join('\n\n')}`;
}

export function formatJobFailure(job: string, error: string): string {
  return `⚠️ <b>Alert</b>\nScheduled ${job} failed: ${escapeHtml(error)}`;
}
