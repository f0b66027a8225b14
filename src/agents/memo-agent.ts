import OpenAI from 'openai';
import { errorMessage } from '../errors.js';
import type { CandidateStrike, MemoPayload } from '../types/scanner.js';
import { loadSkillTemplate } from '../utils/skill-loader.js';

export const MEMO_MAX_WORDS = 150;

export interface DecisionMemo {
  symbol: string;
  text: string;
  source: 'llm' | 'template';
  model: string | null;
}

/** Minimal slice of the OpenAI client the memo writer calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        max_tokens: number;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export function createChatClient(apiKey: string | undefined): ChatClient | null {
  return apiKey ? new OpenAI({ apiKey }) : null;
}

/** Deterministic memo used when no model is configured or the call fails. */
export function templateMemo(payload: MemoPayload, candidate: CandidateStrike): string {
  const lines = [
    `ACTION: SELL TO OPEN ${candidate.contractsToSell}x ${payload.symbol} ${candidate.expirationDate} ` +
      `$${candidate.strike.toFixed(2)} CALL, limit $${candidate.midPrice.toFixed(2)}`,
    `RATIONALE: ${payload.symbol} at $${payload.currentPrice.toFixed(2)}; net credit ` +
      `$${candidate.totalNetCredit.toFixed(2)} (${candidate.annualizedYieldPct.toFixed(1)}% annualized) ` +
      `at delta ${candidate.delta.toFixed(2)}, ${candidate.daysToExpiry} days to expiry.`,
    `RISKS: ~${(candidate.pItm * 100).toFixed(0)}% chance of assignment. ` +
      `Earnings ${payload.earningsStatus}. Dividend ${payload.dividendStatus}.`,
  ];
  if (payload.accountType === 'taxable') {
    lines.push('TAX: taxable account; assignment realizes a gain or loss on the called shares.');
  }
  return lines.join('\n');
}

export class MemoAgent {
  private readonly systemPrompt: string;

  constructor(
    private readonly client: ChatClient | null,
    private readonly model: string,
    systemPrompt?: string,
  ) {
    this.systemPrompt = systemPrompt ?? loadSkillTemplate('trade-memo', { max_words: String(MEMO_MAX_WORDS) });
  }

  async write(payload: MemoPayload, candidate: CandidateStrike): Promise<DecisionMemo> {
    const fallback = (): DecisionMemo => ({
      symbol: payload.symbol,
      text: templateMemo(payload, candidate),
      source: 'template',
      model: null,
    });
    if (!this.client) return fallback();

    try {
      const msg = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: 400,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: JSON.stringify(payload, null, 2) },
        ],
      });
      const text = msg.choices[0]?.message.content?.trim();
      if (!text) {
        console.warn(`[MemoAgent] Empty completion for ${payload.symbol}, using template`);
        return fallback();
      }
      return { symbol: payload.symbol, text, source: 'llm', model: this.model };
    } catch (err) {
      console.error(`[MemoAgent] OpenAI error for ${payload.symbol}: ${errorMessage(err)}`);
      return fallback();
    }
  }
}
