import type { WatchlistStore, WheelStore } from '../wheel/store.js';
import { withTransaction } from './client.js';
import * as opportunities from './repositories/opportunities.js';
import * as trades from './repositories/trades.js';
import * as watchlist from './repositories/watchlist.js';
import * as wheels from './repositories/wheels.js';

/** WheelStore over the `wheel` schema. */
export const pgWheelStore: WheelStore = {
  createWheel: wheels.insertWheel,
  getWheel: wheels.getActiveWheel,
  listWheels: wheels.listWheels,
  updateWheel: wheels.updateWheel,
  openTrade: (input, wheel) => withTransaction(async client => {
    const trade = await trades.insertTrade(input, client);
    await wheels.updateWheel(wheel, client);
    return trade;
  }),
  settleTrade: (trade, wheel) => withTransaction(async client => {
    const settled = await trades.updateTrade(trade, client);
    await wheels.updateWheel(wheel, client);
    return settled;
  }),
  getOpenTrade: trades.getOpenTrade,
  listTrades: trades.listTrades,
  saveSnapshot: trades.upsertSnapshot,
};

export const pgWatchlistStore: WatchlistStore = {
  addSymbol: (symbol, notes) => watchlist.addWatchlistSymbol(symbol, notes ?? null),
  removeSymbol: watchlist.removeWatchlistSymbol,
  listSymbols: watchlist.listWatchlist,
  saveOpportunities: opportunities.replaceOpportunities,
  listOpportunities: opportunities.listOpportunities,
  markOpportunityRead: opportunities.markOpportunityRead,
  clearOpportunities: opportunities.deleteOpportunities,
};
