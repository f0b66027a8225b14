#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  assignmentProbabilityShape,
  assignmentProbabilityTool,
  expiryOutcomeShape,
  expiryOutcomeTool,
  nextStateShape,
  nextStateTool,
  profileStrikesShape,
  profileStrikesTool,
  strikeAtSigmaShape,
  strikeAtSigmaTool,
} from './tools.js';

const server = new McpServer({ name: 'mcp-wheel', version: '0.1.0' });

// ── Pricing ───────────────────────────────────────────────────────────────────
server.tool(
  'strike_at_sigma',
  'Strike N standard deviations out of the money, snapped to a tradeable increment, with its assignment probability',
  strikeAtSigmaShape,
  strikeAtSigmaTool,
);

server.tool(
  'assignment_probability',
  'Black-Scholes probability that an option finishes in the money, with d1, d2 and delta',
  assignmentProbabilityShape,
  assignmentProbabilityTool,
);

server.tool(
  'profile_strikes',
  'One strike per risk profile (aggressive, moderate, conservative, defensive)',
  profileStrikesShape,
  profileStrikesTool,
);

// ── State machine ─────────────────────────────────────────────────────────────
server.tool(
  'next_state',
  'Apply an action to a wheel state; errors list the valid actions',
  nextStateShape,
  nextStateTool,
);

server.tool(
  'expiry_outcome',
  'Settle an option at expiration: assigned / called away / expired worthless, and the resulting holdings',
  expiryOutcomeShape,
  expiryOutcomeTool,
);

const transport = new StdioServerTransport();
await server.connect(transport);
