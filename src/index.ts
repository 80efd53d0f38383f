#!/usr/bin/env node

/**
 * Indicator Analysis MCP Server
 *
 * Exposes the analysis engine over stdio. Indicator data is passed inline
 * in tool arguments; thresholds come from indicators.config.json and may be
 * overridden per call.
 *
 * Tools:
 *   Analysis: analyze_indicators, summarize_indicators
 *   Info:     get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadAnalysisConfig } from './config/analysis-config.js';
import {
  TOOL_DEFINITIONS,
  handleAnalyzeIndicators,
  handleSummarizeIndicators,
  handleGetCapabilities,
} from './mcp/tools.js';

const SERVER_INSTRUCTIONS = `This server analyzes management indicators: periodic measurements (monthly, quarterly, ...) with satisfactory and critical thresholds.

Use these tools when the user asks about:
- How indicators are performing, their trend, status or anomalies → analyze_indicators
- An overview or count of indicators by status → summarize_indicators
- Which thresholds are in effect → get_capabilities`;

const server = new Server(
  { name: 'indicators', version: '1.0.0' },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: TOOL_DEFINITIONS };
});

// ─── Tool Handlers ───────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, (request) => {
  const { name, arguments: args } = request.params;

  try {
    // Re-read per call so config edits apply without a restart
    const config = loadAnalysisConfig();

    switch (name) {
      case 'analyze_indicators':
        return handleAnalyzeIndicators(args, config);
      case 'summarize_indicators':
        return handleSummarizeIndicators(args, config);
      case 'get_capabilities':
        return handleGetCapabilities(config);
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Start ──────────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[indicators] MCP server v1.0.0 started');
}

main().catch((error) => {
  console.error('[indicators] Fatal error:', error);
  process.exit(1);
});
