#!/usr/bin/env node
import process from 'node:process';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { playwrightSessionOpener, trackSessions } from './api/PlaywrightBrowserSession.js';
import { getBrowserLaunchSettings } from './config.js';
import { createExpressionServer } from './ExpressionServer.js';

// Tool calls each own a headless browser; the tracker closes any still
// running when the client goes away.
const sessions = trackSessions(playwrightSessionOpener({ ...getBrowserLaunchSettings(true), headless: true }));
const server = createExpressionServer({ openSession: sessions.open });

async function stop(exitCode: number): Promise<never> {
  await sessions.closeAll();
  try {
    await server.close();
  }
  catch (error) {
    console.error('[MCP Shutdown Error]', error);
  }
  process.exit(exitCode);
}

try {
  await server.connect(new StdioServerTransport());
  console.error('RiceXPro expression MCP server running on stdio');
}
catch (error) {
  console.error('[MCP Server Error]', error);
  await stop(1);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.error(`[RiceXPro] ${signal} received, closing ${sessions.openCount()} browser session(s)`);
    void stop(0);
  });
}
