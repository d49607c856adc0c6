import type { ImageSource, SessionOpener } from './types/types.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ImageFetcher } from './api/ImageFetcher.js';
import { playwrightSessionOpener } from './api/PlaywrightBrowserSession.js';
import { getBrowserLaunchSettings } from './config.js';
import { GetExpressionProfileTool } from './tools/GetExpressionProfileTool.js';

export interface ExpressionServerOptions {
  openSession?: SessionOpener;
  images?: ImageSource;
}

export function createExpressionServer({
  openSession = playwrightSessionOpener({ ...getBrowserLaunchSettings(true), headless: true }),
  images = new ImageFetcher(),
}: ExpressionServerOptions = {}): McpServer {
  const server = new McpServer(
    {
      name: 'rice-expression-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const getExpressionProfile = new GetExpressionProfileTool(openSession, images);

  setupErrorHandling(server);
  setupTools(server, getExpressionProfile);

  return server;
}

function setupTools(
  server: McpServer,
  getExpressionProfile: GetExpressionProfileTool,
): void {
  server.registerTool(
    getExpressionProfile.name,
    {
      description: getExpressionProfile.description,
      inputSchema: getExpressionProfile.inputSchema.shape,
    },
    getExpressionProfile.execute.bind(getExpressionProfile),
  );
}

function setupErrorHandling(server: McpServer): void {
  server.server.onerror = (error) => {
    console.error('[MCP Error]', error);
  };
}
