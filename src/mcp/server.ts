import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { dbPath, type Config } from '../config.js';
import { GeneStore } from '../storage/store.js';
import { registerTools } from './tools.js';
import { logger } from '../utils/logger.js';

export const SERVER_NAME = 'genekb';
export const SERVER_VERSION = '0.1.0';
const STATS_URI = 'genekb://stats';

export interface GeneKbMCPServer {
  server: McpServer;
  start(): Promise<void>;
  close(): Promise<void>;
}

/** Build the MCP server over an open store. The store is not closed by `close()`. */
export function buildMCPServer(store: GeneStore, config: Pick<Config, 'query'>): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    },
  );

  registerTools(server, store, {
    defaultDepth: config.query.default_depth,
    maxDepth: config.query.max_depth,
  });

  server.registerResource(
    'stats',
    STATS_URI,
    {
      description: 'Row counts of the gene knowledge base tables',
      mimeType: 'application/json',
    },
    async () => ({
      contents: [
        {
          uri: STATS_URI,
          text: JSON.stringify(store.getCounts(), null, 2),
        },
      ],
    }),
  );

  return server;
}

export function createMCPServer(config: Config): GeneKbMCPServer {
  // Queries never write; read-only lets several servers share one file
  const store = new GeneStore({ path: dbPath(config), readonly: true }).open();
  const server = buildMCPServer(store, config);

  const close = async (): Promise<void> => {
    await server.close();
    store.close();
  };

  return {
    server,
    close,
    start: async () => {
      const transport = new StdioServerTransport();
      await server.connect(transport);
      logger.info(`MCP server running on stdio (${store.path})`);

      process.once('SIGINT', () => {
        close()
          .catch(err => logger.error(`Shutdown failed: ${err}`))
          .finally(() => process.exit(0));
      });
    },
  };
}
