/**
 * Receipt Keeper entry point
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createReceiptKeeper, loadConfig } from './mastra/index.js';
import { createServerApp } from './server.js';

const config = loadConfig();
const keeper = createReceiptKeeper(config);

await keeper.ensureInitialized();

const app = createServerApp({
  gateway: keeper.gateway,
  blobs: keeper.blobs,
  sessions: keeper.sessions,
  ensureInitialized: keeper.ensureInitialized,
});

console.log(`
╔═══════════════════════════════════════════════════════╗
║         Receipt Keeper - Receipt Chat Agent           ║
╠═══════════════════════════════════════════════════════╣
║  Routes:                                              ║
║    POST /chat/:sessionId  Chat turn                   ║
║    GET  /uploads/*        Receipt images              ║
║    GET  /health           Health check                ║
╚═══════════════════════════════════════════════════════╝
`);

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    console.log(`✓ Server running on http://localhost:${info.port}`);
  }
);
