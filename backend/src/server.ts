/**
 * Peerline Node Server
 * One LAN peer plus its local control API and UI bridge
 */

import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import http from 'http';
import { loadConfig } from './config';
import { PeerNode } from './peerNode';
import { createApiRouter } from './api';
import { UiBridge } from './uiBridge';
import { describeError } from './errors';

const config = loadConfig();
const node = new PeerNode({ config });

// Create Express app
const app = express();

// The control surface is meant for local UIs on any origin
app.use(cors({
  origin: '*',
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
}));

app.use(express.json({ limit: '128kb' }));

// Mount API
app.use('/api', createApiRouter(node));

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'Peerline Node',
    version: '1.0.0',
    userId: node.userId,
    endpoints: {
      api: '/api',
      ws: `ws://localhost:${config.controlPort}`,
    },
  });
});

// Create HTTP server
const server = http.createServer(app);

// Create WebSocket server
const wss = new WebSocketServer({ server });
const bridge = new UiBridge(node);
bridge.initialize(wss);

async function main(): Promise<void> {
  await node.start();

  server.listen(config.controlPort, () => {
    const { unicast } = node.status();
    console.log('════════════════════════════════════════');
    console.log('PEERLINE NODE STARTED');
    console.log(`   User:      ${node.userId}`);
    console.log('────────────────────────────────────────');
    console.log(`   Discovery: udp/${config.discoveryPort} → ${config.broadcastAddress}`);
    console.log(`   Unicast:   udp/${unicast.port}`);
    console.log(`   API:       http://localhost:${config.controlPort}/api`);
    console.log(`   WS:        ws://localhost:${config.controlPort}`);
    console.log(`   Tokens:    ${config.tokenVerification ? 'verified' : 'not verified'}`);
    console.log('════════════════════════════════════════');
  });
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, shutting down`);

  bridge.shutdown();
  wss.close();
  server.close();
  await node.stop();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(e => {
      console.error('[Server] Shutdown failed:', describeError(e));
      process.exit(1);
    });
  });
}

main().catch(e => {
  console.error('[Server] Failed to start:', describeError(e));
  process.exit(1);
});
