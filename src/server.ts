import 'dotenv/config';
import http from 'http';
import { buildServer } from './app';
import { PORT } from './config';
import { createDefaultContext } from './context';
import { closePool, ensureSchema, getPool } from './db';

const db = getPool();

let server: http.Server | undefined;
let shuttingDown = false;

async function start() {
  try {
    await ensureSchema(db);
  } catch (e) {
    console.error('Failed ensuring DB schema', e);
    process.exit(1);
  }

  const app = buildServer(createDefaultContext(db));
  server = app.listen(PORT, () => {
    console.log(`Cutline server listening on http://localhost:${PORT}`);
  });

  server.on('error', (err) => {
    console.error('Server error', err);
  });
}

start().catch((err) => {
  console.error('Failed to start server', err);
  process.exit(1);
});

process.once('SIGINT', () => { gracefulStop('SIGINT').catch((err) => console.error('Shutdown failed', err)); });
process.once('SIGTERM', () => { gracefulStop('SIGTERM').catch((err) => console.error('Shutdown failed', err)); });

async function gracefulStop(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`Received ${signal}, shutting down`);
  // Renders in flight are not cancelled; closing the server waits for their responses.
  const current = server;
  if (current) {
    await new Promise<void>((resolve) => current.close(() => resolve()));
  }
  await closePool();
  process.exit(0);
}
