import express from 'express';
import cors from 'cors';
import http from 'node:http';
import { Server } from 'socket.io';
import type { ClientToServerEvents, ServerToClientEvents } from '../../src/online/types.js';
import { BattleArchive } from './battles.js';
import { handleBatchRequest, handleWatchRequest, socketSink, statusFor } from './handlers.js';
import { ServerEnvSchema, safeParse } from './protocol.js';

const env = safeParse(ServerEnvSchema, process.env);
const CORS_ORIGIN = env.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean);

const app = express();
app.use(express.json());
app.use(
  cors({
    origin: CORS_ORIGIN.length ? CORS_ORIGIN : true,
    credentials: true,
  })
);

const archive = new BattleArchive(1000 * 60 * 60); // 1h TTL
setInterval(() => archive.cleanup(), 60_000).unref();

app.get('/health', (_req, res) => {
  res.json({ ok: true, now: Date.now() });
});

app.get('/battles', (_req, res) => {
  res.json({ batches: archive.listPublic() });
});

app.get('/battles/:id', (req, res) => {
  const record = archive.get(req.params.id);
  if (!record) {
    res.status(404).json({ error: 'Batch not found' });
    return;
  }
  res.json({ batch: record });
});

app.post('/battles', (req, res) => {
  try {
    const record = handleBatchRequest(archive, req.body);
    console.log(`[server] batch ${record.id}: ${record.stats.battles} battles`);
    res.status(201).json({ batch: record });
  } catch (e) {
    const status = statusFor(e);
    if (status === 500) {
      console.error('[server] batch failed', e);
    }
    res.status(status).json({ error: e instanceof Error ? e.message : String(e) });
  }
});

const server = http.createServer(app);
const io = new Server<ClientToServerEvents, ServerToClientEvents>(server, {
  cors: {
    origin: CORS_ORIGIN.length ? CORS_ORIGIN : true,
    credentials: true,
  },
});

io.on('connection', (socket) => {
  socket.on('watch', (payload) => {
    try {
      const summary = handleWatchRequest(payload, socketSink(socket));
      console.log(`[server] ${socket.id} watched a battle: ${summary.moves} moves`);
    } catch (e) {
      if (statusFor(e) === 500) {
        console.error('[server] watch failed', e);
      }
      socket.emit('error_msg', { message: e instanceof Error ? e.message : String(e) });
    }
  });
});

server.listen(env.PORT, () => {
  console.log(`[server] listening on :${env.PORT}`);
  if (CORS_ORIGIN.length) {
    console.log(`[server] cors origins: ${CORS_ORIGIN.join(', ')}`);
  }
});
