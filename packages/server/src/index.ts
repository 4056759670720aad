import express from 'express';
import { createServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { ClientMessage, CreateRunRequest, ServerMessage } from '@aep-sim/shared';
import { DEFAULT_MAX_RUNS, RunManager } from './runs/RunManager.js';
import { ScenarioLoader } from './data/ScenarioLoader.js';
import { InvalidConfigurationError, InvariantViolationError } from './engine/errors.js';

const PORT = parseInt(process.env.PORT ?? '3001', 10);
const MAX_RUNS = parseInt(process.env.MAX_RUNS ?? String(DEFAULT_MAX_RUNS), 10);

// ─── Express app ───────────────────────────────────────────────────────────
const app = express();
app.use(express.json());

const scenarioLoader = new ScenarioLoader();
const runManager = new RunManager(scenarioLoader, MAX_RUNS);

// Health check
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' });
});

// REST: List scenario presets
app.get('/api/scenarios', (_req, res) => {
  res.json({ scenarios: scenarioLoader.list() });
});

// REST: Run a simulation to completion
app.post('/api/runs', (req, res) => {
  try {
    const request = (req.body ?? {}) as CreateRunRequest;
    const summary = runManager.createRun(request);
    res.status(201).json(summary);
  } catch (e) {
    if (e instanceof InvalidConfigurationError) {
      res.status(400).json({ error: e.message, issues: e.issues });
      return;
    }
    if (e instanceof InvariantViolationError) {
      console.error(`[Server] ${e.message}`);
      res.status(500).json({ error: e.message, problems: e.problems });
      return;
    }
    res.status(500).json({ error: String(e) });
  }
});

// REST: List finished runs
app.get('/api/runs', (_req, res) => {
  res.json({ runs: runManager.listSummaries() });
});

// REST: Get run summary
app.get('/api/runs/:id', (req, res) => {
  const summary = runManager.getSummary(req.params.id);
  if (!summary) {
    res.status(404).json({ error: 'Run not found' });
    return;
  }
  res.json(summary);
});

// REST: Drop a finished run
app.delete('/api/runs/:id', (req, res) => {
  if (!runManager.removeRun(req.params.id)) {
    res.status(404).json({ error: 'Run not found' });
    return;
  }
  res.status(204).end();
});

// REST: Get one aircraft's record and trajectory
app.get('/api/runs/:id/aircraft/:aircraftId', (req, res) => {
  const aircraftId = parseInt(req.params.aircraftId, 10);
  if (!Number.isInteger(aircraftId)) {
    res.status(400).json({ error: 'aircraftId must be an integer' });
    return;
  }
  const record = runManager.getAircraft(req.params.id, aircraftId);
  if (!record) {
    res.status(404).json({ error: 'Aircraft not found' });
    return;
  }
  res.json(record);
});

// ─── HTTP server ───────────────────────────────────────────────────────────
const server = createServer(app);

// ─── WebSocket replay ──────────────────────────────────────────────────────
const wss = new WebSocketServer({ server });

wss.on('connection', (ws: WebSocket) => {
  console.log('[WS] Client connected');

  ws.on('message', (data: Buffer) => {
    let msg: ClientMessage;
    try {
      msg = JSON.parse(data.toString()) as ClientMessage;
    } catch {
      sendMessage(ws, { type: 'error', message: 'Invalid JSON' });
      return;
    }

    handleClientMessage(ws, msg);
  });

  ws.on('close', () => {
    console.log('[WS] Client disconnected');
  });

  ws.on('error', (err) => {
    console.error('[WS] Error:', err.message);
  });
});

function handleClientMessage(ws: WebSocket, msg: ClientMessage): void {
  switch (msg.type) {
    case 'replay': {
      const frames = runManager.getReplayFrames(msg.runId, msg.fromMinute, msg.toMinute);
      if (!frames) {
        sendMessage(ws, { type: 'error', message: 'Run not found', code: 'NOT_FOUND' });
        return;
      }
      for (const frame of frames) {
        sendMessage(ws, { type: 'frame', runId: msg.runId, frame });
      }
      sendMessage(ws, { type: 'replayEnd', runId: msg.runId, frames: frames.length });
      break;
    }

    default:
      sendMessage(ws, { type: 'error', message: 'Unknown message type' });
  }
}

function sendMessage(ws: WebSocket, msg: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}

// ─── Start server ──────────────────────────────────────────────────────────
server.listen(PORT, () => {
  console.log(`[Server] AEP arrival simulation server running on port ${PORT}`);
  console.log(`[Server] REST: http://localhost:${PORT}/api/runs`);
  console.log(`[Server] WebSocket replay: ws://localhost:${PORT}`);
});
