// Streaming VAD - WebSocket Handler and Express Server
//
// Each WebSocket connection owns one VadIterator. Clients stream raw 16-bit
// LE PCM as binary frames and receive speech lifecycle events as JSON; a
// finished episode's audio follows its speech_end message as one binary frame.
//
// Audio stays in memory only; nothing is written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket } from "ws";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import { EnergySpeechClassifier, type SpeechClassifier } from "./speech-classifier.js";
import type { ClientMessage, ServerMessage, VadConfig, VadEvent } from "./types.js";
import { DEFAULT_VAD_CONFIG } from "./vad-config.js";
import { VadIterator } from "./vad-iterator.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Expected audio format for the handshake (sample rate comes from the VAD config) */
const EXPECTED_FORMAT = {
  channels: 1 as const,
  encoding: "LINEAR16" as const,
};

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  iterator: VadIterator;
  audioFormatValidated: boolean;
  frameTelemetry: boolean;
  /** Tail of the per-connection work chain; audio and control messages run in arrival order. */
  queue: Promise<void>;
  closed: boolean;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Segmentation parameters for every connection. Defaults to the v5 preset. */
  vadConfig?: VadConfig;
  /** Builds one classifier per connection. Defaults to EnergySpeechClassifier. */
  classifierFactory?: () => SpeechClassifier;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Initial per-connection frame telemetry setting. Default: false */
  frameTelemetry?: boolean;
  /** Trace VAD state transitions. Default: false */
  debug?: boolean;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  config: Readonly<VadConfig>;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Close every connection and stop the server. */
  close(): Promise<void>;
}

interface ServerContext {
  config: Readonly<VadConfig>;
  classifierFactory: () => SpeechClassifier;
  logger: Logger;
  frameTelemetry: boolean;
  debug: boolean;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const ctx: ServerContext = {
    config: Object.freeze({ ...(options.vadConfig ?? DEFAULT_VAD_CONFIG) }),
    classifierFactory: options.classifierFactory ?? (() => new EnergySpeechClassifier()),
    logger: options.logger ?? createConsoleLogger("Server", { verbose: options.debug }),
    frameTelemetry: options.frameTelemetry ?? false,
    debug: options.debug ?? false,
  };
  const { logger } = ctx;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/config", (_req, res) => {
    res.json(ctx.config);
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, ctx);
  });

  return {
    app,
    httpServer,
    wss,
    config: ctx.config,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, ctx: ServerContext): void {
  const { logger } = ctx;
  const sessionId = uuidv4();

  let classifier: SpeechClassifier;
  try {
    classifier = ctx.classifierFactory();
  } catch (err) {
    const msg = `Speech classifier unavailable: ${errorMessage(err)}`;
    logger.error(`${msg} (session ${sessionId})`);
    ws.on("error", (wsErr) => {
      logger.error(`WebSocket error for session ${sessionId}: ${wsErr.message}`);
    });
    sendMessage(ws, { type: "error", message: msg, recoverable: false });
    ws.close(1011, "Speech classifier unavailable");
    return;
  }

  const iterator = new VadIterator({
    config: ctx.config,
    classifier,
    logger,
    debug: ctx.debug,
  });

  const connState: ConnectionState = {
    sessionId,
    iterator,
    audioFormatValidated: false,
    frameTelemetry: ctx.frameTelemetry,
    queue: Promise.resolve(),
    closed: false,
  };

  iterator.setEventCallback((event) => forwardEvent(ws, event, connState, logger));

  logger.info(`New WebSocket connection, session ${sessionId}`);
  sendMessage(ws, { type: "ready", sessionId, config: ctx.config });

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, ctx);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        handleClientMessage(ws, message, connState, ctx);
      }
    } catch (err) {
      const msg = errorMessage(err);
      logger.error(`Error handling message for session ${sessionId}: ${msg}`);
      sendMessage(ws, { type: "error", message: msg, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    cleanupConnection(ws, connState, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
    cleanupConnection(ws, connState, logger);
  });
}

/**
 * Append work to the connection's chain. A failing task is reported to the
 * client and the chain carries on with the next one.
 */
function enqueue(
  ws: WebSocket,
  connState: ConnectionState,
  logger: Logger,
  task: () => void | Promise<void>,
): void {
  connState.queue = connState.queue.then(task).catch((err: unknown) => {
    const msg = errorMessage(err);
    logger.error(`Async error for session ${connState.sessionId}: ${msg}`);
    sendMessage(ws, { type: "error", message: msg, recoverable: true });
  });
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(ws: WebSocket, data: Buffer, connState: ConnectionState, ctx: ServerContext): void {
  if (!connState.audioFormatValidated) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before sending audio chunks.",
    });
    return;
  }

  const { iterator } = connState;
  enqueue(ws, connState, ctx.logger, () => iterator.processAudioData(data));
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  ctx: ServerContext,
): void {
  const { iterator } = connState;

  switch (message.type) {
    case "audio_format":
      handleAudioFormat(ws, message, connState, ctx);
      break;

    case "force_end":
      enqueue(ws, connState, ctx.logger, () => iterator.forceEndSpeech());
      break;

    case "reset":
      enqueue(ws, connState, ctx.logger, () => {
        iterator.reset();
        ctx.logger.info(`VAD state reset for session ${connState.sessionId}`);
        sendMessage(ws, { type: "reset_complete" });
      });
      break;

    case "set_telemetry":
      enqueue(ws, connState, ctx.logger, () => {
        connState.frameTelemetry = message.enabled;
      });
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${String(exhaustiveCheck)}`,
        recoverable: true,
      });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse and shape-check a JSON client message.
 * Throws with a client-facing message when the payload is not a known message.
 */
export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error("Malformed JSON message.");
  }

  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    throw new Error('Message must be a JSON object with a string "type" field.');
  }

  switch (parsed.type) {
    case "audio_format": {
      const { channels, sampleRate, encoding } = parsed;
      if (typeof channels !== "number" || typeof sampleRate !== "number" || typeof encoding !== "string") {
        throw new Error('audio_format requires numeric "channels" and "sampleRate" and a string "encoding".');
      }
      return { type: "audio_format", channels, sampleRate, encoding };
    }
    case "force_end":
      return { type: "force_end" };
    case "reset":
      return { type: "reset" };
    case "set_telemetry": {
      const { enabled } = parsed;
      if (typeof enabled !== "boolean") {
        throw new Error('set_telemetry requires a boolean "enabled".');
      }
      return { type: "set_telemetry", enabled };
    }
    default:
      throw new Error(`Unknown message type: ${parsed.type}`);
  }
}

// ─── Audio Format Handshake ─────────────────────────────────────────────────────

function handleAudioFormat(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "audio_format" }>,
  connState: ConnectionState,
  ctx: ServerContext,
): void {
  const errors: string[] = [];

  if (message.channels !== EXPECTED_FORMAT.channels) {
    errors.push(`Expected ${EXPECTED_FORMAT.channels} channel(s), got ${message.channels}`);
  }
  if (message.sampleRate !== ctx.config.sampleRate) {
    errors.push(`Expected sample rate ${ctx.config.sampleRate}, got ${message.sampleRate}`);
  }
  if (message.encoding !== EXPECTED_FORMAT.encoding) {
    errors.push(`Expected encoding "${EXPECTED_FORMAT.encoding}", got "${message.encoding}"`);
  }

  if (errors.length > 0) {
    connState.audioFormatValidated = false;
    const errorMsg = `Audio format validation failed: ${errors.join("; ")}`;
    ctx.logger.warn(`${errorMsg} (session ${connState.sessionId})`);
    sendMessage(ws, { type: "audio_format_error", message: errorMsg });
    return;
  }

  connState.audioFormatValidated = true;
  ctx.logger.info(`Audio format validated for session ${connState.sessionId}`);
}

// ─── VAD Event Forwarding ───────────────────────────────────────────────────────

function forwardEvent(ws: WebSocket, event: VadEvent, connState: ConnectionState, logger: Logger): void {
  switch (event.type) {
    case "frame-processed":
      if (connState.frameTelemetry) {
        sendMessage(ws, {
          type: "frame_processed",
          timestamp: event.timestamp,
          isSpeech: event.probabilities.isSpeech,
          notSpeech: event.probabilities.notSpeech,
        });
      }
      break;

    case "speech-start":
      sendMessage(ws, { type: "speech_start", timestamp: event.timestamp });
      break;

    case "speech-validated":
      sendMessage(ws, { type: "speech_validated", timestamp: event.timestamp });
      break;

    case "speech-end":
      logger.info(`Speech segment for session ${connState.sessionId}: ${event.audio.length} bytes at ${event.timestamp.toFixed(3)}s`);
      sendMessage(ws, { type: "speech_end", timestamp: event.timestamp, byteLength: event.audio.length });
      // Raw binary frame so the client receives an ArrayBuffer, not JSON
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(event.audio);
      }
      break;

    case "misfire":
      sendMessage(ws, { type: "misfire", timestamp: event.timestamp });
      break;

    case "error":
      sendMessage(ws, { type: "error", message: event.message, recoverable: true });
      break;

    default: {
      const exhaustiveCheck: never = event;
      logger.warn(`Unhandled VAD event: ${String(exhaustiveCheck)}`);
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Send a typed JSON message to the client.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(ws: WebSocket, connState: ConnectionState, logger: Logger): void {
  if (connState.closed) return;
  connState.closed = true;
  const { iterator } = connState;
  // Release after any queued audio has drained
  enqueue(ws, connState, logger, () => iterator.release());
}

// ─── Exports for Testing ────────────────────────────────────────────────────────

export { EXPECTED_FORMAT };
export type { ConnectionState };
