// Streaming VAD - Entry point
// Loads configuration and starts the WebSocket server.

import "dotenv/config";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { createAppServer } from "./server.js";
import { EnergySpeechClassifier } from "./speech-classifier.js";
import { loadAppConfig, type AppConfig } from "./vad-config.js";

export const APP_NAME = "Streaming VAD";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let appConfig: AppConfig;
try {
  appConfig = loadAppConfig();
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

const { vad, energy } = appConfig;
logInit(
  `VAD config: ${vad.frameSamples} samples/frame @ ${vad.sampleRate}Hz, ` +
    `thresholds ${vad.positiveSpeechThreshold}/${vad.negativeSpeechThreshold}, ` +
    `redemption ${vad.redemptionFrames}, pre-roll ${vad.preSpeechPadFrames}, min speech ${vad.minSpeechFrames}`,
);
logInit(`Classifier: energy (midpoint ${energy.midpointDb} dBFS, slope ${energy.slopeDb} dB)`);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  vadConfig: vad,
  classifierFactory: () => new EnergySpeechClassifier(energy),
  logger: createConsoleLogger("Server", { verbose: appConfig.debug }),
  frameTelemetry: appConfig.frameTelemetry,
  debug: appConfig.debug,
});

server
  .listen(appConfig.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at ws://localhost:${appConfig.port}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
