/**
 * Entry point: load config, build gateways + orchestrator, feed the mock meeting and write transcripts.
 * SIGINT ends the session, saves the transcript and logs a metrics summary.
 */

import { loadConfig } from "./config";
import { createVoiceActivityGateway } from "./adapters/vad";
import { createRecognitionGateway } from "./adapters/asr";
import { Orchestrator, orchestratorConfigFrom } from "./pipeline/orchestrator";
import { TranscriptWriter } from "./transcript/writer";
import { MockMeeting } from "./room/mock";
import { startHealthServer } from "./health-server";
import { logger, logError } from "./logging";
import { createWatchdogState, getCounters, logMetricsSummary, runWatchdogTick } from "./metrics";

const WATCHDOG_INTERVAL_MS = 30_000;

async function main(): Promise<void> {
  const config = loadConfig();
  const vad = createVoiceActivityGateway(config);
  const asr = createRecognitionGateway(config);
  const writer = new TranscriptWriter(config.output);

  const orchestrator = new Orchestrator(vad, asr, orchestratorConfigFrom(config), {
    onTranscript: (segment) => writer.add(segment),
    onGap: (gap) => writer.recordGap(gap),
    onStreamStarted: (streamId) => logger.debug({ event: "STREAM_STARTED", streamId }, "Stream started"),
  });

  await vad.connect?.();

  const meeting = new MockMeeting({
    inputWavPath: config.runtime.mockInputWav,
    sampleRate: config.audio.sampleRate,
    realTime: true,
  });
  meeting.setCallbacks({
    onFrame: (frame) => orchestrator.ingest(frame),
    onParticipantJoined: (p) => {
      writer.setSpeakerName(p.id, p.name);
      if (config.audio.streamMode === "individual") orchestrator.createStream(p.id);
    },
    onParticipantLeft: (id) => {
      if (config.audio.streamMode === "individual") orchestrator.destroyStream(id);
    },
  });

  const health = startHealthServer({
    port: config.runtime.healthPort,
    getReady: () => orchestrator.isRunning && (vad.isHealthy?.() ?? true),
    getDetails: () => ({ streams: orchestrator.activeStreams(), sessionId: orchestrator.currentSessionId }),
  });

  const { meetingId } = await meeting.join();
  orchestrator.startSession(meetingId);
  writer.startSession(meetingId);
  if (!config.runtime.mockInputWav) {
    logger.info("Using mock meeting with synthetic silence; set MOCK_INPUT_WAV to feed a recording");
  }

  let playing = true;
  let lastFrames = 0;
  const watchdogState = createWatchdogState();
  const watchdogInterval = setInterval(() => {
    runWatchdogTick(
      watchdogState,
      { intervalMs: WATCHDOG_INTERVAL_MS, gatewayFailCountBeforeRestart: 3, ingestFailCountBeforeRestart: 3 },
      {
        onGatewayUnhealthy: () => vad.connect?.(),
        onIngestStalled: () => { logger.warn("Watchdog: no frames ingested; check the meeting feed."); },
      },
      {
        gateway: () => vad.isHealthy?.() ?? true,
        ingest: () => {
          const frames = getCounters().framesIngested;
          const advancing = !playing || frames > lastFrames;
          lastFrames = frames;
          return advancing;
        },
      }
    );
  }, WATCHDOG_INTERVAL_MS);

  meeting
    .play()
    .then((sent) => {
      playing = false;
      logger.info({ event: "MOCK_PLAYBACK_DONE", frames: sent }, "Mock meeting audio finished; Ctrl+C to end the session");
    })
    .catch((err) => {
      playing = false;
      logError(logger, err, { event: "MOCK_PLAYBACK_FAILED" });
    });

  const shutdown = async (): Promise<void> => {
    clearInterval(watchdogInterval);
    await meeting.leave();
    orchestrator.endSession();
    await writer.save();
    logger.info({ event: "TRANSCRIPT_STATS", ...writer.statistics() }, "Transcript statistics");
    logMetricsSummary({ sessionId: meetingId });
    await vad.close?.();
    await asr.close?.();
    health.close();
  };

  process.on("SIGINT", () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logError(logger, err, { event: "SHUTDOWN_FAILED" });
        process.exit(1);
      });
  });
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
