import express from "express";
import type { Express, Request, Response } from "express";
import bodyParser from "body-parser";
import { createServer } from "node:http";
import type { Server } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { RawData } from "ws";
import { parseClientMessage, parseSpeakBody } from "./core/messages";
import { MODULE_NAME, MODULE_VERSION } from "./core/speechModule";
import type { SpeechModule } from "./core/speechModule";
import type { SpeakErrorKind } from "./errors";
import { createCaptureOutput } from "./output/captureOutput";
import { createSocketOutput, socketSender } from "./output/socketOutput";
import type { BackendConfig, MessageSettings } from "./types";
import { errMessage, log } from "./util/log";
import { createTrace } from "./util/trace";
import { encodeWav } from "./util/wav";

export const statusForKind: Record<SpeakErrorKind, number> = {
  NoVoiceResolved: 422,
  TempFileError: 500,
  LaunchError: 502,
  SynthesisFailed: 502,
  MalformedHeader: 502,
};

export type BackendServer = {
  app: Express;
  server: Server;
  wss: WebSocketServer;
};

/** HTTP routes plus the `/relay` WebSocket, bound to one speech module. Does not listen. */
export const createBackendServer = (speech: SpeechModule, config: BackendConfig): BackendServer => {
  const app = express();
  app.use(bodyParser.json());

  app.get("/healthz", async (_req, res) => {
    const ready = await speech.engine.ready();
    res.status(ready.ok ? 200 : 503).json({
      ok: ready.ok,
      module: MODULE_NAME,
      version: MODULE_VERSION,
      engine: ready,
      voices: speech.listVoices().length,
      port: config.port,
    });
  });

  app.get("/voices", (_req, res) => {
    res.json({ voices: speech.listVoices() });
  });

  app.post("/speak", async (req: Request, res: Response) => {
    let parsed: ReturnType<typeof parseSpeakBody>;
    try {
      parsed = parseSpeakBody(req.body);
    } catch (e) {
      return res.status(400).json({ error: errMessage(e) });
    }

    // a request carries all of its settings; nothing is inherited from earlier callers
    const output = createCaptureOutput();
    const result = await speech.speak(parsed, output, speech.createSession());
    if (!result.ok) {
      return res
        .status(statusForKind[result.error.kind])
        .json({ error: result.error.message, kind: result.error.kind, traceId: result.traceId });
    }
    const { track } = output.captured;
    if (!track) {
      return res.status(500).json({ error: "no audio produced", traceId: result.traceId });
    }
    return res.type("audio/wav").set("X-Trace-Id", result.traceId).send(encodeWav(track));
  });

  app.post("/pause", (_req, res) => {
    res.status(501).json({ ok: speech.pause() });
  });

  app.post("/stop", (_req, res) => {
    res.json({ ok: speech.stop() });
  });

  const server = createServer(app);
  const wss = new WebSocketServer({ server, path: "/relay" });

  wss.on("connection", (socket: WebSocket) => {
    const connection = createTrace();
    const send = socketSender(socket);
    // each connection keeps its own SET state and resolved voice
    const session = speech.createSession();
    let settings: MessageSettings = {};

    log.info("ws connected", { traceId: connection.traceId });
    send({ type: "ready", module: MODULE_NAME, version: MODULE_VERSION });

    socket.on("message", (raw: RawData) => {
      try {
        const msg = parseClientMessage(raw.toString());
        switch (msg.type) {
          case "set": {
            const { type: _type, ...update } = msg;
            settings = { ...settings, ...update };
            log.debug("settings updated", { traceId: connection.traceId, settings });
            break;
          }
          case "speak": {
            const { type: _type, text, traceId, ...update } = msg;
            settings = { ...settings, ...update };
            const trace = createTrace(traceId);
            void speech
              .speak({ text, traceId: trace.traceId, settings }, createSocketOutput(send, trace.traceId), session)
              .then((result) => {
                if (!result.ok && result.error.kind !== "NoVoiceResolved") {
                  send({
                    type: "speak_failed",
                    traceId: result.traceId,
                    kind: result.error.kind,
                    error: result.error.message,
                  });
                }
              })
              .catch((e: unknown) => {
                log.error("speak crashed", { traceId: trace.traceId, err: errMessage(e) });
                send({ type: "error", error: errMessage(e) });
              });
            break;
          }
          case "pause":
            send({ type: "pause_result", ok: speech.pause() });
            break;
          case "stop":
            speech.stop();
            break;
          case "list_voices":
            send({ type: "voices", voices: speech.listVoices() });
            break;
          case "end":
            socket.close();
            break;
        }
      } catch (e) {
        const err = errMessage(e);
        log.warn("ws message handling failed", { traceId: connection.traceId, err });
        send({ type: "error", error: err });
      }
    });

    socket.on("close", () => {
      log.info("ws closed", { traceId: connection.traceId });
    });

    socket.on("error", (error: Error) => {
      log.warn("ws error", { traceId: connection.traceId, err: error.message });
      socket.close();
    });
  });

  return { app, server, wss };
};
