import "dotenv/config";
import { createBackendServer } from "./app";
import { loadConfig } from "./config";
import { MODULE_NAME, MODULE_VERSION, SpeechModule } from "./core/speechModule";
import { errMessage, log } from "./util/log";

const main = async () => {
  const config = loadConfig();
  const speech = new SpeechModule(config);

  speech.load();
  const initMsg = speech.init();
  log.info("module initialized", { module: MODULE_NAME, version: MODULE_VERSION, msg: initMsg });

  const engineReady = await speech.engine.ready();
  if (!engineReady.ok) {
    log.warn("engine not ready; /healthz will report 503 until fixed", engineReady.details);
  }

  const { server, wss } = createBackendServer(speech, config);

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    speech.close();
    wss.close();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(config.port, () => {
    log.info("openjtalk backend listening", { port: config.port });
  });
};

main().catch((e) => {
  log.error("startup failed", { err: errMessage(e) });
  process.exit(1);
});
