import { ModuleInitError, SpeakError, isSpeakError } from "../errors";
import { OpenJTalkEngine } from "../modules/tts/openJtalk";
import type { TtsEngine } from "../modules/tts/types";
import { durationMs } from "../util/audio";
import type { ExecFn } from "../util/exec";
import { errMessage, log } from "../util/log";
import { stripSsml } from "../util/ssml";
import { createTrace, mark, msSinceStart } from "../util/trace";
import type { Trace } from "../util/trace";
import { decodeWavFile } from "../util/wav";
import type { AudioFormat, BackendConfig, SpeakRequest, SpeakResult, SpeechOutput, VoiceEntry } from "../types";
import { VoiceRegistry } from "./voiceRegistry";
import { VoiceSelection, pathExists } from "./voiceSelection";
import type { PathExists } from "./voiceSelection";

export const MODULE_NAME = "open_jtalk";
export const MODULE_VERSION = "0.1";

// open_jtalk writes little-endian PCM; the format is not read from the file
const OUTPUT_FORMAT: AudioFormat = "le";

export interface SpeechModuleDeps {
  engine?: TtsEngine;
  exec?: ExecFn;
  pathExists?: PathExists;
}

/**
 * One Open JTalk backend instance: registered voices, engine and the speak
 * pipeline. Speak requests run one at a time in arrival order.
 *
 * Voice state lives in a {@link VoiceSelection}. Callers that serve several
 * clients take one per client from `createSession()` and pass it to
 * `speak()`; without one, the module's own selection is used.
 */
export class SpeechModule {
  readonly engine: TtsEngine;
  private readonly registry = new VoiceRegistry();
  private readonly exists: PathExists;
  private readonly selection: VoiceSelection;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly config: BackendConfig,
    deps: SpeechModuleDeps = {},
  ) {
    this.engine =
      deps.engine ??
      new OpenJTalkEngine({
        binPath: config.binPath,
        dictionaryDir: config.dictionaryDir,
        tmpDir: config.tmpDir,
        timeoutMs: config.timeoutMs,
        exec: deps.exec,
      });
    this.exists = deps.pathExists ?? pathExists;
    this.selection = this.createSession();
  }

  createSession(): VoiceSelection {
    return new VoiceSelection(this.registry, this.config.voiceSearchPaths, this.exists);
  }

  load(): void {
    for (const voice of this.config.voices) {
      this.registry.register(voice);
    }
    log.info("module loaded", {
      dictionaryDir: this.config.dictionaryDir,
      voiceSearchPaths: this.config.voiceSearchPaths,
      voices: this.registry.size,
    });
  }

  init(): string {
    if (this.registry.size === 0) {
      throw new ModuleInitError(
        "The module does not have any voice configured, " +
          "please add them in the configuration file, or install the required files",
      );
    }
    return "ok!";
  }

  listVoices(): VoiceEntry[] {
    return this.registry.list();
  }

  get voice() {
    return this.selection.current;
  }

  speak(request: SpeakRequest, output: SpeechOutput, session: VoiceSelection = this.selection): Promise<SpeakResult> {
    const run = this.queue.then(() => this.speakNow(request, output, session));
    // callers see a rejection through `run`; the queue itself keeps going
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Pausing is not supported by the engine. */
  pause(): boolean {
    log.debug("pausing (not supported)");
    return false;
  }

  /** In-flight synthesis is not interrupted. */
  stop(): boolean {
    log.debug("stopping (not supported)");
    return true;
  }

  close(): boolean {
    log.debug("closing");
    return true;
  }

  private async speakNow(request: SpeakRequest, output: SpeechOutput, session: VoiceSelection): Promise<SpeakResult> {
    const trace = createTrace(request.traceId);
    const { traceId } = trace;

    await session.apply(request.settings);
    mark(trace, "params_applied");

    const { voicePath, voiceId } = session.current;
    if (!voicePath) {
      const error = new SpeakError("NoVoiceResolved", "no voice file found for the current settings");
      log.warn("speak rejected", { traceId, kind: error.kind, voiceId: voiceId ?? null, settings: request.settings });
      output.speakError(error);
      return { ok: false, traceId, error };
    }

    output.speakOk();
    output.eventBegin();
    try {
      await this.runPipeline(trace, voicePath, stripSsml(request.text), output);
      log.info("speak done", { traceId, ms: msSinceStart(trace), marks: trace.marks });
      return { ok: true, traceId };
    } catch (e) {
      const error = isSpeakError(e) ? e : new SpeakError("SynthesisFailed", errMessage(e), { cause: e });
      log.warn("speak failed", { traceId, kind: error.kind, err: error.message, ms: msSinceStart(trace) });
      return { ok: false, traceId, error };
    } finally {
      output.eventEnd();
    }
  }

  private async runPipeline(trace: Trace, voicePath: string, text: string, output: SpeechOutput) {
    log.debug("speaking", { traceId: trace.traceId, voicePath, textLen: text.length });

    mark(trace, "synth_start");
    const wav = await this.engine.synthesize(voicePath, text);
    try {
      mark(trace, "synth_done");
      const track = await decodeWavFile(wav.path);
      mark(trace, "decoded");
      log.debug("decoded wav", {
        traceId: trace.traceId,
        bits: track.bits,
        numChannels: track.numChannels,
        sampleRate: track.sampleRate,
        numSamples: track.numSamples,
        durationMs: durationMs(track),
      });
      await output.play(track, OUTPUT_FORMAT);
      mark(trace, "played");
    } finally {
      await wav.dispose();
    }
  }
}
