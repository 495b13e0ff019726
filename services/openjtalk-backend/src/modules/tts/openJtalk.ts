import fs from "node:fs/promises";
import path from "node:path";
import { SpeakError } from "../../errors";
import { execFile } from "../../util/exec";
import type { ExecFn, ExecResult } from "../../util/exec";
import { errMessage, log } from "../../util/log";
import type { SynthesizedWav, TtsEngine } from "./types";

export interface OpenJTalkOptions {
  binPath: string;
  dictionaryDir: string;
  tmpDir: string;
  timeoutMs?: number;
  exec?: ExecFn;
}

const TMP_PREFIX = "speechd-openjtalk-";

export class OpenJTalkEngine implements TtsEngine {
  private readonly exec: ExecFn;

  constructor(private opts: OpenJTalkOptions) {
    this.exec = opts.exec ?? execFile;
  }

  async ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }> {
    const details = { binPath: this.opts.binPath, dictionaryDir: this.opts.dictionaryDir, tmpDir: this.opts.tmpDir };
    try {
      await fs.access(this.opts.dictionaryDir);
      await fs.access(this.opts.tmpDir);
      return { ok: true, details };
    } catch (e) {
      return { ok: false, details: { ...details, error: errMessage(e) } };
    }
  }

  /** Owner-only directory holding an empty, owner-only output file. */
  async createOutput(): Promise<SynthesizedWav> {
    let dir: string;
    try {
      dir = await fs.mkdtemp(path.join(this.opts.tmpDir, TMP_PREFIX));
    } catch (e) {
      throw new SpeakError("TempFileError", `temporary .wav creation failed: ${errMessage(e)}`, { cause: e });
    }

    const dispose = async () => {
      try {
        await fs.rm(dir, { recursive: true, force: true });
      } catch (e) {
        log.warn("temporary output cleanup failed", { dir, err: errMessage(e) });
      }
    };

    const wavPath = path.join(dir, "out.wav");
    try {
      await fs.writeFile(wavPath, "", { flag: "wx", mode: 0o600 });
    } catch (e) {
      await dispose();
      throw new SpeakError("TempFileError", `temporary .wav creation failed: ${errMessage(e)}`, { cause: e });
    }
    return { path: wavPath, dispose };
  }

  async synthesize(voicePath: string, text: string): Promise<SynthesizedWav> {
    const output = await this.createOutput();
    try {
      await this.run(voicePath, text, output.path);
      return output;
    } catch (e) {
      await output.dispose();
      throw e;
    }
  }

  private async run(voicePath: string, text: string, outputPath: string): Promise<void> {
    const args = ["-x", this.opts.dictionaryDir, "-m", voicePath, "-ow", outputPath];
    log.debug("executing", { bin: this.opts.binPath, args });

    let res: ExecResult;
    try {
      res = await this.exec(this.opts.binPath, args, { inputText: text, timeoutMs: this.opts.timeoutMs });
    } catch (e) {
      throw new SpeakError("LaunchError", `failed to execute ${this.opts.binPath}: ${errMessage(e)}`, { cause: e });
    }

    if (res.code !== 0) {
      log.warn("open_jtalk exited non-zero", {
        code: res.code,
        signal: res.signal,
        stderr: res.stderr.slice(0, 500),
      });
      const how = res.signal ? `signal ${res.signal}` : `code ${res.code}`;
      throw new SpeakError("SynthesisFailed", `open_jtalk failed (${how})`);
    }
  }
}
