import type { Recognizer, RecognizerBackend, RecognizerModel } from "../../src/engine/backend.js";

export type ScriptStep = { final: boolean; text: string };

/**
 * Recognizer that replays a script, one step per accepted chunk. Once the
 * script is exhausted every chunk yields an empty partial.
 */
export class ScriptedRecognizer implements Recognizer {
  readonly fed: Buffer[] = [];
  freed = 0;
  private step = 0;
  private current: ScriptStep = { final: false, text: "" };

  constructor(
    private readonly script: ScriptStep[],
    private readonly finalText: string
  ) {}

  acceptWaveform(data: Buffer): boolean {
    this.fed.push(Buffer.from(data));
    this.current = this.script[this.step] ?? { final: false, text: "" };
    this.step++;
    return this.current.final;
  }

  result(): { text?: string } {
    return { text: this.current.text };
  }

  partialResult(): { partial?: string } {
    return { partial: this.current.text };
  }

  finalResult(): { text?: string } {
    return { text: this.finalText };
  }

  free(): void {
    this.freed++;
  }
}

export class FakeModel implements RecognizerModel {
  freed = 0;

  free(): void {
    this.freed++;
  }
}

export class FakeBackend implements RecognizerBackend {
  readonly name = "fake";
  readonly models: FakeModel[] = [];
  readonly recognizers: ScriptedRecognizer[] = [];
  loadError?: Error;
  recognizerError?: Error;

  constructor(
    private readonly script: ScriptStep[] = [],
    private readonly finalText = ""
  ) {}

  async loadModel(_modelDir: string): Promise<RecognizerModel> {
    if (this.loadError) throw this.loadError;
    const model = new FakeModel();
    this.models.push(model);
    return model;
  }

  createRecognizer(_model: RecognizerModel, _sampleRate: number): Recognizer {
    if (this.recognizerError) throw this.recognizerError;
    const recognizer = new ScriptedRecognizer(this.script, this.finalText);
    this.recognizers.push(recognizer);
    return recognizer;
  }
}
