import type Vosk from "vosk";
import type { Recognizer, RecognizerBackend, RecognizerModel } from "./backend.js";
import { createLogger } from "../logger.js";

const log = createLogger("engine:vosk");

type VoskModule = typeof Vosk;

/** Memoizes a module load; a failed load is retried on the next call. */
export function cachedLoader<T>(load: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    pending ??= load().catch((err: unknown) => {
      pending = undefined;
      throw err;
    });
    return pending;
  };
}

// Native binding; loaded the first time a model is needed
const loadVosk = cachedLoader(() =>
  import("vosk").then((mod) => {
    // -1 keeps Kaldi quiet on stderr
    mod.default.setLogLevel(-1);
    return mod.default;
  })
);

class VoskModel implements RecognizerModel {
  constructor(
    readonly vosk: VoskModule,
    readonly native: Vosk.Model
  ) {}

  free(): void {
    this.native.free();
  }
}

export class VoskBackend implements RecognizerBackend {
  readonly name = "vosk";

  async loadModel(modelDir: string): Promise<RecognizerModel> {
    const vosk = await loadVosk();
    log.info({ modelDir }, "loading Vosk model");
    return new VoskModel(vosk, new vosk.Model(modelDir));
  }

  createRecognizer(model: RecognizerModel, sampleRate: number): Recognizer {
    if (!(model instanceof VoskModel)) {
      throw new TypeError("Model was not loaded by the Vosk backend");
    }
    return new model.vosk.Recognizer({ model: model.native, sampleRate });
  }
}
