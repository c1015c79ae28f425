// The vosk package ships JavaScript only.
declare module "vosk" {
  namespace vosk {
    function setLogLevel(level: number): void;

    class Model {
      constructor(modelPath: string);
      free(): void;
    }

    interface RecognizerParam {
      model: Model;
      sampleRate: number;
      grammar?: string[];
    }

    class Recognizer {
      constructor(param: RecognizerParam);
      setWords(words: boolean): void;
      setPartialWords(partialWords: boolean): void;
      acceptWaveform(data: Buffer): boolean;
      result(): { text?: string };
      partialResult(): { partial?: string };
      finalResult(): { text?: string };
      reset(): void;
      free(): void;
    }
  }

  export = vosk;
}
