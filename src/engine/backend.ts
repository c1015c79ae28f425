/**
 * Capability surface of an offline recognizer. Shaped after Vosk/Kaldi:
 * a model is loaded once from a directory, recognizers are created per
 * stream and consume little-endian PCM in order.
 */
export interface RecognizerModel {
  free(): void;
}

export interface Recognizer {
  /** Returns true when the audio so far ends an utterance. */
  acceptWaveform(data: Buffer): boolean;
  /** Text of the utterance that just ended. */
  result(): { text?: string };
  /** Current hypothesis since the last utterance boundary. */
  partialResult(): { partial?: string };
  /** Flushes buffered audio and returns the remaining text. */
  finalResult(): { text?: string };
  free(): void;
}

export interface RecognizerBackend {
  readonly name: string;
  loadModel(modelDir: string): Promise<RecognizerModel>;
  createRecognizer(model: RecognizerModel, sampleRate: number): Recognizer;
}
