export interface CorpusItem {
  readonly id: string;
  readonly inputText: string;
  readonly goldLabels: ReadonlySet<string>;
}

export type CorpusLoader = () => Promise<CorpusItem[]>;

export interface Prediction {
  readonly itemId: string;
  readonly rawText: string;
  /** never empty, falls back to the sentinel list */
  readonly labels: readonly string[];
}

export interface JudgedPrediction {
  readonly prediction: Prediction;
  /** within [0, 1] */
  readonly score: number;
  readonly explanation: string;
}

/** A judged prediction together with the corpus item it was made for. */
export interface JudgedRecord {
  readonly item: CorpusItem;
  readonly judged: JudgedPrediction;
}

export interface Candidate {
  readonly roundIndex: number;
  readonly promptText: string;
  readonly records: readonly JudgedRecord[];
  readonly averageScore: number;
}

export interface OptimizationState {
  readonly best: Candidate | null;
  /** one average score per completed round */
  readonly history: readonly number[];
}

/**
 * A prompt split around its editable instruction region. Everything outside
 * `instructions` is carried over verbatim between rounds.
 */
export interface PromptDocument {
  readonly preamble: string;
  readonly instructions: string;
  readonly postamble: string;
}

export type Predictor = (item: CorpusItem, prompt: string) => Promise<Prediction>;
export type Judge = (item: CorpusItem, prediction: Prediction) => Promise<JudgedPrediction>;
export type Metaprompter = (prompt: PromptDocument, records: readonly JudgedRecord[]) => Promise<PromptDocument>;

export interface ArtifactWriter {
  writeRound(candidate: Candidate): Promise<void>;
  writeFinal(state: OptimizationState): Promise<void>;
}

/**
 * `text` asks for free text and parses it, `structured` asks the gateway for a
 * schema-constrained value first and only parses text when that comes back empty.
 */
export type OutputMode = "text" | "structured";
