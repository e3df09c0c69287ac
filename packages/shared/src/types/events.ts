/**
 * Base interface for all contentbench events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the CLI invocation */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export type StageName = 'generate' | 'analyze' | 'judge' | 'score' | 'qc';

/** Emitted when a pipeline stage starts */
export interface StageStarted extends BaseEvent {
  type: 'StageStarted';
  payload: {
    stage: StageName;
    /** Number of (model, prompt) pairs or records the stage will visit */
    plannedItems: number;
  };
}

/** Emitted when a pipeline stage finishes */
export interface StageFinished extends BaseEvent {
  type: 'StageFinished';
  payload: {
    stage: StageName;
    succeeded: number;
    failed: number;
    skipped: number;
    durationMs: number;
    /** Store file written by the stage */
    outputPath: string;
  };
}

/** Emitted after a generated record has been persisted */
export interface RecordGenerated extends BaseEvent {
  type: 'RecordGenerated';
  payload: {
    model: string;
    promptId: string;
    latencyMs: number;
    promptTokens: number;
    completionTokens: number;
    costUsd: number;
    /** Whether the record replaced an existing one */
    replaced: boolean;
  };
}

/** Emitted when a (model, prompt) pair produced no record */
export interface GenerationFailed extends BaseEvent {
  type: 'GenerationFailed';
  payload: {
    model: string;
    promptId: string;
    error: string;
  };
}

/** Emitted once per record by the link and length analyzer */
export interface RecordAnalyzed extends BaseEvent {
  type: 'RecordAnalyzed';
  payload: {
    model: string;
    promptId: string;
    wordsCount: number;
    urlCount: number;
    brokenLinks: string[];
    /** Set when the record's link checks could not complete */
    error?: string;
  };
}

/** Emitted after a judgment has been persisted */
export interface RecordJudged extends BaseEvent {
  type: 'RecordJudged';
  payload: {
    model: string;
    promptId: string;
    judge: string;
    accuracy: number;
    safety: number;
    factuality: number;
    tone: string;
    /** True when the sentinel judgment was used */
    fallback: boolean;
    malformedLines: number;
  };
}

/** Emitted when a contest result has been computed and written */
export interface ContestScored extends BaseEvent {
  type: 'ContestScored';
  payload: {
    winner: string;
    score: number;
    modelScores: Record<string, number>;
  };
}

/** Emitted on every QC loop state change */
export interface QcTransition extends BaseEvent {
  type: 'QcTransition';
  payload: {
    from: string | null;
    to: string;
  };
}

/** Emitted when a QC run snapshot has been written */
export interface QcFinished extends BaseEvent {
  type: 'QcFinished';
  payload: {
    status: string;
    path: string;
  };
}

/** Emitted when a provider API request starts */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted when a provider API request completes (success or failure) */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    model: string;
    durationMs: number;
    success: boolean;
    error?: string;
    retries: number;
  };
}

export type BenchEvent =
  | StageStarted
  | StageFinished
  | RecordGenerated
  | GenerationFailed
  | RecordAnalyzed
  | RecordJudged
  | ContestScored
  | QcTransition
  | QcFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;

export type BenchEventType = BenchEvent['type'];

