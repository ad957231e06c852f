export type TranscriptEventKind = 'prompt' | 'response' | 'tool_use' | 'tool_result';

export interface TranscriptEvent {
  /** 1-based line of the source file the event was read from. */
  line: number;
  kind: TranscriptEventKind;
  text: string;
}

export interface Transcript {
  source: string;
  events: readonly TranscriptEvent[];
}
