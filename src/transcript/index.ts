export type { Transcript, TranscriptEvent, TranscriptEventKind } from './types.js';
export { loadTranscript, parseTranscript, classifyLine } from './loader.js';
export { detectSubject, detectSubjectFromFile, SUBJECT_RULES } from './subject-detector.js';
