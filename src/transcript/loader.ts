import { existsSync, readFileSync } from 'fs';
import { TranscriptUnavailableError } from '../errors/index.js';
import type { Transcript, TranscriptEvent, TranscriptEventKind } from './types.js';

type Role = 'user' | 'assistant';

const TEXT_FIELDS = ['content', 'text', 'message', 'output', 'data'] as const;

const PROMPT_PREFIX = /^(?:user|human|prompt)\s*:/i;
const TOOL_PREFIX = /^(?:\$ \S|running command|executing\b|tool_use\b|<invoke|function_call\b)/i;
const TOOL_CALL = /\b(?:Bash|Read|Write|Edit|MultiEdit|Grep|Glob|WebFetch|Task)\s*\(/;

export function loadTranscript(path: string): Transcript {
  if (!existsSync(path)) {
    throw new TranscriptUnavailableError(path, 'file not found');
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new TranscriptUnavailableError(path, e instanceof Error ? e.message : String(e));
  }

  return parseTranscript(raw, path);
}

/**
 * Parse a transcript from text. Each line is either a JSON record (JSON-lines
 * transcripts) or a plain text event; lines that look like JSON but fail to
 * parse are kept as plain text.
 */
export function parseTranscript(raw: string, source: string): Transcript {
  const events: TranscriptEvent[] = [];
  const lines = raw.split(/\r?\n/);

  lines.forEach((rawLine, i) => {
    const line = i + 1;
    const stripped = rawLine.trim();
    if (!stripped) return;

    if (stripped.startsWith('{')) {
      const parsed = parseJson(stripped);
      if (isRecord(parsed)) {
        const fromRecord = eventsFromRecord(parsed, line);
        events.push(...(fromRecord.length > 0 ? fromRecord : [{ line, kind: classifyLine(stripped), text: stripped }]));
        return;
      }
    }

    events.push({ line, kind: classifyLine(stripped), text: stripped });
  });

  if (events.length === 0) {
    throw new TranscriptUnavailableError(source, 'transcript is empty');
  }

  return { source, events };
}

export function classifyLine(text: string): TranscriptEventKind {
  if (PROMPT_PREFIX.test(text)) return 'prompt';
  if (TOOL_PREFIX.test(text) || TOOL_CALL.test(text)) return 'tool_use';
  return 'response';
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRole(value: unknown): Role | undefined {
  if (value === 'user' || value === 'human') return 'user';
  if (value === 'assistant') return 'assistant';
  return undefined;
}

function kindFor(role: Role | undefined, text: string): TranscriptEventKind {
  if (role === 'user') return 'prompt';
  if (role === 'assistant') return 'response';
  return classifyLine(text);
}

function eventsFromRecord(record: Record<string, unknown>, line: number): TranscriptEvent[] {
  const message = record.message;
  const role = toRole(record.type) ?? toRole(record.role) ?? (isRecord(message) ? toRole(message.role) : undefined);

  if (isRecord(message) && message.content !== undefined) {
    return eventsFromContent(message.content, role, line);
  }

  for (const field of TEXT_FIELDS) {
    const value = record[field];
    if (typeof value === 'string') {
      return value.trim() ? [{ line, kind: kindFor(role, value), text: value }] : [];
    }
  }

  if (Array.isArray(record.content)) {
    return eventsFromContent(record.content, role, line);
  }

  return [];
}

function eventsFromContent(content: unknown, role: Role | undefined, line: number): TranscriptEvent[] {
  if (typeof content === 'string') {
    return content.trim() ? [{ line, kind: kindFor(role, content), text: content }] : [];
  }
  if (!Array.isArray(content)) {
    return [];
  }

  const events: TranscriptEvent[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;

    switch (block.type) {
      case 'text':
        if (typeof block.text === 'string' && block.text.trim()) {
          events.push({ line, kind: kindFor(role, block.text), text: block.text });
        }
        break;
      case 'tool_use': {
        const name = typeof block.name === 'string' ? block.name : 'tool';
        events.push({ line, kind: 'tool_use', text: `${name}(${JSON.stringify(block.input ?? {})})` });
        break;
      }
      case 'tool_result': {
        const text = toolResultText(block.content);
        events.push({ line, kind: 'tool_result', text: block.is_error === true ? `error: ${text}` : text });
        break;
      }
    }
  }
  return events;
}

function toolResultText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  return content
    .map(part => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .filter(Boolean)
    .join('\n');
}
