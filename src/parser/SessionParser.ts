/**
 * Session Parser
 * Turns an on-disk session directory into a Session record.
 *
 * Layout:
 *   <projectsDir>/<project>/sessions/<session-id>/
 *     events.jsonl       tool calls, delegations, errors
 *     transcript.jsonl   turns and timing
 *     metadata.json      project path, model, status
 *
 * Every file is optional; unreadable lines are skipped.
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { basename, dirname, join } from 'path';
import type { Session } from '../types/index.js';
import { SessionParseError } from '../types/index.js';
import { MS_PER_SECOND } from '../utils/time.js';

export const EVENTS_FILE = 'events.jsonl';
export const TRANSCRIPT_FILE = 'transcript.jsonl';
export const METADATA_FILE = 'metadata.json';

const TOOL_CALL_EVENT = 'tool:pre';
const DELEGATION_TOOL = 'task';

interface EventsData {
  tool_counts: Map<string, number>;
  delegation_count: number;
  error_count: number;
  session_id: string | null;
}

interface TranscriptData {
  turn_count: number;
  started_at: number;
  ended_at: number;
}

interface MetadataData {
  project_path?: string;
  model_used?: string;
  status?: string;
}

export interface SessionParserOptions {
  /** Fallback time for sessions with no usable timestamps */
  clock?: () => number;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDirectory(target: string): boolean {
  try {
    return statSync(target).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Parse each non-blank line as JSON, yielding only objects
 */
function* readJsonLines(file: string): Generator<JsonObject> {
  if (!existsSync(file)) return;

  for (const line of readFileSync(file, 'utf-8').split('\n')) {
    if (line.trim().length === 0) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    if (isJsonObject(parsed)) yield parsed;
  }
}

export class SessionParser {
  private clock: () => number;

  constructor(options: SessionParserOptions = {}) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * All <project>/sessions/<id> directories under `projectsDir`, sorted by path
   */
  findSessions(projectsDir: string): string[] {
    if (!isDirectory(projectsDir)) return [];

    const sessions: string[] = [];
    for (const project of readdirSync(projectsDir).sort()) {
      const sessionsDir = join(projectsDir, project, 'sessions');
      if (!isDirectory(sessionsDir)) continue;

      for (const entry of readdirSync(sessionsDir).sort()) {
        const sessionDir = join(sessionsDir, entry);
        if (isDirectory(sessionDir)) sessions.push(sessionDir);
      }
    }
    return sessions;
  }

  parseSession(sessionDir: string): Session {
    if (!isDirectory(sessionDir)) {
      throw new SessionParseError('Session path is not a directory', { sessionDir });
    }

    const events = this.parseEvents(join(sessionDir, EVENTS_FILE));
    const transcript = this.parseTranscript(join(sessionDir, TRANSCRIPT_FILE));
    const metadata = this.parseMetadata(join(sessionDir, METADATA_FILE));

    let toolCallCount = 0;
    for (const count of events.tool_counts.values()) toolCallCount += count;

    return {
      session_id: events.session_id ?? basename(sessionDir),
      project_path: metadata.project_path ?? dirname(dirname(sessionDir)),
      started_at: transcript.started_at,
      ended_at: transcript.ended_at,
      duration_seconds: Math.trunc((transcript.ended_at - transcript.started_at) / MS_PER_SECOND),
      turn_count: transcript.turn_count,
      tool_call_count: toolCallCount,
      delegation_count: events.delegation_count,
      error_count: events.error_count,
      tool_counts: Object.fromEntries(events.tool_counts),
      model_used: metadata.model_used ?? 'unknown',
      status: metadata.status ?? 'completed',
    };
  }

  private parseEvents(file: string): EventsData {
    const data: EventsData = {
      tool_counts: new Map(),
      delegation_count: 0,
      error_count: 0,
      session_id: null,
    };

    for (const event of readJsonLines(file)) {
      if (data.session_id === null && typeof event.session_id === 'string') {
        data.session_id = event.session_id;
      }

      if (event.event === TOOL_CALL_EVENT) {
        const payload = isJsonObject(event.data) ? event.data : {};
        const toolName = typeof payload.tool_name === 'string' ? payload.tool_name : 'unknown';
        data.tool_counts.set(toolName, (data.tool_counts.get(toolName) ?? 0) + 1);

        // Delegation = task tool with an agent parameter
        if (toolName === DELEGATION_TOOL && isJsonObject(payload.tool_input) && 'agent' in payload.tool_input) {
          data.delegation_count += 1;
        }
      }

      if (event.type === 'error' || event.status === 'error') {
        data.error_count += 1;
      }
    }

    return data;
  }

  private parseTranscript(file: string): TranscriptData {
    let turns = 0;
    let startedAt: number | null = null;
    let endedAt: number | null = null;

    for (const message of readJsonLines(file)) {
      if (typeof message.timestamp === 'string' && message.timestamp.length > 0) {
        const timestamp = Date.parse(message.timestamp);
        // A bad timestamp discards the whole line, turn included
        if (Number.isNaN(timestamp)) continue;

        if (startedAt === null) startedAt = timestamp;
        endedAt = timestamp;
      }

      if (message.role === 'user') {
        turns += 1;
      }
    }

    const now = this.clock();
    return {
      turn_count: turns,
      started_at: startedAt ?? now,
      ended_at: endedAt ?? now,
    };
  }

  private parseMetadata(file: string): MetadataData {
    if (!existsSync(file)) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, 'utf-8'));
    } catch {
      return {};
    }
    if (!isJsonObject(parsed)) return {};

    const metadata: MetadataData = {};
    if (typeof parsed.project_path === 'string') metadata.project_path = parsed.project_path;
    if (typeof parsed.model_used === 'string') metadata.model_used = parsed.model_used;
    if (typeof parsed.status === 'string') metadata.status = parsed.status;
    return metadata;
  }
}
