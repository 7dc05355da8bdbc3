/**
 * GenerationLogger - Saves raw LLM responses for later review.
 *
 * One file per response under <dataDir>/generation-logs/. All text is
 * sanitized before it touches disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getSanitizer } from '../core/OutputSanitizer.js';

export interface GenerationLogEntry {
  timestamp: string;
  number: number;
  attempt: number;
  model: string;
  promptLength: number;
  responseLength: number;
  accepted: boolean;
  problems: string[];
  file: string;
}

export interface GenerationLoggerOptions {
  /** Directory the generation-logs folder is created in */
  dataDir: string;
  /** Suppress console lines (tests and --json output) */
  quiet?: boolean;
}

export class GenerationLogger {
  private logDir: string;
  private sessionId: string;
  private quiet: boolean;
  private entries: GenerationLogEntry[] = [];

  constructor(options: GenerationLoggerOptions) {
    this.logDir = path.join(options.dataDir, 'generation-logs');
    this.sessionId = `${new Date().toISOString().replace(/[:.]/g, '-')}_${uuidv4().slice(0, 8)}`;
    this.quiet = options.quiet ?? false;
  }

  private ensureLogDir(): void {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  /**
   * Write one response to its own file and remember a summary line.
   * Returns the file path.
   */
  logResponse(params: {
    number: number;
    attempt: number;
    model: string;
    prompt: string;
    response: string;
    problems: string[];
  }): string {
    const sanitizer = getSanitizer();
    const prompt = sanitizer.sanitize(params.prompt);
    const response = sanitizer.sanitize(params.response);
    const problems = params.problems.map(p => sanitizer.sanitize(p));

    this.ensureLogDir();
    const filename = `${this.sessionId}_n${params.number}_a${params.attempt}.log`;
    const filepath = path.join(this.logDir, filename);

    const entry: GenerationLogEntry = {
      timestamp: new Date().toISOString(),
      number: params.number,
      attempt: params.attempt,
      model: params.model,
      promptLength: prompt.length,
      responseLength: response.length,
      accepted: problems.length === 0,
      problems,
      file: filepath
    };
    this.entries.push(entry);

    const content = [
      `=== Insight Bank Generation Log ===`,
      `Timestamp: ${entry.timestamp}`,
      `Number: ${entry.number}`,
      `Attempt: ${entry.attempt}`,
      `Model: ${entry.model}`,
      `Prompt Length: ${entry.promptLength} chars`,
      `Response Length: ${entry.responseLength} chars`,
      `Accepted: ${entry.accepted ? 'yes' : 'no'}`,
      ...problems.map(p => `Problem: ${p}`),
      ``,
      `=== RAW RESPONSE ===`,
      response,
      ``,
      `=== END LOG ===`
    ].join('\n');

    fs.writeFileSync(filepath, content, 'utf-8');
    if (!this.quiet) {
      console.log(`[GenerationLogger] Response saved to: ${filepath}`);
    }
    return filepath;
  }

  getEntries(): GenerationLogEntry[] {
    return [...this.entries];
  }

  /**
   * Session summary, one line per logged response.
   */
  getSummary(): string {
    const accepted = this.entries.filter(e => e.accepted).length;
    return [
      `Session: ${this.sessionId}`,
      `Responses: ${this.entries.length}`,
      `Accepted: ${accepted}`,
      `Log directory: ${this.logDir}`,
      ...this.entries.map((e, i) =>
        `${i + 1}. [${e.timestamp}] number ${e.number} attempt ${e.attempt}${e.accepted ? '' : ' [REJECTED]'}`
      )
    ].join('\n');
  }

  getLogDir(): string {
    return this.logDir;
  }
}
