/**
 * Line-oriented interaction with the person building the update
 */

import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import { joinPath } from './distribution-tree.js';
import { ValidationError } from './errors.js';
import { AppError } from './logger.js';

export interface Prompter {
  /** Resolves to the next line of input, without its line terminator */
  ask(question: string): Promise<string>;
  showCandidates(entryName: string, locations: readonly string[]): void;
  notify(message: string): void;
  close(): void;
}

export type Answer = 'yes' | 'no' | 'reenter';

const ANSWERS: Record<string, Answer> = {
  y: 'yes',
  yes: 'yes',
  n: 'no',
  no: 'no',
  r: 'reenter',
  reenter: 'reenter',
  're-enter': 'reenter',
};

/**
 * Trimmed, case-folded answer. Empty input takes `fallback`; anything
 * unrecognised is undefined.
 */
export function parseAnswer(input: string, fallback: Answer): Answer | undefined {
  const normalized = input.trim().toLowerCase();
  if (normalized.length === 0) return fallback;
  return ANSWERS[normalized];
}

export type Selection = { kind: 'skip' } | { kind: 'locations'; indices: number[] };

/**
 * Parses a comma-separated list of 1-based indices. A 0 anywhere in the list
 * means skip. Indices come back in the order entered; a repeated index stands
 * for another copy to the same location.
 */
export function parseSelection(input: string, count: number): Selection {
  const tokens = input.split(',').map(token => token.trim());

  if (tokens.some(token => /^0+$/.test(token))) {
    return { kind: 'skip' };
  }

  const indices: number[] = [];
  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      throw new ValidationError(`'${token}' is not an index`, input);
    }
    const index = Number.parseInt(token, 10);
    if (index < 1 || index > count) {
      throw new ValidationError(`${index} is outside 1-${count}`, input);
    }
    indices.push(index);
  }

  return { kind: 'locations', indices };
}

export function renderLocationTable(entryName: string, locations: readonly string[], homeLabel: string): string {
  const rows = locations.map((location, index) => [String(index + 1), joinPath(homeLabel, location, entryName)]);
  const header = ['Index', 'Matching Location'];
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map(row => row[column].length))
  );
  const border = `+${widths.map(width => '-'.repeat(width + 2)).join('+')}+`;
  const line = (cells: string[]) => `| ${cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ')} |`;

  return [border, line(header.map(title => title.toUpperCase())), border, ...rows.map(line), border].join('\n');
}

export interface ReadlinePrompterOptions {
  input?: Readable;
  output?: Writable;
  /** Label shown in front of candidate locations */
  homeLabel?: string;
}

interface PendingQuestion {
  resolve(line: string): void;
  reject(error: Error): void;
}

/**
 * Reads answers line by line. Lines that arrive before a question is asked
 * are queued, so piped input works the same as a terminal.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly output: Writable;
  private readonly homeLabel: string;
  private readonly lines: string[] = [];
  private readonly pending: PendingQuestion[] = [];
  private closed = false;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.homeLabel = options.homeLabel ?? 'HOME';
    this.rl = createInterface({ input: options.input ?? process.stdin, terminal: false });

    this.rl.on('line', line => {
      const waiting = this.pending.shift();
      if (waiting) {
        waiting.resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      for (const waiting of this.pending.splice(0)) {
        waiting.reject(new AppError('Input closed while waiting for an answer', 'INPUT_UNAVAILABLE'));
      }
    });
  }

  ask(question: string): Promise<string> {
    this.output.write(question);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new AppError('No more input available', 'INPUT_UNAVAILABLE'));
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  showCandidates(entryName: string, locations: readonly string[]): void {
    this.output.write(`${renderLocationTable(entryName, locations, this.homeLabel)}\n`);
  }

  notify(message: string): void {
    this.output.write(`${message}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
