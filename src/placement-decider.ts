/**
 * Decides where each top-level update entry is copied.
 *
 * One entry is driven through an explicit state machine:
 *
 *   searching ─┬─ no-match ── awaiting-destination ⇄ awaiting-confirmation
 *              ├─ single-match
 *              └─ multiple-match ── awaiting-selection
 *
 * Every branch ends in `skipped`, or in `copying` followed by `done`. Only a
 * ValidationError is handled here (by asking again); read, copy and input
 * failures propagate and end the run.
 */

import type { ChangeClassifier } from './change-classifier.js';
import { pathExists, joinPath, type DistributionNode } from './distribution-tree.js';
import { ValidationError } from './errors.js';
import { Logger } from './logger.js';
import { findMatches, sortedLocations } from './match-resolver.js';
import { parseAnswer, parseSelection, type Prompter } from './prompter.js';
import type { ChangeRecord, MatchSet, RunContext, TopLevelEntry } from './types.js';

const logger = new Logger({ context: 'placement-decider' });

export type PlacementState =
  | { name: 'searching' }
  | { name: 'no-match' }
  | { name: 'awaiting-destination' }
  | { name: 'awaiting-confirmation'; destination: string }
  | { name: 'single-match'; location: string }
  | { name: 'multiple-match'; locations: string[] }
  | { name: 'awaiting-selection'; locations: string[] }
  | { name: 'copying'; destinations: string[]; verifyHashes: boolean }
  | { name: 'done' }
  | { name: 'skipped'; reason: string };

export type PlacementStateName = PlacementState['name'];

export interface PlacementOutcome {
  entry: TopLevelEntry;
  status: 'done' | 'skipped';
  destinations: string[];
  records: ChangeRecord[];
  /** Distribution paths left alone because their content already matched */
  unchanged: string[];
  /** Every state the entry passed through, in order */
  states: PlacementStateName[];
  reason?: string;
}

export const PROMPTS = {
  addAsNew: 'Do you want to add it as a new file? [y/N]: ',
  destination: 'Enter destination directory relative to the distribution root: ',
  copyAnyway: 'Copy anyway? [y/n/R]: ',
  selection: 'Enter preference(s)[Multiple selections separated by commas, 0 to skip copying]: ',
} as const;

export function trimSeparators(input: string): string {
  return input.trim().replace(/^[\\/]+/, '').replace(/[\\/]+$/, '');
}

export class PlacementDecider {
  constructor(
    private readonly context: RunContext,
    private readonly tree: DistributionNode,
    private readonly classifier: ChangeClassifier,
    private readonly prompter: Prompter
  ) {}

  async decide(
    entry: TopLevelEntry,
    matches: MatchSet = findMatches(this.tree, entry.name, entry.isDir)
  ): Promise<PlacementOutcome> {
    const outcome: PlacementOutcome = {
      entry,
      status: 'skipped',
      destinations: [],
      records: [],
      unchanged: [],
      states: [],
    };

    let state: PlacementState = { name: 'searching' };
    for (;;) {
      outcome.states.push(state.name);

      if (state.name === 'done') {
        outcome.status = 'done';
        break;
      }
      if (state.name === 'skipped') {
        outcome.reason = state.reason;
        break;
      }

      state = await this.step(state, entry, matches, outcome);
    }

    logger.debug(`[${outcome.status.toUpperCase()}] ${entry.name}`, {
      states: outcome.states,
      destinations: outcome.destinations,
      copied: outcome.records.length,
      unchanged: outcome.unchanged.length,
    });
    return outcome;
  }

  private async step(
    state: Exclude<PlacementState, { name: 'done' } | { name: 'skipped' }>,
    entry: TopLevelEntry,
    matches: MatchSet,
    outcome: PlacementOutcome
  ): Promise<PlacementState> {
    switch (state.name) {
      case 'searching':
        return this.classifyMatches(matches);
      case 'no-match':
        return this.confirmNewEntry(entry);
      case 'awaiting-destination':
        return this.readDestination(entry);
      case 'awaiting-confirmation':
        return this.confirmDestination(entry, state.destination);
      case 'single-match':
        return { name: 'copying', destinations: [state.location], verifyHashes: this.context.checkHashes };
      case 'multiple-match':
        this.prompter.notify(`Multiple matches found for '${entry.name}' in the distribution.`);
        this.prompter.showCandidates(entry.name, state.locations);
        return { name: 'awaiting-selection', locations: state.locations };
      case 'awaiting-selection':
        return this.readSelection(entry, state.locations);
      case 'copying':
        await this.copy(entry, state.destinations, state.verifyHashes, outcome);
        return { name: 'done' };
    }
  }

  private classifyMatches(matches: MatchSet): PlacementState {
    const locations = sortedLocations(matches);
    if (locations.length === 0) return { name: 'no-match' };
    if (locations.length === 1) return { name: 'single-match', location: locations[0] };
    return { name: 'multiple-match', locations };
  }

  private async confirmNewEntry(entry: TopLevelEntry): Promise<PlacementState> {
    this.prompter.notify(`'${entry.name}' not found in distribution.`);
    for (;;) {
      const answer = parseAnswer(await this.prompter.ask(PROMPTS.addAsNew), 'no');
      if (answer === 'yes') return { name: 'awaiting-destination' };
      if (answer === 'no') {
        this.prompter.notify(`Skipping copying: ${entry.name}`);
        return { name: 'skipped', reason: 'declined as new content' };
      }
      this.prompter.notify('Invalid preference. Enter Y for Yes or N for No.');
    }
  }

  private async readDestination(entry: TopLevelEntry): Promise<PlacementState> {
    const destination = trimSeparators(await this.prompter.ask(PROMPTS.destination));

    if (pathExists(this.tree, joinPath(destination, entry.name), entry.isDir)) {
      return { name: 'copying', destinations: [destination], verifyHashes: false };
    }
    if (destination.length === 0) {
      return { name: 'copying', destinations: [''], verifyHashes: false };
    }

    this.prompter.notify('Entered relative path does not exist in the distribution.');
    return { name: 'awaiting-confirmation', destination };
  }

  private async confirmDestination(entry: TopLevelEntry, destination: string): Promise<PlacementState> {
    for (;;) {
      const answer = parseAnswer(await this.prompter.ask(PROMPTS.copyAnyway), 'reenter');
      switch (answer) {
        case 'yes':
          return { name: 'copying', destinations: [destination], verifyHashes: false };
        case 'no':
          this.prompter.notify(`Skipping copying: ${entry.name}`);
          return { name: 'skipped', reason: 'destination not confirmed' };
        case 'reenter':
          return { name: 'awaiting-destination' };
        default:
          this.prompter.notify('Invalid preference. Enter Y for Yes or N for No or R for Re-enter.');
      }
    }
  }

  private async readSelection(entry: TopLevelEntry, locations: string[]): Promise<PlacementState> {
    for (;;) {
      const input = await this.prompter.ask(PROMPTS.selection);
      try {
        const selection = parseSelection(input, locations.length);
        if (selection.kind === 'skip') {
          this.prompter.notify(`0 entered. Skipping copying '${entry.name}'.`);
          return { name: 'skipped', reason: 'skip selected' };
        }
        return {
          name: 'copying',
          destinations: selection.indices.map(index => locations[index - 1]),
          verifyHashes: false,
        };
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        logger.debug('Rejected selection', { input, reason: error.message });
        this.prompter.notify(
          `Invalid preferences. Please select indices where 0 <= index <= ${locations.length}`
        );
      }
    }
  }

  private async copy(
    entry: TopLevelEntry,
    destinations: string[],
    verifyHashes: boolean,
    outcome: PlacementOutcome
  ): Promise<void> {
    for (const destination of destinations) {
      const result = await this.classifier.place(entry, destination, { verifyHashes });
      outcome.destinations.push(destination);
      outcome.records.push(...result.records);
      outcome.unchanged.push(...result.unchanged);
    }
  }
}
