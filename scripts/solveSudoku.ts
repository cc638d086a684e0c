/**
 * Solve Sudoku puzzles from a text or YAML file.
 *
 * Usage:
 *     npm run solve -- [puzzle-file] [--all] [--trace] [--width N]
 *
 * A text file holds one puzzle: 81 characters, digits are givens, anything else is blank.
 * A YAML file holds one `{ grid, title?, solution? }` mapping or a `puzzles` list of them.
 * The puzzle file defaults to sudoku.txt in the working directory.
 */

/* eslint-disable no-console -- CLI script output. */

import { existsSync } from 'node:fs';

import type { PuzzleJson } from '../src/Puzzle.ts';
import type { SearchObserver } from '../src/search/SearchObserver.ts';

import {
  formatBoard,
  toGridString
} from '../src/formatBoard.ts';
import { describeContradiction } from '../src/outcomes.ts';
import { Propagator } from '../src/propagation/Propagator.ts';
import { Puzzle } from '../src/Puzzle.ts';
import { loadPuzzleFile } from '../src/puzzleFile.ts';
import { SearchEngine } from '../src/search/SearchEngine.ts';
import { Topology } from '../src/Topology.ts';
import { findConflictingGivens } from '../src/validation.ts';

interface CliOptions {
  readonly all: boolean;
  readonly file: string;
  readonly trace: boolean;
  readonly width?: number;
}

const DEFAULT_PUZZLE_FILE = 'sudoku.txt';
const FIRST_CLI_ARG_INDEX = 2;
const USAGE = 'Usage: npm run solve -- [puzzle-file] [--all] [--trace] [--width N]';

function createTraceObserver(topology: Topology): SearchObserver {
  return {
    onBranch(event): void {
      console.log(`${'  '.repeat(event.depth)}try ${topology.ref(event.square)} = ${String(event.digit)}`);
    },
    onContradiction(event, contradiction): void {
      console.log(`${'  '.repeat(event.depth)}  rejected: ${describeContradiction(topology, contradiction)}`);
    }
  };
}

function main(): void {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(FIRST_CLI_ARG_INDEX));
  } catch (error: unknown) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    process.exit(1);
  }

  if (!existsSync(options.file)) {
    console.error(`Error: ${options.file} not found`);
    process.exit(1);
  }

  let failures = 0;
  for (const json of loadPuzzleFile(options.file)) {
    if (!solvePuzzle(json, options)) {
      failures++;
    }
  }
  if (failures > 0) {
    process.exitCode = 1;
  }
}

function parseArgs(args: readonly string[]): CliOptions {
  let all = false;
  let trace = false;
  let file: string | undefined;
  let width: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--all':
        all = true;
        break;
      case '--trace':
        trace = true;
        break;
      case '--width': {
        const value = args[++i];
        width = value === undefined ? NaN : parseInt(value, 10);
        if (!Number.isInteger(width) || width < 1) {
          throw new Error(`--width expects a positive integer, got ${String(value)}`);
        }
        break;
      }
      default:
        if (arg === undefined || arg.startsWith('--')) {
          throw new Error(`Unknown option: ${String(arg)}`);
        }
        if (file !== undefined) {
          throw new Error('Only one puzzle file can be given');
        }
        file = arg;
    }
  }

  return {
    all,
    file: file ?? DEFAULT_PUZZLE_FILE,
    trace,
    ...width !== undefined && { width }
  };
}

function solvePuzzle(json: PuzzleJson, options: CliOptions): boolean {
  const topology = Topology.standard();
  const puzzle = Puzzle.fromJson(json, topology);
  if (json.title !== undefined) {
    console.log(`# ${puzzle.title}`);
  }

  const propagator = new Propagator();
  const setup = puzzle.toBoard(propagator);
  if (setup.type === 'contradiction') {
    console.error(`No solution: ${describeContradiction(topology, setup.contradiction)}`);
    for (const conflict of findConflictingGivens(puzzle)) {
      const [first, second] = conflict.squares;
      console.error(`  ${conflict.unit.toString()}: ${topology.ref(first)} and ${topology.ref(second)} are both ${String(conflict.digit)}`);
    }
    return false;
  }

  const engine = new SearchEngine({
    propagator,
    ...options.trace && { observer: createTraceObserver(topology) }
  });
  const formatOptions = options.width === undefined ? {} : { width: options.width };

  let solved = 0;
  let matchesExpected = json.solution === undefined;
  for (const solution of engine.solutions(setup.board)) {
    solved++;
    console.log(formatBoard(solution, formatOptions));
    console.log('');
    if (json.solution !== undefined && toGridString(solution) === json.solution) {
      matchesExpected = true;
    }
    if (!options.all) {
      break;
    }
  }

  const { branches, contradictions, nodes } = engine.stats;
  if (solved === 0) {
    console.error('No solution');
  }
  if (options.trace || options.all) {
    console.log(`${String(solved)} solution(s), ${String(nodes)} nodes, ${String(branches)} branches, ${String(contradictions)} contradictions`);
  }
  if (solved > 0 && !matchesExpected) {
    console.error('Solution differs from the expected grid');
  }
  return solved > 0 && matchesExpected;
}

main();

/* eslint-enable no-console -- End CLI script output. */
