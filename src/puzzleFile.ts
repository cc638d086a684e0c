import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import { extname } from 'node:path';

import type { PuzzleJson } from './Puzzle.ts';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function loadPuzzleFile(path: string): PuzzleJson[] {
  return parsePuzzleFile(readFileSync(path, 'utf-8'), path);
}

/**
 * Reads a plain text file as one puzzle, or a YAML file holding either one puzzle
 * mapping or a `puzzles` list of them.
 */
export function parsePuzzleFile(content: string, fileName: string): PuzzleJson[] {
  if (!YAML_EXTENSIONS.has(extname(fileName).toLowerCase())) {
    return [{ grid: content }];
  }

  const spec = yaml.load(content);
  if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) {
    throw new Error(`${fileName}: YAML puzzle file must be a mapping`);
  }
  if (!('puzzles' in spec)) {
    return [buildPuzzleJson(spec, fileName)];
  }

  const puzzles = spec.puzzles;
  if (!Array.isArray(puzzles) || puzzles.length === 0) {
    throw new Error(`${fileName}: puzzles must be a non-empty list`);
  }
  return puzzles.map((item: unknown, idx) => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`${fileName}: puzzles[${String(idx)}] must be a mapping`);
    }
    return buildPuzzleJson(item, `${fileName}: puzzles[${String(idx)}]`);
  });
}

function buildPuzzleJson(item: object, location: string): PuzzleJson {
  const grid = 'grid' in item ? item.grid : undefined;
  if (typeof grid !== 'string') {
    throw new Error(`${location}: grid must be a string`);
  }
  const solution = optionalString('solution' in item ? item.solution : undefined, `${location}: solution`);
  const title = optionalString('title' in item ? item.title : undefined, `${location}: title`);
  return {
    grid,
    ...solution !== undefined && { solution },
    ...title !== undefined && { title: title.trim() }
  };
}

function optionalString(value: unknown, location: string): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new Error(`${location} must be a string`);
}
