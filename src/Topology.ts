import {
  getSquareRef,
  parseSquareRef
} from './parsers.ts';
import { ensureNonNullable } from './typeGuards.ts';

export interface Square {
  readonly column: number;
  readonly row: number;
}

export interface TopologyOptions {
  readonly boxHeight: number;
  readonly boxWidth: number;
}

export type UnitType = 'box' | 'column' | 'row';

const MAX_SIZE = 9;
const STANDARD_BOX_SIDE = 3;
const CHAR_CODE_A = 65;

export class Unit {
  public readonly label: string;

  public constructor(
    public readonly type: UnitType,
    public readonly id: number,
    public readonly squares: readonly number[]
  ) {
    this.label = type === 'row' ? String.fromCharCode(CHAR_CODE_A + id - 1) : String(id);
  }

  public contains(square: number): boolean {
    return this.squares.includes(square);
  }

  public toString(): string {
    switch (this.type) {
      case 'box':
        return `Box ${this.label}`;
      case 'column':
        return `Column ${this.label}`;
      case 'row':
        return `Row ${this.label}`;
      default: {
        const exhaustive: never = this.type;
        throw new Error(`Unknown unit type: ${String(exhaustive)}`);
      }
    }
  }
}

/**
 * Static structure of a board: squares, units and peers, all addressed by square index.
 *
 * A square's index is `row * size + column`, so ascending index order is the row-major
 * square order. Every array handed out is frozen; one instance is shared by all board states.
 */
export class Topology {
  public readonly boxes: readonly Unit[];
  public readonly columns: readonly Unit[];
  public readonly digits: readonly number[];
  public readonly rows: readonly Unit[];
  public readonly size: number;
  public readonly squares: readonly Square[];
  public readonly units: readonly Unit[];

  public get squareCount(): number {
    return this.squares.length;
  }

  private static standardTopology: null | Topology = null;

  private readonly peersBySquare: readonly (readonly number[])[];
  private readonly unitsBySquare: readonly (readonly Unit[])[];

  private constructor(public readonly boxHeight: number, public readonly boxWidth: number) {
    const size = boxHeight * boxWidth;
    this.size = size;
    this.digits = Object.freeze(Array.from({ length: size }, (_, i) => i + 1));

    const squares: Square[] = [];
    for (let row = 0; row < size; row++) {
      for (let column = 0; column < size; column++) {
        squares.push(Object.freeze({ column, row }));
      }
    }
    this.squares = Object.freeze(squares);

    const rows: Unit[] = [];
    const columns: Unit[] = [];
    for (let i = 0; i < size; i++) {
      rows.push(new Unit('row', i + 1, Object.freeze(Array.from({ length: size }, (_, c) => i * size + c))));
      columns.push(new Unit('column', i + 1, Object.freeze(Array.from({ length: size }, (_, r) => r * size + i))));
    }

    const boxes: Unit[] = [];
    for (let boxRow = 0; boxRow < size / boxHeight; boxRow++) {
      for (let boxColumn = 0; boxColumn < size / boxWidth; boxColumn++) {
        const boxSquares: number[] = [];
        for (let r = boxRow * boxHeight; r < (boxRow + 1) * boxHeight; r++) {
          for (let c = boxColumn * boxWidth; c < (boxColumn + 1) * boxWidth; c++) {
            boxSquares.push(r * size + c);
          }
        }
        boxes.push(new Unit('box', boxes.length + 1, Object.freeze(boxSquares)));
      }
    }

    this.rows = Object.freeze(rows);
    this.columns = Object.freeze(columns);
    this.boxes = Object.freeze(boxes);
    this.units = Object.freeze([...rows, ...columns, ...boxes]);

    const unitsBySquare: Unit[][] = squares.map(() => []);
    for (const unit of this.units) {
      for (const square of unit.squares) {
        ensureNonNullable(unitsBySquare[square]).push(unit);
      }
    }
    this.unitsBySquare = Object.freeze(unitsBySquare.map((units) => Object.freeze(units)));

    this.peersBySquare = Object.freeze(this.unitsBySquare.map((units, square) => {
      const peers = new Set<number>();
      for (const unit of units) {
        for (const other of unit.squares) {
          if (other !== square) {
            peers.add(other);
          }
        }
      }
      return Object.freeze([...peers].sort((a, b) => a - b));
    }));
  }

  public static create(options: TopologyOptions): Topology {
    const { boxHeight, boxWidth } = options;
    if (!Number.isInteger(boxHeight) || !Number.isInteger(boxWidth) || boxHeight < 1 || boxWidth < 1) {
      throw new Error(`Box dimensions must be positive integers: ${String(boxHeight)}x${String(boxWidth)}`);
    }
    if (boxHeight * boxWidth > MAX_SIZE) {
      throw new Error(`Board side ${String(boxHeight * boxWidth)} exceeds ${String(MAX_SIZE)}`);
    }
    return new Topology(boxHeight, boxWidth);
  }

  public static standard(): Topology {
    Topology.standardTopology ??= new Topology(STANDARD_BOX_SIDE, STANDARD_BOX_SIDE);
    return Topology.standardTopology;
  }

  public getSquare(square: number): Square {
    return ensureNonNullable(this.squares[square], `Square index out of range: ${String(square)}`);
  }

  public indexOf(row: number, column: number): number {
    if (row < 0 || row >= this.size || column < 0 || column >= this.size) {
      throw new RangeError(`Square out of range: (${String(row)}, ${String(column)})`);
    }
    return row * this.size + column;
  }

  public indexOfRef(ref: string): number {
    const { column, row } = parseSquareRef(ref);
    return this.indexOf(row, column);
  }

  public peersOf(square: number): readonly number[] {
    return ensureNonNullable(this.peersBySquare[square], `Square index out of range: ${String(square)}`);
  }

  public ref(square: number): string {
    const { column, row } = this.getSquare(square);
    return getSquareRef(row, column);
  }

  public unitsOf(square: number): readonly Unit[] {
    return ensureNonNullable(this.unitsBySquare[square], `Square index out of range: ${String(square)}`);
  }
}

export function compareSquares(a: Square, b: Square): number {
  return a.row - b.row || a.column - b.column;
}
