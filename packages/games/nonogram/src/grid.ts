/**
 * Square, array-backed grid addressed as (column, row). Storage is row-major.
 * `clone` always yields a new owned container.
 */
export class Grid<T> {
  readonly size: number;
  private cells: T[];

  private constructor(size: number, cells: T[]) {
    this.size = size;
    this.cells = cells;
  }

  static create<T>(size: number, init: (column: number, row: number) => T): Grid<T> {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid grid size: ${size}`);
    }
    const cells: T[] = [];
    for (let row = 0; row < size; row++) {
      for (let column = 0; column < size; column++) {
        cells.push(init(column, row));
      }
    }
    return new Grid(size, cells);
  }

  static empty<T>(): Grid<T> {
    return new Grid<T>(0, []);
  }

  inBounds(column: number, row: number): boolean {
    return (
      Number.isInteger(column) &&
      Number.isInteger(row) &&
      column >= 0 &&
      column < this.size &&
      row >= 0 &&
      row < this.size
    );
  }

  get(column: number, row: number): T {
    return this.cells[this.indexOf(column, row)];
  }

  set(column: number, row: number, value: T): void {
    this.cells[this.indexOf(column, row)] = value;
  }

  /** Cells of one row, left to right. */
  row(row: number): T[] {
    this.indexOf(0, row);
    return this.cells.slice(row * this.size, (row + 1) * this.size);
  }

  /** Cells of one column, top to bottom. */
  column(column: number): T[] {
    const out: T[] = [];
    for (let row = 0; row < this.size; row++) out.push(this.get(column, row));
    return out;
  }

  /** Visit every cell in row-major order. */
  forEach(visit: (value: T, column: number, row: number) => void): void {
    for (let i = 0; i < this.cells.length; i++) {
      visit(this.cells[i], i % this.size, Math.floor(i / this.size));
    }
  }

  /** Row-major search; stops at the first cell for which `predicate` is true. */
  some(predicate: (value: T, column: number, row: number) => boolean): boolean {
    for (let i = 0; i < this.cells.length; i++) {
      if (predicate(this.cells[i], i % this.size, Math.floor(i / this.size))) return true;
    }
    return false;
  }

  map<U>(transform: (value: T, column: number, row: number) => U): Grid<U> {
    return Grid.create(this.size, (column, row) => transform(this.get(column, row), column, row));
  }

  clone(copy: (value: T) => T = (value) => value): Grid<T> {
    return new Grid(this.size, this.cells.map(copy));
  }

  private indexOf(column: number, row: number): number {
    if (!this.inBounds(column, row)) {
      throw new RangeError(`Cell (${column}, ${row}) is outside a ${this.size}x${this.size} grid`);
    }
    return row * this.size + column;
  }
}
