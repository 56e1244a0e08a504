import { CellTag, Grid } from '../engine/grid';
import type { BattleSink, BattleStartInfo, MoveEvent, PlayerId } from '../engine/types';
import { formatMove } from '../log/battleLog';

function glyph(tag: number): string {
  switch (tag) {
    case CellTag.Empty:
      return '.';
    case CellTag.Hit:
      return 'x';
    case CellTag.Sunk:
      return 'X';
    case CellTag.Miss:
      return 'o';
    default:
      return '#';
  }
}

/** Text picture of a board; column labels wrap every ten cells. */
export function renderBoard(rows: readonly (readonly number[])[]): string {
  const cols = rows.length ? rows[0].length : 0;
  const labelWidth = String(Math.max(0, rows.length - 1)).length;
  const header = ' '.repeat(labelWidth + 1) + Array.from({ length: cols }, (_, x) => String(x % 10)).join('');
  const lines = rows.map((row, y) => `${String(y).padStart(labelWidth)} ${row.map(glyph).join('')}`);
  return [header, ...lines].join('\n');
}

/** Marks an attack on a display grid; a sinking turns the whole hit run into sunk cells. */
export function applyAttackMarks(grid: Grid, event: MoveEvent): void {
  if (!event.hit) {
    grid.set(event.target, CellTag.Miss);
    return;
  }
  grid.set(event.target, CellTag.Hit);
  if (event.sunk) {
    for (const c of grid.floodFill(event.target, (tag) => tag === CellTag.Hit)) {
      grid.set(c, CellTag.Sunk);
    }
  }
}

/** Emits a frame of the defender's board after every move. */
export class BoardRenderSink implements BattleSink {
  private displays: Record<PlayerId, Grid> | null = null;

  constructor(private readonly write: (frame: string) => void = (frame) => console.log(frame)) {}

  onBattleStart(info: BattleStartInfo): void {
    this.displays = { 1: Grid.fromRows(info.boards[1]), 2: Grid.fromRows(info.boards[2]) };
    for (const id of [1, 2] as const) {
      this.write(`Player ${id} Board\n${renderBoard(info.boards[id])}`);
    }
  }

  onMove(event: MoveEvent): void {
    if (!this.displays) {
      throw new Error('Board frame requested before the battle started');
    }
    const grid = this.displays[event.defender];
    applyAttackMarks(grid, event);
    this.write(`${formatMove(event)}\nPlayer ${event.defender} Board\n${renderBoard(grid.toRows())}`);
  }
}
