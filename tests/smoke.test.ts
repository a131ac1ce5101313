import { describe, it, expect } from 'vitest';
import { setupPyramidTenGame } from '../games/pyramid-ten/PyramidTenGame';
import { getBoardView } from '../games/pyramid-ten/BoardView';

describe('Smoke Test', () => {
  it('should deal a default game of 27 tableau cards', () => {
    const session = setupPyramidTenGame();
    expect(session.phase).toBe('playing');
    expect(session.tableau.rowCount).toBe(6);
    expect(session.tableau.occupiedCount()).toBe(27);
    expect(session.drawPile.size()).toBe(13);
  });

  it('should show the opening board', () => {
    const view = getBoardView(setupPyramidTenGame());
    expect(view.rows.map((row) => row.length)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(view.terminalRow).toHaveLength(6);
    expect(view.discardCount).toBe(0);
    expect(view.drawCount).toBe(13);
    expect(view.completedCount).toBe(0);
  });
});
