import { describe, it, expect } from 'vitest';
import {
  UI_VERSION,
  CARD_WIDTH,
  ROW_OFFSET,
  drawPileTop,
  renderHelp,
  StreamTextWriter,
} from '../../src/ui/index';

describe('ui barrel exports', () => {
  it('should export the module version', () => {
    expect(UI_VERSION).toBe('0.1.0');
  });

  it('should export layout constants', () => {
    expect(CARD_WIDTH).toBe(5);
    expect(ROW_OFFSET).toBe(3);
  });

  it('should export the drawing and help helpers', () => {
    expect(drawPileTop(null)).toHaveLength(4);
    expect(renderHelp([{ heading: 'A', body: 'b' }])).toBe('A\n-\nb');
    expect(typeof StreamTextWriter).toBe('function');
  });
});
