/**
 * UI Module
 *
 * Terminal presentation helpers: card art, help text, and the line
 * reader / text writer collaborators a game runner talks through.
 */
export const UI_VERSION = '0.1.0';

// Shared constants
export { CARD_WIDTH, CARD_GAP, ROW_OFFSET } from './constants';

// Card art
export type { CardLayers } from './CardArt';
export {
  CARD_TOP,
  CARD_BOTTOM,
  EMPTY_PILE_LAYERS,
  cardLayers,
  drawCardRow,
  drawPileTop,
} from './CardArt';

// Help text
export type { HelpSection } from './HelpText';
export { renderHelp } from './HelpText';

// Terminal collaborators
export type { LineReader, TextWriter } from './TerminalIo';
export { ReadlineLineReader, StreamTextWriter } from './TerminalIo';
