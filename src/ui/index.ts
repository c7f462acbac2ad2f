export {
  TITLE,
  CONTROLS_LINE,
  LEGEND,
  rule,
  renderHud,
  renderMap,
  renderFrame,
  renderIntro,
  renderHelp,
  renderGameOver,
} from './AsciiRenderer';
export type { Frame } from './AsciiRenderer';
