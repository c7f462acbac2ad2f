export { KeyBindings, createDefaultKeyMap } from './KeyBindings';
export type { KeyName, CommandBinding } from './KeyBindings';

export {
  TerminalFrontend,
  SCREEN_COLORS,
  RESET,
  colorize,
  colorizeMapLine,
  createTerminalKitPort,
} from './TerminalFrontend';
export type { TerminalPort } from './TerminalFrontend';
