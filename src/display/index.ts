// Display module exports
export {
  formatExpression,
  formatPil,
  formatPilStatement,
  formatAsm,
  formatAsmStatement,
} from './format.js';

export { toJSON } from './json.js';
