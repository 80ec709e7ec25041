export { singleQuote, indentLines } from './strings.js';
