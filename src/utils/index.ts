export { htmlEscape } from './html.js';
