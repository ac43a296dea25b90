export { createFetchCommand } from './fetch.js';
export { createPathCommand } from './path.js';
export { createVerifyCommand } from './verify.js';
