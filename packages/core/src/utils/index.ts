export { encodeKey, formatKey, inRange, extractColumnNames } from './keys.js';
