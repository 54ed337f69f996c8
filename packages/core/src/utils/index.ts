export { normalizeName, indexBy } from './names.js';
