export { createSeededRandom, pickRandom } from './random.js';
export type { RandomSource } from './random.js';
