import type { Sleeper } from '../types/index.js';

/**
 * Sleep for a specified duration
 */
export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
