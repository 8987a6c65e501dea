/**
 * Single source for the generator's version
 */
export const VERSION = '0.3.0';
