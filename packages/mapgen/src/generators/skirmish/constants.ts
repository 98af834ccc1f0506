/**
 * Skirmish map constants
 */

export const MAP_WIDTH = 100;
export const MAP_HEIGHT = 100;
