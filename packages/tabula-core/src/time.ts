/**
 * Game time is counted in days: `2.0` is two full days, `0.5` half a day.
 */

const HOURS_PER_DAY = 24;

/**
 * Game days to hours: `toHumanHours(0.5)` is `12`
 */
export const toHumanHours = (days: number): number => days * HOURS_PER_DAY;

/**
 * Hours to game days: `toGameHours(48)` is `2`
 */
export const toGameHours = (hours: number): number => hours / HOURS_PER_DAY;
