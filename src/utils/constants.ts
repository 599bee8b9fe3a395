// ===========================================
// SHARED CONSTANTS
// ===========================================

// Theoretical minimum risk exposure level (µg/m³). No PM2.5 value used
// downstream goes below it.
export const TMREL = 5.0;

export function clampToTmrel(pm25: number): number {
  return Math.max(TMREL, pm25);
}
