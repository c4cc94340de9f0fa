import crypto from "crypto";
import { getConfig } from './config';
import { Event } from './types';

/**
 * Optional in-memory event ledger for pipeline tracing
 * Off by default; nothing is recorded until it is enabled
 */

// Trim back to `maxEvents` once the ledger grows 20% past it
const CLEANUP_FACTOR = 1.2;

class EventLedger {
  private events: Event[] = [];
  private isEnabled = false;

  enable(): void {
    this.isEnabled = true;
  }

  disable(): void {
    this.isEnabled = false;
    this.events = [];
  }

  enabled(): boolean {
    return this.isEnabled;
  }

  log(name: string, data?: unknown): void {
    if (!this.isEnabled) return;

    this.events.push({
      id: crypto.randomUUID(),
      name,
      timestamp: new Date(),
      data
    });
    this.cleanupIfNeeded();
  }

  getEvents(limit = 100): Event[] {
    return this.events.slice(-limit);
  }

  getEventsByName(name: string): Event[] {
    return this.events.filter(event => event.name === name);
  }

  clear(): void {
    this.events = [];
  }

  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const event of this.events) {
      stats[event.name] = (stats[event.name] || 0) + 1;
    }
    return stats;
  }

  private cleanupIfNeeded(): void {
    const maxEvents = getConfig().maxEvents ?? 1000;
    if (this.events.length > Math.floor(maxEvents * CLEANUP_FACTOR)) {
      // Keep only the most recent events
      this.events = this.events.slice(-maxEvents);
    }
  }
}

// Singleton instance
const eventLedger = new EventLedger();

/**
 * Start recording events
 */
export const enableLedger = (): void => {
  eventLedger.enable();
};

/**
 * Stop recording and drop what was recorded
 */
export const disableLedger = (): void => {
  eventLedger.disable();
};

export const isLedgerEnabled = (): boolean => eventLedger.enabled();

/**
 * Log an event (if the ledger is enabled)
 */
export const logEvent = (name: string, data?: unknown): void => {
  eventLedger.log(name, data);
};

/**
 * Get recent events
 */
export const getEvents = (limit = 100): Event[] => {
  return eventLedger.getEvents(limit);
};

export const getEventsByName = (name: string): Event[] => {
  return eventLedger.getEventsByName(name);
};

export const clearEvents = (): void => {
  eventLedger.clear();
};

/**
 * Count of recorded events per name
 */
export const getEventStats = (): Record<string, number> => {
  return eventLedger.getStats();
};
