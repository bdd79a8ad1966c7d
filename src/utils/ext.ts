/**
 * Injectable collaborators for identifiers and time.
 *
 * @module utils/ext
 */

import { v4 as uuidv4 } from 'uuid';

/** Generates globally unique identifiers */
export interface IDGenerator {
  generateID(): string;
}

/** Source of the current time */
export interface Clock {
  now(): Date;
}

/**
 * UUID v4 identifier generator.
 */
export class UUIDGenerator implements IDGenerator {
  generateID(): string {
    return uuidv4();
  }
}

/**
 * Clock backed by the system time.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock that always returns the same instant.
 */
export class FixedClock implements Clock {
  constructor(private readonly instant: Date) {}

  now(): Date {
    return new Date(this.instant.getTime());
  }
}
