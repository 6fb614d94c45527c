/**
 * Time utilities for consistent timestamps
 */

import { format } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toIsoTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Compact local timestamp used in report file names, e.g. 20260105_142233.
 */
export function formatFileStamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
