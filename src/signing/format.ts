/**
 * Date formatting utilities for SigV4 signing
 */

import { SigningError } from './error.js';

function assertValidDate(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new SigningError('Signing time is not a valid date', 'INVALID_TIMESTAMP');
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as YYYYMMDD (UTC)
 */
export function formatDateStamp(date: Date): string {
  assertValidDate(date);
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  return `${year}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * Format date as YYYYMMDDTHHMMSSZ (ISO 8601 basic format, UTC)
 */
export function formatAmzDate(date: Date): string {
  const hours = pad(date.getUTCHours());
  const minutes = pad(date.getUTCMinutes());
  const seconds = pad(date.getUTCSeconds());
  return `${formatDateStamp(date)}T${hours}${minutes}${seconds}Z`;
}

