import * as admin from 'firebase-admin';
import type { firestore } from 'firebase-admin';

export function timestampFromDate(date: Date): firestore.Timestamp {
  return admin.firestore.Timestamp.fromDate(date);
}

/**
 * Reads a stored instant that may be a Firestore Timestamp, a Date or an ISO string.
 */
export function toDate(value: unknown): Date | null {
  if (!value) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value);
  }

  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  if (typeof value === 'object' && 'toDate' in value && typeof value.toDate === 'function') {
    const maybeDate: unknown = value.toDate();
    if (maybeDate instanceof Date && !Number.isNaN(maybeDate.getTime())) {
      return maybeDate;
    }
  }

  return null;
}
