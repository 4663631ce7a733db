// src/lib/billing/subscription/billing-calendar.ts
import { addDays, addMonths, addWeeks, addYears } from 'date-fns';
import { InvalidFrequencyError } from '../utils/error';
import { BillingFrequency, Subscription } from './types';

/**
 * Advances a date by one billing interval. Month and year steps are calendar
 * steps: Jan 31 + 1 month is Feb 28 (or 29), never Mar 3.
 */
export function addBillingInterval(date: Date, frequency: BillingFrequency): Date {
  switch (frequency) {
    case BillingFrequency.DAILY:
      return addDays(date, 1);
    case BillingFrequency.WEEKLY:
      return addWeeks(date, 1);
    case BillingFrequency.MONTHLY:
      return addMonths(date, 1);
    case BillingFrequency.YEARLY:
      return addYears(date, 1);
    default:
      throw new InvalidFrequencyError(String(frequency));
  }
}

/** The date the next cycle is computed from: last charge, else creation. */
export function billingBaseDate(subscription: Pick<Subscription, 'lastBillingAt' | 'createdAt'>): Date {
  return subscription.lastBillingAt ?? subscription.createdAt;
}

export function calculateNextBillingDate(
  subscription: Pick<Subscription, 'lastBillingAt' | 'createdAt' | 'frequency'>
): Date {
  return addBillingInterval(billingBaseDate(subscription), subscription.frequency);
}
