// src/tests/billing/billing-calendar.test.ts
import {
  addBillingInterval,
  billingBaseDate,
  calculateNextBillingDate
} from '../../lib/billing/subscription/billing-calendar';
import { BillingFrequency } from '../../lib/billing/subscription/types';
import { InvalidFrequencyError } from '../../lib/billing/utils/error';

describe('billing calendar', () => {
  const start = new Date(2025, 0, 15, 9, 30);

  it('adds one interval per frequency', () => {
    expect(addBillingInterval(start, BillingFrequency.DAILY)).toEqual(new Date(2025, 0, 16, 9, 30));
    expect(addBillingInterval(start, BillingFrequency.WEEKLY)).toEqual(new Date(2025, 0, 22, 9, 30));
    expect(addBillingInterval(start, BillingFrequency.MONTHLY)).toEqual(new Date(2025, 1, 15, 9, 30));
    expect(addBillingInterval(start, BillingFrequency.YEARLY)).toEqual(new Date(2026, 0, 15, 9, 30));
  });

  it('clamps month-end dates to the last day of the shorter month', () => {
    expect(addBillingInterval(new Date(2025, 0, 31), BillingFrequency.MONTHLY)).toEqual(new Date(2025, 1, 28));
    expect(addBillingInterval(new Date(2024, 0, 31), BillingFrequency.MONTHLY)).toEqual(new Date(2024, 1, 29));
    expect(addBillingInterval(new Date(2024, 1, 29), BillingFrequency.YEARLY)).toEqual(new Date(2025, 1, 28));
  });

  it('does not mutate the input date', () => {
    const date = new Date(2025, 5, 1);
    addBillingInterval(date, BillingFrequency.WEEKLY);
    expect(date).toEqual(new Date(2025, 5, 1));
  });

  it('rejects a frequency outside the known set', () => {
    // Simulates a corrupt value reaching the calendar
    const frequency: string = 'hourly';
    expect(() => addBillingInterval(start, frequency as BillingFrequency)).toThrow(InvalidFrequencyError);
  });

  it('bases the next date on the last charge, falling back to creation', () => {
    const createdAt = new Date(2025, 2, 1);
    const lastBillingAt = new Date(2025, 3, 3);

    expect(billingBaseDate({ createdAt, lastBillingAt: null })).toBe(createdAt);
    expect(calculateNextBillingDate({ createdAt, lastBillingAt, frequency: BillingFrequency.WEEKLY })).toEqual(
      new Date(2025, 3, 10)
    );
  });
});
