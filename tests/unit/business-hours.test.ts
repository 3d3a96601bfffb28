import { DateTime } from 'luxon';
import { addBusinessDays, isBusinessDay } from '../../src/utils/businessHours';

describe('businessHours', () => {
  const zone = 'America/Chicago';

  it('should skip the weekend', () => {
    // Friday 15:00 in Chicago
    expect(addBusinessDays(new Date('2024-06-07T20:00:00Z'), 3, zone)).toBe('2024-06-12T23:59:59-05:00');
  });

  it('should count from the local date, not the UTC one', () => {
    // Thursday 22:00 in Chicago, already Friday in UTC
    expect(addBusinessDays(new Date('2024-06-07T03:00:00Z'), 1, zone)).toBe('2024-06-07T23:59:59-05:00');
  });

  it('should return the end of the same day for zero days', () => {
    expect(addBusinessDays(new Date('2024-06-07T20:00:00Z'), 0, zone)).toBe('2024-06-07T23:59:59-05:00');
  });

  it('should honour a custom work week', () => {
    // Wednesday; only Mondays count
    expect(addBusinessDays(new Date('2024-06-05T15:00:00Z'), 1, zone, [1])).toBe('2024-06-10T23:59:59-05:00');
  });

  it('should reject an empty work week', () => {
    expect(() => addBusinessDays(new Date('2024-06-05T15:00:00Z'), 1, zone, [])).toThrow('Work week must contain at least one day');
  });

  it('should treat Saturday as a day off', () => {
    expect(isBusinessDay(DateTime.fromISO('2024-06-08'))).toBe(false);
    expect(isBusinessDay(DateTime.fromISO('2024-06-10'))).toBe(true);
  });
});
