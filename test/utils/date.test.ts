import { describe, it, expect } from 'vitest';
import { parseDayMonthYear } from '../../src/utils/date.js';

describe('parseDayMonthYear', () => {
  it('should convert dd/mm/yyyy to an ISO date', () => {
    expect(parseDayMonthYear('05/03/2024')).toBe('2024-03-05');
    expect(parseDayMonthYear('5/3/2024')).toBe('2024-03-05');
  });

  it('should accept Feb 29 only in leap years', () => {
    expect(parseDayMonthYear('29/02/2024')).toBe('2024-02-29');
    expect(parseDayMonthYear('29/02/2023')).toBeNull();
  });

  it('should keep years below 100 as written', () => {
    expect(parseDayMonthYear('05/03/0099')).toBe('0099-03-05');
    expect(parseDayMonthYear('29/02/0004')).toBe('0004-02-29');
    expect(parseDayMonthYear('29/02/0003')).toBeNull();
  });

  it('should reject days and months outside the calendar', () => {
    expect(parseDayMonthYear('00/01/2020')).toBeNull();
    expect(parseDayMonthYear('12/13/2020')).toBeNull();
    expect(parseDayMonthYear('31/04/2020')).toBeNull();
  });

  it('should reject other layouts', () => {
    expect(parseDayMonthYear('2024-03-05')).toBeNull();
    expect(parseDayMonthYear('05/03/24')).toBeNull();
    expect(parseDayMonthYear('05/03/2024 10:00')).toBeNull();
  });
});
