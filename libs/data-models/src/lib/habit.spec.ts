import { CADENCES, isCadence, parseCadence } from './habit';

describe('Cadence', () => {
  it('lists the three cadences in order', () => {
    expect(CADENCES).toEqual(['daily', 'weekly', 'monthly']);
  });

  it('recognises known cadences', () => {
    expect(isCadence('daily')).toBe(true);
    expect(isCadence('weekly')).toBe(true);
    expect(isCadence('monthly')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isCadence('yearly')).toBe(false);
    expect(isCadence('Daily')).toBe(false);
    expect(isCadence(undefined)).toBe(false);
    expect(isCadence(7)).toBe(false);
  });

  it('parseCadence returns the value unchanged', () => {
    expect(parseCadence('monthly')).toBe('monthly');
  });

  it('parseCadence throws a TypeError for unknown values', () => {
    expect(() => parseCadence('hourly')).toThrow(TypeError);
    expect(() => parseCadence('hourly')).toThrow('Unknown cadence: hourly');
  });
});
