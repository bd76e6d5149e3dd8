import { validateScheduleDefinition } from '../scheduleDefinition';
import { ScheduleValidationError } from '../scheduleErrors';

describe('validateScheduleDefinition', () => {
  it('accepts each schedule type with its policy field', () => {
    expect(validateScheduleDefinition({ type: 'fixed_time', duration: 3, specificTimes: ['08:00'] })).toEqual({
      type: 'fixed_time',
      duration: 3,
      specificTimes: ['08:00'],
    });
    expect(validateScheduleDefinition({ type: 'interval_based', duration: 3, intervalHours: 6 }).type).toBe(
      'interval_based',
    );
    expect(validateScheduleDefinition({ type: 'frequency_based', duration: 3, timesPerDay: 2 }).type).toBe(
      'frequency_based',
    );
  });

  it('drops fields that belong to other schedule types', () => {
    expect(
      validateScheduleDefinition({ type: 'interval_based', duration: 1, intervalHours: 4, timesPerDay: 9 }),
    ).toEqual({ type: 'interval_based', duration: 1, intervalHours: 4 });
  });

  it('rejects malformed definitions with every issue listed', () => {
    let caught: unknown;
    try {
      validateScheduleDefinition({ type: 'fixed_time', duration: 0, specificTimes: ['8am'] }, 'plan[2].schedule');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ScheduleValidationError);
    expect(caught).toMatchObject({
      code: 'validation_failed',
      issues: ['duration: Number must be greater than 0', 'specificTimes.0: Expected HH:MM'],
    });
  });

  it('rejects empty time lists and unknown types', () => {
    expect(() => validateScheduleDefinition({ type: 'fixed_time', duration: 2, specificTimes: [] })).toThrow(
      ScheduleValidationError,
    );
    expect(() => validateScheduleDefinition({ type: 'weekly', duration: 2 })).toThrow(ScheduleValidationError);
  });
});
