import { describe, it, expect } from 'vitest';
import {
  eventInputSchema,
  studentInputSchema,
  registrationQuerySchema,
  serviceRequestInputSchema,
  requestStatusUpdateSchema,
} from '../../src/application/index.js';
import { makeEventInput } from '../helpers.js';

describe('eventInputSchema', () => {
  it('accepts a well-formed event', () => {
    const result = eventInputSchema.safeParse(makeEventInput());
    expect(result.success).toBe(true);
  });

  it('accepts a zero-length event', () => {
    const result = eventInputSchema.safeParse(makeEventInput({ start_time: '10:00', end_time: '10:00' }));
    expect(result.success).toBe(true);
  });

  it('rejects an end before the start on end_time', () => {
    const result = eventInputSchema.safeParse(makeEventInput({ start_time: '12:00', end_time: '10:00' }));

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['end_time']);
    expect(result.error?.issues[0]?.message).toBe('end_time must not be before start_time');
  });

  it('rejects malformed dates and times', () => {
    const badDate = eventInputSchema.safeParse(makeEventInput({ date: '20-09-2025' }));
    const badTime = eventInputSchema.safeParse(makeEventInput({ start_time: '25:00' }));

    expect(badDate.error?.issues[0]?.path).toEqual(['date']);
    expect(badTime.error?.issues[0]?.path).toEqual(['start_time']);
  });

  it('rejects negative or fractional seat counts', () => {
    expect(eventInputSchema.safeParse(makeEventInput({ max_seats: -1 })).success).toBe(false);
    expect(eventInputSchema.safeParse(makeEventInput({ max_seats: 1.5 })).success).toBe(false);
  });
});

describe('studentInputSchema', () => {
  it('requires an integer year', () => {
    const result = studentInputSchema.safeParse({
      student_id: 'S01', name: 'Test Student', dept: 'CSE', year: 2.5, contact: 'student@example.com',
    });
    expect(result.error?.issues[0]?.path).toEqual(['year']);
  });
});

describe('serviceRequestInputSchema', () => {
  it('defaults description and status', () => {
    const parsed = serviceRequestInputSchema.parse({
      request_id: 'R001', student_id: 'S01', category: 'Wi-Fi', location: 'Hostel Block A',
    });

    expect(parsed.description).toBe('');
    expect(parsed.status).toBe('Open');
  });

  it('rejects an unknown status', () => {
    const result = serviceRequestInputSchema.safeParse({
      request_id: 'R001', student_id: 'S01', category: 'Wi-Fi', location: 'Hostel Block A', status: 'Closed',
    });
    expect(result.success).toBe(false);
  });
});

describe('requestStatusUpdateSchema', () => {
  it('accepts the three known statuses only', () => {
    expect(requestStatusUpdateSchema.safeParse({ status: 'In-Progress' }).success).toBe(true);
    expect(requestStatusUpdateSchema.safeParse({ status: 'in-progress' }).success).toBe(false);
    expect(requestStatusUpdateSchema.safeParse({}).success).toBe(false);
  });
});

describe('registrationQuerySchema', () => {
  it('takes an optional single event_id', () => {
    expect(registrationQuerySchema.parse({})).toEqual({});
    expect(registrationQuerySchema.parse({ event_id: 'E201' })).toEqual({ event_id: 'E201' });
  });

  it('rejects a repeated event_id', () => {
    expect(registrationQuerySchema.safeParse({ event_id: ['E201', 'E202'] }).success).toBe(false);
  });
});
