import { z } from 'zod';
import { REQUEST_STATUSES, isCalendarDate, isTimeOfDay, parseTimeOfDay } from '../domain/index.js';

const idSchema = z.string().min(1).max(64);
const dateString = z.string().refine(isCalendarDate, { message: 'Must be a valid date (YYYY-MM-DD)' });
const timeString = z.string().refine(isTimeOfDay, { message: 'Must be a valid 24-hour time (HH:MM)' });

/**
 * Zod schema for POST /api/v1/events.
 *
 * Zero-length events are accepted; an end before the start is not.
 */
export const eventInputSchema = z.object({
  event_id: idSchema,
  title: z.string().min(1).max(255),
  organizer: z.string().min(1).max(255),
  date: dateString,
  start_time: timeString,
  end_time: timeString,
  venue: z.string().min(1).max(255),
  max_seats: z.number().int().min(0),
}).refine(
  // Runs even when a time failed its own check; only compare well-formed ones.
  (data) => !isTimeOfDay(data.start_time)
    || !isTimeOfDay(data.end_time)
    || parseTimeOfDay(data.end_time) >= parseTimeOfDay(data.start_time),
  { message: 'end_time must not be before start_time', path: ['end_time'] },
);

export type EventInput = z.infer<typeof eventInputSchema>;

export const studentInputSchema = z.object({
  student_id: idSchema,
  name: z.string().min(1).max(255),
  dept: z.string().min(1).max(255),
  year: z.number().int().min(1).max(10),
  contact: z.string().min(1).max(255),
});

export type StudentInput = z.infer<typeof studentInputSchema>;

export const registrationInputSchema = z.object({
  student_id: idSchema,
  event_id: idSchema,
});

export type RegistrationInput = z.infer<typeof registrationInputSchema>;

/** Query for GET /api/v1/registrations; a repeated `event_id` is refused. */
export const registrationQuerySchema = z.object({
  event_id: idSchema.optional(),
});

export type RegistrationQuery = z.infer<typeof registrationQuerySchema>;

const requestStatusEnum = z.enum(REQUEST_STATUSES);

/** `status` other than Open is meant for seeding; it is not checked further. */
export const serviceRequestInputSchema = z.object({
  request_id: idSchema,
  student_id: idSchema,
  category: z.string().min(1).max(255),
  location: z.string().min(1).max(255),
  description: z.string().max(2000).optional().default(''),
  status: requestStatusEnum.optional().default('Open'),
});

export type ServiceRequestInput = z.infer<typeof serviceRequestInputSchema>;

export const requestStatusUpdateSchema = z.object({
  status: requestStatusEnum,
});

export type RequestStatusUpdate = z.infer<typeof requestStatusUpdateSchema>;
