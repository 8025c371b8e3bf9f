import { describe, it, expect } from 'vitest';
import {
  formatEventSummary,
  formatConflictReport,
  formatServiceRequestReport,
} from '../../src/application/index.js';
import type { EventSummary } from '../../src/application/index.js';

const SUMMARY: EventSummary = {
  event_id: 'E102',
  title: 'Guitar Jam',
  organizer: 'Music Club',
  date: '2025-09-20',
  start_time: '11:00',
  end_time: '12:30',
  venue: 'Seminar Hall',
  seats: 30,
  confirmed: 1,
  waitlisted: 0,
  violations: ['E101'],
  status: 'Invalid',
};

describe('formatEventSummary', () => {
  it('renders an invalid event with its overlaps', () => {
    expect(formatEventSummary(SUMMARY)).toBe([
      'Event Summary (E102 - Guitar Jam):',
      'Seats: 30 | Registrations: 1 Confirmed, 0 Waitlisted',
      'Venue: Seminar Hall',
      'Violation: Overlaps with E101',
      'Status: Invalid',
    ].join('\n'));
  });

  it('renders a valid event without violations', () => {
    const text = formatEventSummary({ ...SUMMARY, violations: [], status: 'Valid' });
    expect(text.split('\n').slice(3)).toEqual(['Violations: None', 'Status: Valid']);
  });
});

describe('formatConflictReport', () => {
  it('lists each conflicting event', () => {
    expect(formatConflictReport([
      { event_id: 'E102', violations: ['E101'] },
      { event_id: 'E107', violations: ['E105', 'E106'] },
    ])).toBe('Conflict Report:\n- E102 overlaps with E101\n- E107 overlaps with E105, E106');
  });

  it('says so when there are no conflicts', () => {
    expect(formatConflictReport([])).toBe('Conflict Report:\nNo conflicts detected.');
  });
});

describe('formatServiceRequestReport', () => {
  it('prints one count per status', () => {
    const text = formatServiceRequestReport({
      counts: { 'Open': 1, 'In-Progress': 2, 'Resolved': 3 },
      examples: { 'Open': [], 'In-Progress': [], 'Resolved': [] },
    });

    expect(text).toBe('Service Request Summary:\nOpen: 1\nIn-Progress: 2\nResolved: 3');
  });
});
