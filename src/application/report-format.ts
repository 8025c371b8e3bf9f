import type { EventSummary, ConflictEntry, ServiceRequestReport } from './reports.js';

/** Plain-text renderings of the reports, one block per report. */

export function formatEventSummary(summary: EventSummary): string {
  const violations = summary.violations.length > 0
    ? `Violation: Overlaps with ${summary.violations.join(', ')}`
    : 'Violations: None';

  return [
    `Event Summary (${summary.event_id} - ${summary.title}):`,
    `Seats: ${summary.seats} | Registrations: ${summary.confirmed} Confirmed, ${summary.waitlisted} Waitlisted`,
    `Venue: ${summary.venue}`,
    violations,
    `Status: ${summary.status}`,
  ].join('\n');
}

export function formatConflictReport(entries: readonly ConflictEntry[]): string {
  if (entries.length === 0) {
    return 'Conflict Report:\nNo conflicts detected.';
  }

  const lines = entries.map((entry) => `- ${entry.event_id} overlaps with ${entry.violations.join(', ')}`);
  return ['Conflict Report:', ...lines].join('\n');
}

export function formatServiceRequestReport(report: ServiceRequestReport): string {
  return [
    'Service Request Summary:',
    `Open: ${report.counts['Open']}`,
    `In-Progress: ${report.counts['In-Progress']}`,
    `Resolved: ${report.counts['Resolved']}`,
  ].join('\n');
}
